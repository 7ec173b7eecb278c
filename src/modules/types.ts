export interface Task {
  id: string;
  text: string;
  completed: boolean;
}

export interface TaskState {
  tasks: Task[];
  draft: string;
}
