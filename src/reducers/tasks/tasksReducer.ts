import type { Task, TaskState } from "@modules/types";

type State = TaskState;

const initialState: State = {
  tasks: [],
  draft: "",
};

type AddTaskAction = { type: "add-task"; id: string; text: string };

type ToggleTaskAction = { type: "toggle-task"; id: string };

type DeleteTaskAction = { type: "delete-task"; id: string };

type SetDraftAction = { type: "set-draft"; text: string };

type SubmitDraftAction = { type: "submit-draft"; id: string };

type Action =
  | AddTaskAction
  | ToggleTaskAction
  | DeleteTaskAction
  | SetDraftAction
  | SubmitDraftAction;

export function isBlank(text: string): boolean {
  return text.trim() === "";
}

// Returns the same array when nothing can be appended, so callers can
// detect the no-op by reference.
function appendTask(tasks: Task[], id: string, text: string): Task[] {
  const trimmed = text.trim();
  if (!trimmed || tasks.some((t) => t.id === id)) return tasks;
  return [...tasks, { id, text: trimmed, completed: false }];
}

export function tasksReducer(state: State = initialState, action: Action): State {
  switch (action.type) {
    case "add-task": {
      const tasks = appendTask(state.tasks, action.id, action.text);
      return tasks === state.tasks ? state : { ...state, tasks };
    }
    case "toggle-task": {
      const idx = state.tasks.findIndex((t) => t.id === action.id);
      if (idx < 0) return state;
      const tasks = [...state.tasks];
      tasks[idx] = { ...tasks[idx], completed: !tasks[idx].completed };
      return { ...state, tasks };
    }
    case "delete-task": {
      if (!state.tasks.some((t) => t.id === action.id)) return state;
      return { ...state, tasks: state.tasks.filter((t) => t.id !== action.id) };
    }
    case "set-draft":
      return action.text === state.draft ? state : { ...state, draft: action.text };
    case "submit-draft": {
      const tasks = appendTask(state.tasks, action.id, state.draft);
      return tasks === state.tasks ? state : { tasks, draft: "" };
    }
    default:
      return state;
  }
}

export { initialState };
export type { State, Action };
