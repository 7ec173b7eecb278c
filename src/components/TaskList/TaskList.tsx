import TaskRow from '@components/TaskRow';
import type { Task } from '@modules/types';
import { aria } from '.';

interface Props {
  tasks: Task[];
  onToggle?: (id: string) => void;
  onDelete?: (id: string) => void;
}

export default function TaskList({ tasks, onToggle, onDelete }: Props) {
  return (
    <section {...aria.section} className="flex w-full flex-1 flex-col overflow-y-auto">
      {tasks.length === 0 ? (
        <p className="py-8 text-center text-sm text-gray-500">No tasks yet</p>
      ) : (
        <ul {...aria.list} className="flex w-full flex-col gap-1 sm:gap-2">
          {tasks.map((task) => (
            <TaskRow key={task.id} task={task} onToggle={onToggle} onDelete={onDelete} />
          ))}
        </ul>
      )}
    </section>
  );
}
