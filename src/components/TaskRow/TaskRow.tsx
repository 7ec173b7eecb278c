import { memo } from 'react';
import type { KeyboardEvent } from 'react';
import { CheckIcon } from '@heroicons/react/20/solid';
import { TrashIcon } from '@heroicons/react/24/outline';
import type { Task } from '@modules/types';
import { palette } from '@modules/palette';
import { aria } from '.';

interface Props {
  task: Task;
  onToggle?: (id: string) => void;
  onDelete?: (id: string) => void;
}

function TaskRow({ task, onToggle, onDelete }: Props) {
  function handleKeyDown(ev: KeyboardEvent<HTMLDivElement>) {
    if (ev.key === 'Enter' || ev.key === ' ') {
      ev.preventDefault();
      onToggle?.(task.id);
    }
  }

  return (
    <li
      className="flex w-full items-center gap-2 rounded-lg border-l-4 bg-white px-2 py-2 text-sm text-gray-800 shadow sm:px-4 sm:py-3"
      style={{ borderColor: task.completed ? palette.done : palette.pending }}
    >
      <div
        {...aria.toggle(task.text, task.completed)}
        onClick={() => onToggle?.(task.id)}
        onKeyDown={handleKeyDown}
        className="flex min-w-0 flex-1 cursor-pointer select-none items-center gap-2"
      >
        <span
          aria-hidden="true"
          className={`flex h-5 w-5 shrink-0 items-center justify-center rounded border ${
            task.completed ? 'border-indigo-600 bg-indigo-600 text-white' : 'border-gray-400 bg-white'
          }`}
        >
          {task.completed && <CheckIcon className="h-4 w-4" />}
        </span>
        <span className={`break-words ${task.completed ? 'text-gray-400 line-through' : ''}`}>
          {task.text}
        </span>
      </div>
      <button
        type="button"
        onClick={() => onDelete?.(task.id)}
        {...aria.deleteButton}
        className="flex h-8 w-8 items-center justify-center rounded-md text-gray-500 transition hover:bg-gray-100 hover:text-red-600 focus-visible:outline focus-visible:outline-2 focus-visible:outline-offset-2 focus-visible:outline-indigo-500"
      >
        <TrashIcon aria-hidden="true" className="h-5 w-5" />
      </button>
    </li>
  );
}

export default memo(TaskRow);
