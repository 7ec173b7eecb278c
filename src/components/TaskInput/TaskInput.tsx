import { memo } from 'react';
import type { FormEvent } from 'react';
import { PlusIcon } from '@heroicons/react/24/solid';
import { isBlank } from '@reducers';
import { aria } from './aria';

interface TaskInputProps {
  value: string;
  onChange: (value: string) => void;
  onSubmit: () => void;
}

function TaskInput({ value, onChange, onSubmit }: TaskInputProps) {
  const isAddDisabled = isBlank(value);

  function handleSubmit(ev: FormEvent<HTMLFormElement>) {
    ev.preventDefault();
    if (isAddDisabled) return;
    onSubmit();
  }

  return (
    <form {...aria.form} onSubmit={handleSubmit} className="flex items-center gap-2">
      <label className="flex-1 text-xs font-medium text-gray-700 sm:text-sm">
        <span className="sr-only">New Task</span>
        <input
          type="text"
          placeholder="New Task"
          value={value}
          onChange={(e) => onChange(e.target.value)}
          {...aria.input}
          className="w-full rounded-md border border-gray-300 px-2 py-2 text-base focus:border-indigo-500 focus:ring-indigo-500"
        />
      </label>
      <button
        type="submit"
        disabled={isAddDisabled}
        {...aria.button}
        className={`flex items-center gap-1 rounded-md px-3 py-2 text-sm font-medium text-white
          ${isAddDisabled ? 'bg-gray-400 cursor-not-allowed' : 'bg-indigo-600 hover:bg-indigo-700'}`}
      >
        <PlusIcon aria-hidden="true" className="h-4 w-4" />
        Add
      </button>
    </form>
  );
}

export default memo(TaskInput);
