import TaskInput from './components/TaskInput';
import TaskList from './components/TaskList';
import { useTasks } from './hooks';
import { appConfig } from '@modules/config';
import { aria } from './aria';

interface Props {
  title?: string;
}

export default function App({ title = appConfig.title }: Props) {
  const { tasks, draft, setDraft, submitDraft, toggleComplete, deleteTask } = useTasks();

  return (
    <div className="mx-auto flex h-screen max-w-xl flex-col p-2 space-y-2 sm:p-4 sm:space-y-4">
      <header {...aria.header} className="rounded-md bg-indigo-600 px-4 py-3 text-white shadow">
        <h1 className="text-lg font-bold">{title}</h1>
      </header>

      <main {...aria.main} className="flex min-h-0 flex-1 flex-col space-y-4">
        <TaskInput value={draft} onChange={setDraft} onSubmit={submitDraft} />
        <TaskList tasks={tasks} onToggle={toggleComplete} onDelete={deleteTask} />
      </main>
    </div>
  );
}
