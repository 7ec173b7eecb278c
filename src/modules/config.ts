export interface AppConfig {
  title: string;
}

const DEFAULT_TITLE = 'Simple To-Do List';

export function loadConfig(env: Record<string, string | boolean | undefined>): AppConfig {
  const title = env.VITE_APP_TITLE;
  return {
    title: typeof title === 'string' && title.trim() ? title.trim() : DEFAULT_TITLE
  };
}

export const appConfig = loadConfig(import.meta.env);

export { DEFAULT_TITLE };
