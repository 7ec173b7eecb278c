import { useCallback, useReducer } from "react";
import { v4 as uuid } from "uuid";
import type { Task } from "@modules/types";
import { tasksReducer, initialState } from "@reducers";

export function useTasks() {
  const [state, dispatch] = useReducer(tasksReducer, initialState);
  const { tasks, draft } = state;

  const addTask = useCallback((text: string) => {
    dispatch({ type: "add-task", id: uuid(), text });
  }, []);

  const toggleComplete = useCallback((id: string) => {
    dispatch({ type: "toggle-task", id });
  }, []);

  const deleteTask = useCallback((id: string) => {
    dispatch({ type: "delete-task", id });
  }, []);

  const setDraft = useCallback((text: string) => {
    dispatch({ type: "set-draft", text });
  }, []);

  const submitDraft = useCallback(() => {
    dispatch({ type: "submit-draft", id: uuid() });
  }, []);

  const listTasks = useCallback((): Task[] => tasks.map((t) => ({ ...t })), [tasks]);

  return {
    tasks,
    draft,
    addTask,
    toggleComplete,
    deleteTask,
    setDraft,
    submitDraft,
    listTasks,
  };
}
