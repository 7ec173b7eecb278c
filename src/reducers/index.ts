export { tasksReducer, initialState, isBlank } from "./tasks";
export type { State as TasksState, Action as TasksAction } from "./tasks";
