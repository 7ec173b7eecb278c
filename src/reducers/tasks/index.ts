export { tasksReducer, initialState, isBlank } from "./tasksReducer";
export type { State, Action } from "./tasksReducer";
