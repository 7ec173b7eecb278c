export { useTasks } from "./tasks";
