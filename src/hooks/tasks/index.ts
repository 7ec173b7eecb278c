export { useTasks } from "./useTasks";
