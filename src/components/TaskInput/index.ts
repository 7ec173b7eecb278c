export { default } from './TaskInput';
export { aria } from './aria';
