export { default } from './TaskRow';
export { aria } from './aria';
