export const aria = {
  header: {
    'aria-label': 'Application header'
  },
  main: {
    'aria-label': 'To-do list'
  }
};
