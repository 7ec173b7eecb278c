export const aria = {
  section: {
    role: 'region',
    'aria-label': 'Tasks'
  },
  list: {
    'aria-label': 'Task list'
  }
};
