export const aria = {
  form: {
    'aria-label': 'Add a task'
  },
  input: {
    'aria-label': 'New Task'
  },
  button: {
    'aria-label': 'Add'
  }
};
