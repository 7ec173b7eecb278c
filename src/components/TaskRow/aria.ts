export const aria = {
  toggle: (text: string, completed: boolean) => ({
    'aria-label': text,
    role: 'checkbox',
    'aria-checked': completed,
    'aria-roledescription': 'Task',
    tabIndex: 0
  }),
  deleteButton: {
    'aria-label': 'Delete Task'
  }
};
