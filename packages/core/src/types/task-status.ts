export const TaskStatus = {
  Incomplete: 'incomplete',
  Complete: 'complete',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];
