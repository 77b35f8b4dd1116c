export const STATUSES = ["New", "InProgress", "Completed"] as const;
export type Status = (typeof STATUSES)[number];

export const VALID_STATUSES = new Set<string>(STATUSES);

export function isStatus(value: string): value is Status {
  return VALID_STATUSES.has(value);
}

export interface Task {
  id: string;
  title: string;
  description: string;
  assignee: string;
  status: Status;
  deadline: string;
  created_by: string;
  created_at: string;
  updated_at: string;
  deadline_alerted_at: string | null;
}

export interface CreateTaskInput {
  title: string;
  description?: string;
  assignee: string;
  deadline: string;
}

export interface UpdateTaskInput {
  title?: string;
  description?: string;
  assignee?: string;
  status?: Status;
  deadline?: string;
}

export interface TaskFilter {
  status?: Status;
  assignee?: string;
}
