export const ROLES = ["admin", "member"] as const;
export type Role = (typeof ROLES)[number];

export interface User {
  id: string;
  username: string;
  email: string;
  role: Role;
  enabled: boolean;
  created_at: string;
}

export interface CreateUserInput {
  username: string;
  email: string;
  role?: Role;
}

/** The authenticated caller of an API operation. */
export interface Principal {
  id: string;
  username: string;
  role: Role;
}
