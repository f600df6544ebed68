export type UserRole = 'user' | 'admin';

export interface AuthUser {
  userId: string;
  email?: string;
  role: UserRole;
}
