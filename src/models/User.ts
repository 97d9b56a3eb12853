export type UserRole = 'staff' | 'admin';
export type UserStatus = 'active' | 'inactive';

export interface User {
  id: string;
  name: string;
  phone: string;
  department: string;
  role: UserRole;
  status: UserStatus;
  createdAt: number;
  updatedAt: number;
}

export type ImportUser = Omit<User, 'createdAt' | 'updatedAt'>;
