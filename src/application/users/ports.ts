import type { NewUser, User } from '../../domain/users/user.js';

export interface Page {
  limit: number;
  offset: number;
}

export interface UserRepository {
  list(page: Page): Promise<User[]>;
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  create(user: NewUser): Promise<User>;
}
