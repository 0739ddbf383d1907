import type { NewUser, User } from '../../../domain/users/user.js';
import type { Page, UserRepository } from '../ports.js';
import { ConflictError } from '../../errors.js';

/**
 * Stand-in for PgUserRepo: ids count up from 1 and emails are unique,
 * as the users table enforces.
 */
export class InMemoryUserRepo implements UserRepository {
  private users: User[] = [];
  private nextId = 1;

  constructor(private now: () => Date = () => new Date()) {}

  async list(page: Page): Promise<User[]> {
    return this.users.slice(page.offset, page.offset + page.limit);
  }

  async findById(id: number): Promise<User | null> {
    return this.users.find((u) => u.id === id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.users.find((u) => u.email === email) ?? null;
  }

  async create(user: NewUser): Promise<User> {
    if (this.users.some((u) => u.email === user.email)) {
      throw new ConflictError('User with this email already exists');
    }
    const created: User = {
      id: this.nextId++,
      name: user.name,
      email: user.email,
      createdAt: this.now(),
    };
    this.users.push(created);
    return created;
  }
}
