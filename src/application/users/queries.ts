import type { User } from '../../domain/users/user.js';
import type { Page, UserRepository } from './ports.js';
import { NotFoundError } from '../errors.js';

export class UserQueries {
  constructor(private userRepo: UserRepository) {}

  async list(page: Page): Promise<User[]> {
    return this.userRepo.list(page);
  }

  async getById(id: number): Promise<User> {
    const user = await this.userRepo.findById(id);
    if (!user) {
      throw new NotFoundError(`User ${id} not found`);
    }
    return user;
  }
}
