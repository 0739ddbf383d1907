import type { User } from '../../domain/users/user.js';
import type { UserRepository } from './ports.js';
import { ConflictError } from '../errors.js';

export interface CreateUserCommand {
  name: string;
  email: string;
}

export class CreateUserUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(command: CreateUserCommand): Promise<User> {
    const existing = await this.userRepo.findByEmail(command.email);
    if (existing) {
      throw new ConflictError('User with this email already exists');
    }

    return this.userRepo.create({ name: command.name, email: command.email });
  }
}
