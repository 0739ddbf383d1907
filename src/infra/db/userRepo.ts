import pg from 'pg';
import { getPool } from './pool.js';
import type { NewUser, User } from '../../domain/users/user.js';
import type { Page, UserRepository } from '../../application/users/ports.js';
import { ConflictError } from '../../application/errors.js';

const UNIQUE_VIOLATION = '23505';

interface UserRow {
  id: number;
  name: string;
  email: string;
  created_at: Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    createdAt: row.created_at,
  };
}

export class PgUserRepo implements UserRepository {
  async list(page: Page): Promise<User[]> {
    const result = await getPool().query<UserRow>(
      'SELECT id, name, email, created_at FROM users ORDER BY id LIMIT $1 OFFSET $2',
      [page.limit, page.offset]
    );
    return result.rows.map(toUser);
  }

  async findById(id: number): Promise<User | null> {
    const result = await getPool().query<UserRow>(
      'SELECT id, name, email, created_at FROM users WHERE id = $1',
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await getPool().query<UserRow>(
      'SELECT id, name, email, created_at FROM users WHERE email = $1',
      [email]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await getPool().query<UserRow>(
        `INSERT INTO users (name, email)
         VALUES ($1, $2)
         RETURNING id, name, email, created_at`,
        [user.name, user.email]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      // Lost a race with a concurrent insert of the same email
      if (error instanceof pg.DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new ConflictError('User with this email already exists');
      }
      throw error;
    }
  }
}
