/**
 * A row of the users table. id and createdAt are assigned by the database.
 */
export interface User {
  readonly id: number;
  readonly name: string;
  readonly email: string;
  readonly createdAt: Date;
}

export interface NewUser {
  name: string;
  email: string;
}
