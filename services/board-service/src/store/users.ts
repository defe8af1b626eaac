import type { Kysely } from 'kysely';
import type { Database } from './db';

export interface User {
  id: number;
  email: string;
  passwordHash: string;
  createdAt: Date;
}

export interface UserRepository {
  createUser(email: string, passwordHash: string): Promise<number>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
}

export class EmailTakenError extends Error {
  constructor(readonly email: string) {
    super(`email ${email} is already registered`);
    this.name = 'EmailTakenError';
  }
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;
}

type UserRow = { id: number; email: string; password_hash: string; created_at: Date };

function toUser(row: UserRow): User {
  return { id: row.id, email: row.email, passwordHash: row.password_hash, createdAt: row.created_at };
}

export class PgUserStore implements UserRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async createUser(email: string, passwordHash: string): Promise<number> {
    try {
      const { id } = await this.db
        .insertInto('users')
        .values({ email, password_hash: passwordHash })
        .returning('id')
        .executeTakeFirstOrThrow();
      return id;
    } catch (error) {
      if (isUniqueViolation(error)) throw new EmailTakenError(email);
      throw error;
    }
  }

  async findByEmail(email: string): Promise<User | null> {
    const row = await this.db
      .selectFrom('users')
      .select(['id', 'email', 'password_hash', 'created_at'])
      .where('email', '=', email)
      .executeTakeFirst();
    return row ? toUser(row) : null;
  }

  async findById(id: number): Promise<User | null> {
    const row = await this.db
      .selectFrom('users')
      .select(['id', 'email', 'password_hash', 'created_at'])
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toUser(row) : null;
  }
}
