/**
 * User Repository
 */

import { eq, asc } from 'drizzle-orm';
import { randomUUID } from 'node:crypto';
import { createChildLogger, DatabaseError, type User, type UserRole } from '@remedyops/shared';
import { getDatabase } from '../connection.js';
import { users, type UserRow } from '../schema.js';

const logger = createChildLogger({ component: 'UserRepository' });

export interface CreateUserInput {
  name: string;
  role: UserRole;
  finalAuthority?: boolean;
}

/**
 * One user per role; the cto holds final authority
 */
export const DEFAULT_USERS: readonly CreateUserInput[] = [
  { name: 'alice', role: 'junior_dev' },
  { name: 'bob', role: 'senior_dev' },
  { name: 'carol', role: 'tech_lead' },
  { name: 'dave', role: 'engineering_manager' },
  { name: 'erin', role: 'cto', finalAuthority: true },
];

export class UserRepository {
  async create(input: CreateUserInput): Promise<User> {
    const db = getDatabase();

    const [inserted] = await db
      .insert(users)
      .values({
        id: randomUUID(),
        name: input.name,
        role: input.role,
        finalAuthority: input.finalAuthority ?? false,
        createdAt: new Date(),
      })
      .returning();

    if (!inserted) {
      throw new DatabaseError(`Failed to create user ${input.name}`);
    }
    return this.mapToUser(inserted);
  }

  async getByName(name: string): Promise<User | null> {
    const db = getDatabase();
    const result = await db.select().from(users).where(eq(users.name, name)).limit(1);
    const row = result[0];
    return row ? this.mapToUser(row) : null;
  }

  async list(): Promise<User[]> {
    const db = getDatabase();
    const results = await db.select().from(users).orderBy(asc(users.name));
    return results.map((r) => this.mapToUser(r));
  }

  async getFinalAuthorities(): Promise<User[]> {
    const db = getDatabase();
    const results = await db.select().from(users).where(eq(users.finalAuthority, true));
    return results.map((r) => this.mapToUser(r));
  }

  /**
   * Insert the default roster when the table is empty
   */
  async seedDefaultUsers(): Promise<number> {
    const existing = await this.list();
    if (existing.length > 0) {
      return 0;
    }

    for (const user of DEFAULT_USERS) {
      await this.create(user);
    }
    logger.info({ count: DEFAULT_USERS.length }, 'Seeded default users');
    return DEFAULT_USERS.length;
  }

  private mapToUser(row: UserRow): User {
    return {
      id: row.id,
      name: row.name,
      role: row.role,
      finalAuthority: row.finalAuthority,
      createdAt: row.createdAt,
    };
  }
}

export const userRepository = new UserRepository();
