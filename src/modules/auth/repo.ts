import { eq } from 'drizzle-orm';
import { users, type User } from '../../db/schema';
import type { Store } from '../../db';

export interface InsertUserInput {
    username: string;
    email: string;
    passwordHash: string;
    createdAt: number;
}

export function insertUser(store: Store, input: InsertUserInput): User {
    return store.insert(users).values(input).returning().get();
}

export function findUserByUsername(store: Store, username: string): User | null {
    return store.select().from(users).where(eq(users.username, username)).get() ?? null;
}

export function findUserByEmail(store: Store, email: string): User | null {
    return store.select().from(users).where(eq(users.email, email)).get() ?? null;
}
