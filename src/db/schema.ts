import { index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * Database schema for users and their capsules.
 *
 * All timestamps are stored as epoch milliseconds; conversion to and from the
 * canonical offset happens in `src/lib/time.ts` only.
 */
export const users = sqliteTable('users', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    username: text('username').notNull().unique(),
    email: text('email').notNull().unique(),
    passwordHash: text('passwordHash').notNull(),
    createdAt: integer('createdAt', { mode: 'number' }).notNull(),
});

export const capsules = sqliteTable('capsules', {
    id: integer('id').primaryKey({ autoIncrement: true }),
    message: text('message').notNull(),
    unlockAt: integer('unlockAt', { mode: 'number' }).notNull(),
    createdAt: integer('createdAt', { mode: 'number' }).notNull(),
    /** Proof-of-possession token, issued once at creation */
    unlockCode: text('unlockCode').notNull().unique(),
    /** Terminal flag, only ever flips false → true */
    expired: integer('expired', { mode: 'boolean' }).notNull().default(false),
    userId: integer('userId').notNull().references(() => users.id),
}, (table) => ({
    userIdx: index('idx_capsules_userId').on(table.userId),
    expiredIdx: index('idx_capsules_expired').on(table.expired),
}));

export type User = typeof users.$inferSelect;
export type Capsule = typeof capsules.$inferSelect;
