import { and, count, desc, eq, inArray } from 'drizzle-orm';
import { randomInt } from 'node:crypto';
import { capsules, type Capsule } from '../../db/schema';
import type { Store } from '../../db';
import { config } from '../../config';

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Generates a random unlock code from `[A-Za-z0-9]` using a CSPRNG.
 */
export function generateUnlockCode(length: number = config.limits.unlockCodeLength): string {
    let code = '';
    for (let i = 0; i < length; i++) {
        code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
    }
    return code;
}

export interface InsertCapsuleInput {
    message: string;
    unlockAt: number;
    createdAt: number;
    userId: number;
}

function isUniqueViolation(error: unknown): boolean {
    return error instanceof Error
        && 'code' in error
        && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Persists a new capsule with a freshly generated unlock code.
 *
 * A code collision trips the unique index; the insert is retried with a new
 * code a bounded number of times before giving up.
 */
export function insertCapsule(
    store: Store,
    input: InsertCapsuleInput,
    nextCode: () => string = generateUnlockCode,
): Capsule {
    let lastError: unknown;
    for (let attempt = 0; attempt < config.limits.unlockCodeAttempts; attempt++) {
        try {
            return store.insert(capsules).values({
                message: input.message,
                unlockAt: input.unlockAt,
                createdAt: input.createdAt,
                unlockCode: nextCode(),
                expired: false,
                userId: input.userId,
            }).returning().get();
        } catch (error) {
            if (!isUniqueViolation(error)) throw error;
            lastError = error;
        }
    }
    throw new Error('Failed to generate a unique unlock code', { cause: lastError });
}

export function findCapsuleById(store: Store, id: number): Capsule | null {
    return store.select().from(capsules).where(eq(capsules.id, id)).get() ?? null;
}

export interface CapsulePage {
    items: Capsule[];
    total: number;
}

/**
 * Lists an owner's capsules, newest first. `page` is 1-indexed.
 */
export function listCapsulesByOwner(store: Store, ownerId: number, page: number, limit: number): CapsulePage {
    const items = store.select()
        .from(capsules)
        .where(eq(capsules.userId, ownerId))
        .orderBy(desc(capsules.createdAt), desc(capsules.id))
        .limit(limit)
        .offset((page - 1) * limit)
        .all();

    const totals = store.select({ total: count() })
        .from(capsules)
        .where(eq(capsules.userId, ownerId))
        .get();

    return { items, total: totals?.total ?? 0 };
}

export function findUnexpiredCapsules(store: Store): Capsule[] {
    return store.select().from(capsules).where(eq(capsules.expired, false)).all();
}

export interface CapsuleRevision {
    message?: string;
    unlockAt?: number;
}

export function updateCapsuleFields(store: Store, id: number, revision: CapsuleRevision): Capsule | null {
    const values: CapsuleRevision = {};
    if (revision.message !== undefined) values.message = revision.message;
    if (revision.unlockAt !== undefined) values.unlockAt = revision.unlockAt;
    if (Object.keys(values).length === 0) return findCapsuleById(store, id);

    return store.update(capsules).set(values).where(eq(capsules.id, id)).returning().get() ?? null;
}

/**
 * Permanently deletes a capsule.
 *
 * @returns True if a row was removed
 */
export function deleteCapsuleById(store: Store, id: number): boolean {
    const result = store.delete(capsules).where(eq(capsules.id, id)).run();
    return result.changes > 0;
}

/**
 * Sets the terminal `expired` flag on the given capsules.
 *
 * Rows already flagged are left alone, so repeated or concurrent calls for the
 * same ids are harmless.
 *
 * @returns Number of rows that flipped from unexpired to expired
 */
export function markExpired(store: Store, ids: Iterable<number>): number {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return 0;

    const result = store.update(capsules)
        .set({ expired: true })
        .where(and(inArray(capsules.id, unique), eq(capsules.expired, false)))
        .run();
    return result.changes;
}
