import { timingSafeEqual } from 'node:crypto';
import { config } from '../../config';
import type { Db, Store } from '../../db';
import type { Capsule, User } from '../../db/schema';
import { forbidden, notFound, type AppError } from '../../lib/errors';
import { formatTimestamp, type Clock } from '../../lib/time';
import {
    assertFutureUnlock,
    deriveState,
    expiresAt,
    isStaleExpiry,
    mutationDecision,
    readDecision,
} from './lifecycle';
import {
    deleteCapsuleById,
    findCapsuleById,
    insertCapsule,
    listCapsulesByOwner,
    markExpired,
    updateCapsuleFields,
} from './repo';
import type {
    CapsuleDetail,
    CapsuleListResponse,
    CreateCapsuleBody,
    CreateCapsuleResponse,
    DeleteCapsuleResponse,
    UpdateCapsuleBody,
    UpdateCapsuleResponse,
} from './types';

export interface CapsuleServiceDeps {
    db: Db;
    clock: Clock;
}

/**
 * Outcome of a transactional step: either a value to return, or an error to
 * raise once the transaction has committed. Raising inside the transaction
 * would roll back the lazy expiry write that must persist.
 */
type Outcome<T> = { ok: true; value: T } | { ok: false; error: AppError };

function settle<T>(outcome: Outcome<T>): T {
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
}

function clamp(value: number, min: number, max: number) {
    return Math.max(min, Math.min(max, value));
}

/**
 * Exact, case-sensitive comparison that does not short-circuit on the first
 * differing character.
 */
export function unlockCodeMatches(expected: string, supplied: string): boolean {
    const a = Buffer.from(expected, 'utf8');
    const b = Buffer.from(supplied, 'utf8');
    if (a.length !== b.length) return false;
    return timingSafeEqual(a, b);
}

/** Loads a capsule and applies the ownership and possession gates. */
function loadGuarded(store: Store, id: number, code: string, owner?: User): Capsule {
    const capsule = findCapsuleById(store, id);
    if (!capsule) {
        throw notFound('CAPSULE_NOT_FOUND', 'Capsule not found');
    }
    if (owner && capsule.userId !== owner.id) {
        throw forbidden('NOT_OWNER', 'You do not own this capsule');
    }
    if (!unlockCodeMatches(capsule.unlockCode, code)) {
        throw forbidden('CODE_MISMATCH', 'Invalid unlock code');
    }
    return capsule;
}

/**
 * Creates a capsule owned by `user`. The capsule always starts locked.
 */
export function createCapsule(deps: CapsuleServiceDeps, user: User, body: CreateCapsuleBody): CreateCapsuleResponse {
    const now = deps.clock.now();
    assertFutureUnlock(body.unlockAt, now);

    const capsule = deps.db.transaction((tx) => insertCapsule(tx, {
        message: body.message,
        unlockAt: body.unlockAt,
        createdAt: now,
        userId: user.id,
    }));

    return {
        id: capsule.id,
        unlockCode: capsule.unlockCode,
        unlockAt: formatTimestamp(capsule.unlockAt),
    };
}

/**
 * Lists the caller's capsules with their derived state. Stale expiry flags
 * found on the page are reconciled in the same transaction.
 */
export function listCapsules(deps: CapsuleServiceDeps, user: User, page: number, limit: number): CapsuleListResponse {
    const now = deps.clock.now();
    const safeLimit = clamp(Math.trunc(limit), 1, config.limits.pageLimitMax);
    // OFFSET is (page - 1) * limit and must stay a safe integer
    const maxPage = Math.floor(Number.MAX_SAFE_INTEGER / safeLimit) + 1;
    const safePage = clamp(Math.trunc(page), 1, maxPage);

    const { items, total } = deps.db.transaction((tx) => {
        const result = listCapsulesByOwner(tx, user.id, safePage, safeLimit);
        markExpired(tx, result.items.filter((c) => isStaleExpiry(c, now)).map((c) => c.id));
        return result;
    });

    return {
        items: items.map((capsule) => ({
            id: capsule.id,
            unlockAt: formatTimestamp(capsule.unlockAt),
            createdAt: formatTimestamp(capsule.createdAt),
            expiresAt: formatTimestamp(expiresAt(capsule.unlockAt)),
            state: deriveState(capsule, now),
        })),
        page: safePage,
        limit: safeLimit,
        total,
        totalPages: Math.ceil(total / safeLimit),
    };
}

/**
 * Reads a capsule's content. Requires the unlock code but not ownership.
 */
export function getCapsule(deps: CapsuleServiceDeps, id: number, code: string): CapsuleDetail {
    const now = deps.clock.now();

    const outcome = deps.db.transaction((tx): Outcome<Capsule> => {
        const capsule = loadGuarded(tx, id, code);
        const state = deriveState(capsule, now);
        if (isStaleExpiry(capsule, now)) {
            markExpired(tx, [capsule.id]);
        }
        const denied = readDecision(state);
        return denied ? { ok: false, error: denied } : { ok: true, value: capsule };
    });
    const capsule = settle(outcome);

    return {
        id: capsule.id,
        message: capsule.message,
        unlockAt: formatTimestamp(capsule.unlockAt),
        createdAt: formatTimestamp(capsule.createdAt),
        expiresAt: formatTimestamp(expiresAt(capsule.unlockAt)),
        ownerId: capsule.userId,
    };
}

/**
 * Revises a locked capsule's message and/or unlock time. Requires both
 * ownership and the unlock code.
 */
export function updateCapsule(
    deps: CapsuleServiceDeps,
    user: User,
    id: number,
    code: string,
    body: UpdateCapsuleBody,
): UpdateCapsuleResponse {
    const now = deps.clock.now();

    const outcome = deps.db.transaction((tx): Outcome<Capsule> => {
        const capsule = loadGuarded(tx, id, code, user);
        if (isStaleExpiry(capsule, now)) {
            markExpired(tx, [capsule.id]);
        }
        const denied = mutationDecision(deriveState(capsule, now));
        if (denied) return { ok: false, error: denied };

        if (body.unlockAt !== undefined) {
            assertFutureUnlock(body.unlockAt, now);
        }
        const updated = updateCapsuleFields(tx, capsule.id, body);
        if (!updated) {
            return { ok: false, error: notFound('CAPSULE_NOT_FOUND', 'Capsule not found') };
        }
        return { ok: true, value: updated };
    });
    const capsule = settle(outcome);

    return {
        id: capsule.id,
        message: capsule.message,
        unlockAt: formatTimestamp(capsule.unlockAt),
    };
}

/**
 * Deletes a locked capsule. Requires both ownership and the unlock code.
 */
export function deleteCapsule(deps: CapsuleServiceDeps, user: User, id: number, code: string): DeleteCapsuleResponse {
    const now = deps.clock.now();

    const outcome = deps.db.transaction((tx): Outcome<true> => {
        const capsule = loadGuarded(tx, id, code, user);
        if (isStaleExpiry(capsule, now)) {
            markExpired(tx, [capsule.id]);
        }
        const denied = mutationDecision(deriveState(capsule, now));
        if (denied) return { ok: false, error: denied };

        if (!deleteCapsuleById(tx, capsule.id)) {
            return { ok: false, error: notFound('CAPSULE_NOT_FOUND', 'Capsule not found') };
        }
        return { ok: true, value: true };
    });
    settle(outcome);

    return { success: true, message: 'Capsule permanently deleted' };
}
