import { config } from '../../config';
import { forbidden, gone, invalidState, type AppError } from '../../lib/errors';

export type CapsuleState = 'locked' | 'unlockable' | 'expired';

/** Readable window after `unlockAt`, measured from the unlock moment. */
export const RETENTION_MS = config.limits.retentionMs;

export interface LifecycleFields {
    unlockAt: number;
    expired: boolean;
}

export function expiresAt(unlockAt: number): number {
    return unlockAt + RETENTION_MS;
}

/**
 * Derives the lifecycle state at `now`.
 *
 * The unlock instant is already unlockable and the expiry instant is already
 * expired, so the readable window is `[unlockAt, unlockAt + RETENTION_MS)`.
 * A set `expired` flag wins regardless of timestamps.
 */
export function deriveState(capsule: LifecycleFields, now: number): CapsuleState {
    if (capsule.expired) return 'expired';
    if (now < capsule.unlockAt) return 'locked';
    if (now >= expiresAt(capsule.unlockAt)) return 'expired';
    return 'unlockable';
}

/** True when the timestamps say expired but the stored flag has not caught up. */
export function isStaleExpiry(capsule: LifecycleFields, now: number): boolean {
    return !capsule.expired && deriveState(capsule, now) === 'expired';
}

export function assertFutureUnlock(unlockAt: number, now: number): void {
    if (unlockAt <= now) {
        throw invalidState('UNLOCK_NOT_FUTURE', 'unlockAt must be in the future');
    }
}

/** Reads are allowed only while unlockable. */
export function readDecision(state: CapsuleState): AppError | null {
    switch (state) {
        case 'unlockable':
            return null;
        case 'locked':
            return forbidden('CAPSULE_LOCKED', 'Capsule is still locked');
        case 'expired':
            return gone('CAPSULE_EXPIRED', 'Capsule has expired and is no longer accessible');
    }
}

/** Updates and deletes are allowed only while locked. */
export function mutationDecision(state: CapsuleState): AppError | null {
    if (state === 'locked') return null;
    return forbidden('ALREADY_UNLOCKED', 'Capsule has already been unlocked and can no longer be changed');
}
