import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDb, type DbHandle } from '../../../db';
import { insertUser } from '../../auth/repo';
import { RETENTION_MS } from '../lifecycle';
import { findCapsuleById, insertCapsule } from '../repo';
import { ExpirationSweeper } from '../sweeper';
import { DAY, HOUR, T0, TestClock } from '../../../__tests__/helpers';

function makeLogger() {
    return { info: vi.fn(), error: vi.fn() };
}

describe('ExpirationSweeper', () => {
    let handle: DbHandle;
    let clock: TestClock;
    let ids: { stale: number; open: number; locked: number };

    beforeEach(() => {
        handle = createDb(':memory:');
        clock = new TestClock(T0);
        const user = insertUser(handle.db, { username: 'sweep', email: 'sweep@example.com', passwordHash: 'x', createdAt: T0 });
        const add = (unlockAt: number) => insertCapsule(handle.db, {
            message: 'm',
            unlockAt,
            createdAt: unlockAt - DAY,
            userId: user.id,
        }).id;
        ids = {
            stale: add(T0 - RETENTION_MS - DAY),
            open: add(T0 - DAY),
            locked: add(T0 + HOUR),
        };
    });

    afterEach(() => {
        vi.useRealTimers();
        handle.close();
    });

    it('flags every capsule past its retention window in one pass', async () => {
        const logger = makeLogger();
        const sweeper = new ExpirationSweeper(handle.db, clock, 60_000, logger);

        const result = await sweeper.runOnce();

        expect(result).toEqual({ scanned: 3, expired: 1, failed: 0 });
        expect(findCapsuleById(handle.db, ids.stale)?.expired).toBe(true);
        expect(findCapsuleById(handle.db, ids.open)?.expired).toBe(false);
        expect(findCapsuleById(handle.db, ids.locked)?.expired).toBe(false);
        expect(logger.info).toHaveBeenCalledWith({ scanned: 3, expired: 1, failed: 0 }, 'Expiration sweep complete');
    });

    it('runs standalone with its default interval and logger', async () => {
        const sweeper = new ExpirationSweeper(handle.db, clock);

        await expect(sweeper.runOnce()).resolves.toEqual({ scanned: 3, expired: 1, failed: 0 });
    });

    it('picks up capsules that expire later', async () => {
        const sweeper = new ExpirationSweeper(handle.db, clock, 60_000, makeLogger());
        await sweeper.runOnce();

        clock.set(T0 - DAY + RETENTION_MS);
        const result = await sweeper.runOnce();

        expect(result).toEqual({ scanned: 2, expired: 1, failed: 0 });
        expect(findCapsuleById(handle.db, ids.open)?.expired).toBe(true);
        expect(findCapsuleById(handle.db, ids.locked)?.expired).toBe(false);
    });

    it('tolerates two cycles racing over the same capsule', async () => {
        const first = new ExpirationSweeper(handle.db, clock, 60_000, makeLogger());
        const secondLogger = makeLogger();
        const second = new ExpirationSweeper(handle.db, clock, 60_000, secondLogger);

        const results = await Promise.all([first.runOnce(), second.runOnce()]);

        expect(results[0].expired + results[1].expired).toBe(1);
        expect(secondLogger.error).not.toHaveBeenCalled();
        expect(findCapsuleById(handle.db, ids.stale)?.expired).toBe(true);
    });

    it('logs a failed cycle and keeps working on the next one', async () => {
        const logger = makeLogger();
        let calls = 0;
        const flakyClock = {
            now: () => {
                calls++;
                if (calls === 1) throw new Error('clock unavailable');
                return T0;
            },
        };
        const sweeper = new ExpirationSweeper(handle.db, flakyClock, 60_000, logger);

        await expect(sweeper.runOnce()).resolves.toEqual({ scanned: 0, expired: 0, failed: 0 });
        expect(logger.error).toHaveBeenCalledTimes(1);
        expect(logger.error.mock.calls[0][1]).toBe('Expiration sweep failed');

        await expect(sweeper.runOnce()).resolves.toEqual({ scanned: 3, expired: 1, failed: 0 });
    });

    it('runs on its interval between start and stop', async () => {
        vi.useFakeTimers();
        const sweeper = new ExpirationSweeper(handle.db, clock, 1000, makeLogger());

        sweeper.start();
        sweeper.start();
        expect(sweeper.started).toBe(true);
        expect(findCapsuleById(handle.db, ids.stale)?.expired).toBe(false);

        await vi.advanceTimersByTimeAsync(1000);
        expect(findCapsuleById(handle.db, ids.stale)?.expired).toBe(true);

        sweeper.stop();
        expect(sweeper.started).toBe(false);

        clock.set(T0 - DAY + RETENTION_MS);
        await vi.advanceTimersByTimeAsync(5000);
        expect(findCapsuleById(handle.db, ids.open)?.expired).toBe(false);
    });
});
