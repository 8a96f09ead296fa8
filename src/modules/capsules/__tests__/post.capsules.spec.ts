import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { bearer, buildTestApp, HOUR, T0, type TestApp, signUp } from '../../../__tests__/helpers';
import { findCapsuleById } from '../repo';

/**
 * Test suite for POST /capsules.
 */
describe('POST /capsules', () => {
    let t: TestApp;
    let token: string;

    beforeEach(async () => {
        t = await buildTestApp();
        token = await signUp(t.app, 'alice');
    });

    afterEach(async () => {
        await t.app.close();
    });

    it('seals a capsule and returns its unlock code once', async () => {
        const response = await t.app.inject({
            method: 'POST',
            url: '/capsules',
            headers: bearer(token),
            payload: { message: 'hello future', unlockAt: '2026-01-01T01:00:00' },
        });

        expect(response.statusCode).toBe(201);
        const body = response.json();
        expect(body.id).toBe(1);
        expect(body.unlockCode).toMatch(/^[A-Za-z0-9]{16}$/);
        expect(body.unlockAt).toBe('2026-01-01T01:00:00.000+05:30');

        const stored = findCapsuleById(t.db, body.id);
        expect(stored?.unlockAt).toBe(T0 + HOUR);
        expect(stored?.createdAt).toBe(T0);
        expect(stored?.expired).toBe(false);
        expect(stored?.unlockCode).toBe(body.unlockCode);
    });

    it('normalizes offset timestamps and epoch milliseconds to the same instant', async () => {
        const utc = await t.app.inject({
            method: 'POST',
            url: '/capsules',
            headers: bearer(token),
            payload: { message: 'a', unlockAt: '2025-12-31T19:30:00Z' },
        });
        const epoch = await t.app.inject({
            method: 'POST',
            url: '/capsules',
            headers: bearer(token),
            payload: { message: 'b', unlockAt: T0 + HOUR },
        });

        expect(utc.json().unlockAt).toBe('2026-01-01T01:00:00.000+05:30');
        expect(epoch.json().unlockAt).toBe('2026-01-01T01:00:00.000+05:30');
    });

    it('gives each capsule a distinct code', async () => {
        const payload = { message: 'x', unlockAt: T0 + HOUR };
        const first = await t.app.inject({ method: 'POST', url: '/capsules', headers: bearer(token), payload });
        const second = await t.app.inject({ method: 'POST', url: '/capsules', headers: bearer(token), payload });

        expect(first.json().unlockCode).not.toBe(second.json().unlockCode);
    });

    it('rejects an unlock time that is not in the future', async () => {
        for (const unlockAt of [T0, T0 - 1, '2025-12-31T23:00:00']) {
            const response = await t.app.inject({
                method: 'POST',
                url: '/capsules',
                headers: bearer(token),
                payload: { message: 'too late', unlockAt },
            });
            expect(response.statusCode).toBe(422);
            expect(response.json()).toEqual({ error: 'unlockAt must be in the future', code: 'UNLOCK_NOT_FUTURE' });
        }
        expect(findCapsuleById(t.db, 1)).toBeNull();
    });

    it('rejects unparseable timestamps', async () => {
        const response = await t.app.inject({
            method: 'POST',
            url: '/capsules',
            headers: bearer(token),
            payload: { message: 'hi', unlockAt: 'next tuesday' },
        });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('Invalid body');
    });

    it('rejects epochs a date cannot represent and stores nothing', async () => {
        const response = await t.app.inject({
            method: 'POST',
            url: '/capsules',
            headers: bearer(token),
            payload: { message: 'hi', unlockAt: 9e15 },
        });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('Invalid body');

        const list = await t.app.inject({ method: 'GET', url: '/capsules', headers: bearer(token) });
        expect(list.statusCode).toBe(200);
        expect(list.json().total).toBe(0);
    });

    it('rejects dates missing from the calendar', async () => {
        const response = await t.app.inject({
            method: 'POST',
            url: '/capsules',
            headers: bearer(token),
            payload: { message: 'hi', unlockAt: '2026-02-30T00:00:00' },
        });

        expect(response.statusCode).toBe(400);
        expect(response.json().error).toBe('Invalid body');
    });

    it('requires authentication', async () => {
        const response = await t.app.inject({
            method: 'POST',
            url: '/capsules',
            payload: { message: 'hi', unlockAt: T0 + HOUR },
        });

        expect(response.statusCode).toBe(401);
    });
});
