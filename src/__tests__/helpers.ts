import type { FastifyInstance } from 'fastify';
import { createDb, type Db } from '../db';
import type { Clock } from '../lib/time';
import { buildServer } from '../server';

/** 2026-01-01 00:00 IST */
export const T0 = Date.parse('2026-01-01T00:00:00.000+05:30');
export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

/** Clock that only moves when told to. */
export class TestClock implements Clock {
    constructor(public current: number = T0) { }

    now(): number {
        return this.current;
    }

    set(ms: number): void {
        this.current = ms;
    }

    advance(ms: number): void {
        this.current += ms;
    }
}

export interface TestApp {
    app: FastifyInstance;
    db: Db;
    clock: TestClock;
}

/**
 * Builds a server on a private in-memory database with a controllable clock.
 */
export async function buildTestApp(clock: TestClock = new TestClock()): Promise<TestApp> {
    const handle = createDb(':memory:');
    const app = await buildServer({ db: handle.db, clock });
    app.addHook('onClose', async () => handle.close());
    app.log.level = 'silent';
    return { app, db: handle.db, clock };
}

/**
 * Registers an account and returns a bearer token for it.
 */
export async function signUp(app: FastifyInstance, username: string): Promise<string> {
    const password = 'correct-horse';
    const register = await app.inject({
        method: 'POST',
        url: '/auth/register',
        payload: { username, email: `${username}@example.com`, password, confirmPassword: password },
    });
    if (register.statusCode !== 201) {
        throw new Error(`register failed: ${register.statusCode} ${register.body}`);
    }
    const login = await app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { username, password },
    });
    return login.json<{ accessToken: string }>().accessToken;
}

export function bearer(token: string) {
    return { authorization: `Bearer ${token}` };
}

export interface CreatedCapsule {
    id: number;
    unlockCode: string;
    unlockAt: string;
}

export async function createCapsule(
    app: FastifyInstance,
    token: string,
    payload: { message: string; unlockAt: string | number },
): Promise<CreatedCapsule> {
    const response = await app.inject({
        method: 'POST',
        url: '/capsules',
        headers: bearer(token),
        payload,
    });
    if (response.statusCode !== 201) {
        throw new Error(`create failed: ${response.statusCode} ${response.body}`);
    }
    return response.json<CreatedCapsule>();
}
