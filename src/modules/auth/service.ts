import bcrypt from 'bcryptjs';
import { config } from '../../config';
import type { Db } from '../../db';
import type { User } from '../../db/schema';
import { conflict, unauthenticated } from '../../lib/errors';
import type { Clock } from '../../lib/time';
import { findUserByEmail, findUserByUsername, insertUser } from './repo';
import type { LoginBody, LoginResponse, RegisterBody, TokenClaims, WhoamiResponse } from './types';

export interface AuthServiceDeps {
    db: Db;
    clock: Clock;
}

/** Signs access tokens; the JWT plugin supplies the implementation. */
export type SignToken = (claims: TokenClaims) => string;

export function hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, config.limits.bcryptRounds);
}

export function verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
}

let dummyHash: Promise<string> | null = null;

/** Hash compared against when the username is unknown, so both paths cost one bcrypt round. */
function getDummyHash(): Promise<string> {
    dummyHash ??= hashPassword('not-a-real-password');
    return dummyHash;
}

function isUniqueViolation(error: unknown, column: string): boolean {
    return error instanceof Error
        && 'code' in error
        && error.code === 'SQLITE_CONSTRAINT_UNIQUE'
        && error.message.includes(`users.${column}`);
}

/**
 * Registers a new account.
 *
 * The existence checks run inside the insert's transaction; the unique
 * indexes still back them up when two registrations race.
 */
export async function registerUser(deps: AuthServiceDeps, body: RegisterBody): Promise<void> {
    if (body.password !== body.confirmPassword) {
        throw conflict('PASSWORD_MISMATCH', 'Passwords do not match');
    }

    const passwordHash = await hashPassword(body.password);

    try {
        deps.db.transaction((tx) => {
            if (findUserByUsername(tx, body.username)) {
                throw conflict('USERNAME_TAKEN', 'Username already exists');
            }
            if (findUserByEmail(tx, body.email)) {
                throw conflict('EMAIL_TAKEN', 'Email already registered');
            }
            insertUser(tx, {
                username: body.username,
                email: body.email,
                passwordHash,
                createdAt: deps.clock.now(),
            });
        });
    } catch (error) {
        if (isUniqueViolation(error, 'username')) {
            throw conflict('USERNAME_TAKEN', 'Username already exists');
        }
        if (isUniqueViolation(error, 'email')) {
            throw conflict('EMAIL_TAKEN', 'Email already registered');
        }
        throw error;
    }
}

/**
 * Verifies credentials and issues an access token.
 */
export async function login(deps: AuthServiceDeps, body: LoginBody, sign: SignToken): Promise<LoginResponse> {
    const user = findUserByUsername(deps.db, body.username);
    const valid = await verifyPassword(body.password, user ? user.passwordHash : await getDummyHash());

    if (!user || !valid) {
        throw unauthenticated('INVALID_CREDENTIALS', 'Invalid username or password');
    }

    return {
        accessToken: sign({ sub: user.username }),
        tokenType: 'bearer',
    };
}

/**
 * Resolves the account a token's subject refers to.
 */
export function resolveUser(db: Db, claims: TokenClaims): User {
    const user = findUserByUsername(db, claims.sub);
    if (!user) {
        throw unauthenticated('USER_NOT_FOUND', 'User not found');
    }
    return user;
}

export function toWhoami(user: User): WhoamiResponse {
    return { username: user.username, email: user.email };
}
