import type { FastifyRequest } from 'fastify';
import type { Db } from '../../db';
import type { User } from '../../db/schema';
import { unauthenticated } from '../../lib/errors';
import { resolveUser } from './service';
import type { TokenClaims } from './types';

declare module '@fastify/jwt' {
    interface FastifyJWT {
        payload: TokenClaims;
        user: TokenClaims;
    }
}

declare module 'fastify' {
    interface FastifyRequest {
        /** Account resolved by the `authenticate` preHandler */
        account: User | null;
    }
}

/**
 * Returns the caller's account, failing if the route skipped `authenticate`.
 */
export function requireAccount(req: FastifyRequest): User {
    if (!req.account) {
        throw unauthenticated('INVALID_TOKEN', 'Authentication required');
    }
    return req.account;
}

/**
 * Builds a preHandler that verifies the bearer token and loads its account.
 */
export function makeAuthenticate(db: Db) {
    return async function authenticate(req: FastifyRequest) {
        let claims: TokenClaims;
        try {
            claims = await req.jwtVerify<TokenClaims>();
        } catch (error) {
            req.log.debug({ err: error }, 'Token verification failed');
            throw unauthenticated('INVALID_TOKEN', 'Invalid token');
        }
        if (typeof claims.sub !== 'string' || claims.sub.length === 0) {
            throw unauthenticated('INVALID_TOKEN', 'Invalid token');
        }
        req.account = resolveUser(db, claims);
    };
}
