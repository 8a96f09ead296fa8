import type { FastifyRequest } from 'fastify';
import type { Db } from './db';
import type { Clock } from './lib/time';

/**
 * Collaborators handed to every route module. Nothing reaches the database
 * except through the handle passed here.
 */
export interface RouteContext {
    db: Db;
    clock: Clock;
    authenticate: (req: FastifyRequest) => Promise<void>;
}
