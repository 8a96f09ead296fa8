import type { FastifyInstance } from 'fastify';
import type { RouteContext } from '../../context';
import { requireAccount } from '../auth/authenticate';
import { bearerAuth, errorResponse, validationErrorResponse } from '../../lib/schemas';
import { createCapsule } from './service';
import { CreateBodySchema } from './types';

/**
 * Registers the POST /capsules route for sealing a new capsule.
 *
 * The response carries the unlock code; it is never returned again, so the
 * caller has to keep it to read, change or delete the capsule later.
 */
export default async function registerCapsulePostRoute(app: FastifyInstance, ctx: RouteContext) {
    app.post('/capsules', {
        schema: {
            summary: 'Create capsule',
            description: 'Seal a message until unlockAt. Timestamps without an offset are read as +05:30.',
            tags: ['Capsules'],
            security: bearerAuth,
            body: {
                type: 'object',
                properties: {
                    message: { type: 'string', minLength: 1, maxLength: 10_000 },
                    unlockAt: { description: 'ISO-8601 timestamp or epoch ms, strictly in the future' },
                },
            },
            response: {
                201: {
                    description: 'Capsule created',
                    type: 'object',
                    properties: {
                        id: { type: 'integer' },
                        unlockCode: { type: 'string', description: 'Proof of possession, shown only once' },
                        unlockAt: { type: 'string' },
                    },
                },
                400: validationErrorResponse,
                401: errorResponse,
                422: { description: 'unlockAt is not in the future', ...errorResponse },
            },
        },
        config: {
            rateLimit: { max: 30, timeWindow: '1 minute' },
        },
        preHandler: ctx.authenticate,
    }, async (req, reply) => {
        const parsed = CreateBodySchema.safeParse(req.body);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid body', details: parsed.error.flatten() });
        }
        const result = createCapsule(ctx, requireAccount(req), parsed.data);
        return reply.status(201).send(result);
    });
}
