import type { FastifyInstance } from 'fastify';
import type { RouteContext } from '../../context';
import { requireAccount } from '../auth/authenticate';
import { bearerAuth, capsuleIdParams, errorResponse, unlockCodeQuery, validationErrorResponse } from '../../lib/schemas';
import { getCapsule, listCapsules } from './service';
import { CodeQuerySchema, IdParamsSchema, ListQuerySchema } from './types';

/**
 * Registers capsule read routes.
 *
 * Routes registered:
 * - GET /capsules - Page through the caller's own capsules with derived state
 * - GET /capsules/:id?code= - Read an unlockable capsule by its unlock code
 *
 * Query strings are stripped from request logs, so unlock codes are never logged.
 */
export default async function registerCapsuleGetRoutes(app: FastifyInstance, ctx: RouteContext) {
    app.get('/capsules', {
        schema: {
            summary: 'List own capsules',
            tags: ['Capsules'],
            security: bearerAuth,
            querystring: {
                type: 'object',
                properties: {
                    page: { type: 'integer', description: '1-indexed page, values below 1 read as 1' },
                    limit: { type: 'integer', description: 'Page size, clamped to 1-100' },
                },
            },
            response: {
                200: {
                    type: 'object',
                    properties: {
                        items: {
                            type: 'array',
                            items: {
                                type: 'object',
                                properties: {
                                    id: { type: 'integer' },
                                    unlockAt: { type: 'string' },
                                    createdAt: { type: 'string' },
                                    expiresAt: { type: 'string' },
                                    state: { type: 'string', enum: ['locked', 'unlockable', 'expired'] },
                                },
                            },
                        },
                        page: { type: 'integer' },
                        limit: { type: 'integer' },
                        total: { type: 'integer' },
                        totalPages: { type: 'integer' },
                    },
                },
                400: validationErrorResponse,
                401: errorResponse,
            },
        },
        preHandler: ctx.authenticate,
    }, async (req, reply) => {
        const parsed = ListQuerySchema.safeParse(req.query);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid query', details: parsed.error.flatten() });
        }
        return listCapsules(ctx, requireAccount(req), parsed.data.page, parsed.data.limit);
    });

    app.get('/capsules/:id', {
        schema: {
            summary: 'Read capsule',
            description: 'Returns the message once unlockAt has passed and until 30 days after. Ownership is not required; the unlock code is.',
            tags: ['Capsules'],
            security: bearerAuth,
            params: capsuleIdParams,
            querystring: unlockCodeQuery,
            response: {
                200: {
                    type: 'object',
                    properties: {
                        id: { type: 'integer' },
                        message: { type: 'string' },
                        unlockAt: { type: 'string' },
                        createdAt: { type: 'string' },
                        expiresAt: { type: 'string' },
                        ownerId: { type: 'integer' },
                    },
                },
                400: validationErrorResponse,
                401: errorResponse,
                403: { description: 'Wrong unlock code, or capsule still locked', ...errorResponse },
                404: { description: 'Capsule not found', ...errorResponse },
                410: { description: 'Capsule expired', ...errorResponse },
            },
        },
        preHandler: ctx.authenticate,
    }, async (req, reply) => {
        const params = IdParamsSchema.safeParse(req.params);
        const query = CodeQuerySchema.safeParse(req.query);
        if (!params.success) {
            return reply.status(400).send({ error: 'Invalid params', details: params.error.flatten() });
        }
        if (!query.success) {
            return reply.status(400).send({ error: 'Invalid query', details: query.error.flatten() });
        }
        return getCapsule(ctx, params.data.id, query.data.code);
    });
}
