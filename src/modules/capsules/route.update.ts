import type { FastifyInstance } from 'fastify';
import type { RouteContext } from '../../context';
import { requireAccount } from '../auth/authenticate';
import { bearerAuth, capsuleIdParams, errorResponse, unlockCodeQuery, validationErrorResponse } from '../../lib/schemas';
import { deleteCapsule, updateCapsule } from './service';
import { CodeQuerySchema, IdParamsSchema, UpdateBodySchema } from './types';

/**
 * Registers capsule mutation routes. Both require the caller to own the
 * capsule and to present its unlock code, and both only work while locked.
 *
 * Routes registered:
 * - PATCH /capsules/:id?code= - Revise message and/or unlockAt
 * - DELETE /capsules/:id?code= - Permanently delete
 */
export default async function registerCapsuleUpdateRoutes(app: FastifyInstance, ctx: RouteContext) {
    app.patch('/capsules/:id', {
        schema: {
            summary: 'Update capsule',
            tags: ['Capsules'],
            security: bearerAuth,
            params: capsuleIdParams,
            querystring: unlockCodeQuery,
            body: {
                type: 'object',
                properties: {
                    message: { type: 'string', minLength: 1, maxLength: 10_000 },
                    unlockAt: { description: 'New unlock time, strictly in the future' },
                },
            },
            response: {
                200: {
                    type: 'object',
                    properties: {
                        id: { type: 'integer' },
                        message: { type: 'string' },
                        unlockAt: { type: 'string' },
                    },
                },
                400: validationErrorResponse,
                401: errorResponse,
                403: { description: 'Not the owner, wrong unlock code, or already unlocked', ...errorResponse },
                404: { description: 'Capsule not found', ...errorResponse },
                422: { description: 'New unlockAt is not in the future', ...errorResponse },
            },
        },
        preHandler: ctx.authenticate,
    }, async (req, reply) => {
        const params = IdParamsSchema.safeParse(req.params);
        const query = CodeQuerySchema.safeParse(req.query);
        const body = UpdateBodySchema.safeParse(req.body);
        if (!params.success) {
            return reply.status(400).send({ error: 'Invalid params', details: params.error.flatten() });
        }
        if (!query.success) {
            return reply.status(400).send({ error: 'Invalid query', details: query.error.flatten() });
        }
        if (!body.success) {
            return reply.status(400).send({ error: 'Invalid body', details: body.error.flatten() });
        }
        return updateCapsule(ctx, requireAccount(req), params.data.id, query.data.code, body.data);
    });

    app.delete('/capsules/:id', {
        schema: {
            summary: 'Delete capsule',
            tags: ['Capsules'],
            security: bearerAuth,
            params: capsuleIdParams,
            querystring: unlockCodeQuery,
            response: {
                200: {
                    type: 'object',
                    properties: {
                        success: { type: 'boolean' },
                        message: { type: 'string' },
                    },
                },
                400: validationErrorResponse,
                401: errorResponse,
                403: { description: 'Not the owner, wrong unlock code, or already unlocked', ...errorResponse },
                404: { description: 'Capsule not found', ...errorResponse },
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
        return deleteCapsule(ctx, requireAccount(req), params.data.id, query.data.code);
    });
}
