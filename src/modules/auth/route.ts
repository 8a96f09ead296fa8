import type { FastifyInstance } from 'fastify';
import type { RouteContext } from '../../context';
import { bearerAuth, errorResponse, validationErrorResponse } from '../../lib/schemas';
import { requireAccount } from './authenticate';
import { login, registerUser, toWhoami } from './service';
import { LoginBodySchema, RegisterBodySchema } from './types';

/**
 * Registers account routes.
 *
 * Routes registered:
 * - POST /auth/register - Create an account
 * - POST /auth/login - Exchange credentials for a 30 minute bearer token
 * - GET /auth/me - Describe the token's account
 */
export default async function registerAuthRoutes(app: FastifyInstance, ctx: RouteContext) {
    app.post('/auth/register', {
        schema: {
            summary: 'Register account',
            tags: ['Auth'],
            body: {
                type: 'object',
                properties: {
                    username: { type: 'string', minLength: 3, maxLength: 50 },
                    email: { type: 'string', maxLength: 254 },
                    password: { type: 'string', minLength: 8, maxLength: 128 },
                    confirmPassword: { type: 'string', maxLength: 128 },
                },
            },
            response: {
                201: {
                    description: 'Account created',
                    type: 'object',
                    properties: {
                        message: { type: 'string' },
                    },
                },
                400: validationErrorResponse,
                409: { description: 'Username or email taken, or passwords differ', ...errorResponse },
            },
        },
        config: {
            rateLimit: { max: 10, timeWindow: '1 minute' },
        },
    }, async (req, reply) => {
        const parsed = RegisterBodySchema.safeParse(req.body);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid body', details: parsed.error.flatten() });
        }
        await registerUser(ctx, parsed.data);
        return reply.status(201).send({ message: 'User registered successfully' });
    });

    app.post('/auth/login', {
        schema: {
            summary: 'Log in',
            description: 'Exchange username and password for a bearer token valid for 30 minutes.',
            tags: ['Auth'],
            body: {
                type: 'object',
                properties: {
                    username: { type: 'string' },
                    password: { type: 'string' },
                },
            },
            response: {
                200: {
                    description: 'Token issued',
                    type: 'object',
                    properties: {
                        accessToken: { type: 'string' },
                        tokenType: { type: 'string' },
                    },
                },
                400: validationErrorResponse,
                401: { description: 'Invalid username or password', ...errorResponse },
            },
        },
        config: {
            rateLimit: { max: 10, timeWindow: '1 minute' },
        },
    }, async (req, reply) => {
        const parsed = LoginBodySchema.safeParse(req.body);
        if (!parsed.success) {
            return reply.status(400).send({ error: 'Invalid body', details: parsed.error.flatten() });
        }
        const result = await login(ctx, parsed.data, (claims) => app.jwt.sign(claims));
        return reply.send(result);
    });

    app.get('/auth/me', {
        schema: {
            summary: 'Current account',
            tags: ['Auth'],
            security: bearerAuth,
            response: {
                200: {
                    type: 'object',
                    properties: {
                        username: { type: 'string' },
                        email: { type: 'string' },
                    },
                },
                401: { description: 'Missing, invalid or expired token', ...errorResponse },
            },
        },
        preHandler: ctx.authenticate,
    }, async (req) => toWhoami(requireAccount(req)));
}
