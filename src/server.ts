import Fastify, { type FastifyError } from 'fastify';
import fastifyJwt from '@fastify/jwt';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { config } from './config';
import { createDb, type Db } from './db';
import type { RouteContext } from './context';
import { AppError } from './lib/errors';
import { systemClock, type Clock } from './lib/time';
import { makeAuthenticate } from './modules/auth/authenticate';
import registerAuthRoutes from './modules/auth/route';
import registerCapsulePostRoute from './modules/capsules/route.post';
import registerCapsuleGetRoutes from './modules/capsules/route.get';
import registerCapsuleUpdateRoutes from './modules/capsules/route.update';
import { ExpirationSweeper } from './modules/capsules/sweeper';

export interface BuildServerOptions {
    /** Database handle; when omitted one is opened at `config.dbPath` and closed with the app */
    db?: Db;
    clock?: Clock;
    /** Run the expiration sweeper between `onReady` and `onClose` */
    sweeper?: boolean;
}

/**
 * Builds and configures the Fastify server instance.
 *
 * Sets up:
 * - Logger that keeps only method, path and address of requests, so unlock codes and tokens stay out of logs
 * - Database handle and clock shared by every route
 * - Domain error mapping
 * - Rate limiting, JWT and Swagger/OpenAPI documentation
 * - Auth and capsule routes, health check
 * - Optional background expiration sweeper
 */
export async function buildServer(options: BuildServerOptions = {}) {
    const app = Fastify({
        logger: {
            level: config.logLevel,
            serializers: {
                req: (req) => {
                    // Remove query parameters from logs to prevent unlock code leakage
                    const url = new URL(req.url, `http://${req.headers.host ?? 'localhost'}`);
                    return {
                        method: req.method,
                        url: url.pathname,
                        remoteAddress: req.socket?.remoteAddress,
                    };
                },
            },
        },
        bodyLimit: config.limits.bodyBytes,
    });

    let db = options.db;
    if (!db) {
        const handle = createDb();
        db = handle.db;
        app.addHook('onClose', async () => handle.close());
    }
    const clock = options.clock ?? systemClock;

    app.decorateRequest('account', null);

    app.setErrorHandler((error: FastifyError | AppError, req, reply) => {
        if (error instanceof AppError) {
            if (error.kind === 'Unauthenticated') {
                reply.header('WWW-Authenticate', 'Bearer');
            }
            return reply.status(error.statusCode).send(error.toJSON());
        }
        const statusCode = error.statusCode ?? 500;
        if (statusCode < 500) {
            return reply.status(statusCode).send({ error: error.message, code: error.code });
        }
        req.log.error({ err: error }, 'Unhandled error');
        return reply.status(500).send({ error: 'Internal Server Error' });
    });

    await app.register(rateLimit, { max: 300, timeWindow: '1 minute' });
    await app.register(fastifyJwt, {
        secret: config.jwt.secret,
        sign: { algorithm: config.jwt.algorithm, expiresIn: config.jwt.expiresIn },
        verify: { algorithms: [config.jwt.algorithm] },
    });
    await app.register(swagger, {
        openapi: {
            openapi: '3.0.0',
            info: { title: 'Time Capsule API', version: '0.1.0' },
            tags: [{ name: 'Auth' }, { name: 'Capsules' }],
            components: {
                securitySchemes: {
                    bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
                },
            },
        },
    });
    await app.register(swaggerUI, { routePrefix: '/docs' });

    const ctx: RouteContext = {
        db,
        clock,
        authenticate: makeAuthenticate(db),
    };

    await registerAuthRoutes(app, ctx);
    await registerCapsulePostRoute(app, ctx);
    await registerCapsuleGetRoutes(app, ctx);
    await registerCapsuleUpdateRoutes(app, ctx);

    // Health check endpoint for monitoring and Docker health checks
    app.get('/health', async () => ({ status: 'ok' }));

    if (options.sweeper) {
        const sweeper = new ExpirationSweeper(db, clock, config.sweepIntervalMs, app.log.child({ module: 'sweeper' }));
        app.addHook('onReady', async () => sweeper.start());
        app.addHook('onClose', async () => sweeper.stop());
    }

    return app;
}
