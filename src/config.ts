import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

/**
 * Environment variable schema validation.
 * Ensures all required environment variables are present and valid.
 */
const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default('0.0.0.0'),
    DB_PATH: z.string().default('./data/capsules.db'),
    JWT_SECRET: z.string().min(8),
    JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    SWEEP_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
    process.exit(1);
}

/**
 * Application configuration object.
 * Contains validated environment variables and application limits.
 */
export const config = {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    dbPath: parsed.data.DB_PATH,
    jwt: {
        secret: parsed.data.JWT_SECRET,
        algorithm: parsed.data.JWT_ALGORITHM,
        expiresIn: '30m',
    },
    logLevel: parsed.data.LOG_LEVEL,
    sweepIntervalMs: parsed.data.SWEEP_INTERVAL_MS,
    /** Every stored and rendered timestamp is normalized to this offset (IST). */
    timezone: {
        label: '+05:30',
        offsetMinutes: 5 * 60 + 30,
    },
    limits: {
        bodyBytes: 64 * 1024,
        messageMaxLength: 10_000,
        retentionMs: 30 * 24 * 60 * 60 * 1000,
        pageLimitDefault: 10,
        pageLimitMax: 100,
        unlockCodeLength: 16,
        unlockCodeAttempts: 5,
        bcryptRounds: 10,
    },
} as const;

export type AppConfig = typeof config;
