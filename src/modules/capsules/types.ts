import { z } from 'zod';
import { config } from '../../config';
import { normalizeTimestamp } from '../../lib/time';
import type { CapsuleState } from './lifecycle';

/**
 * Accepts ISO-8601 strings (with or without offset) or epoch milliseconds and
 * normalizes them to epoch milliseconds in the canonical offset.
 */
export const TimestampInput = z.union([z.string().min(1), z.number()]).transform((value, ctx) => {
    try {
        return normalizeTimestamp(value);
    } catch (error) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: error instanceof Error ? error.message : 'Invalid timestamp',
        });
        return z.NEVER;
    }
});

const Message = z.string().min(1).max(config.limits.messageMaxLength);

/** Request body schema for creating a capsule. */
export const CreateBodySchema = z.object({
    message: Message,
    unlockAt: TimestampInput,
});

export type CreateCapsuleBody = z.infer<typeof CreateBodySchema>;

/** Request body schema for revising a locked capsule. At least one field is required. */
export const UpdateBodySchema = z.object({
    message: Message.optional(),
    unlockAt: TimestampInput.optional(),
}).refine((body) => body.message !== undefined || body.unlockAt !== undefined, {
    message: 'Provide message and/or unlockAt',
});

export type UpdateCapsuleBody = z.infer<typeof UpdateBodySchema>;

export const IdParamsSchema = z.object({
    id: z.coerce.number().int().positive(),
});

export const CodeQuerySchema = z.object({
    code: z.string().min(1),
});

/** Out-of-range values are clamped by the service rather than rejected. */
export const ListQuerySchema = z.object({
    page: z.coerce.number().int().default(1),
    limit: z.coerce.number().int().default(config.limits.pageLimitDefault),
});

export interface CreateCapsuleResponse {
    id: number;
    /** Shown once; the only proof of possession for later reads */
    unlockCode: string;
    unlockAt: string;
}

export interface CapsuleSummary {
    id: number;
    unlockAt: string;
    createdAt: string;
    expiresAt: string;
    state: CapsuleState;
}

export interface CapsuleListResponse {
    items: CapsuleSummary[];
    page: number;
    limit: number;
    total: number;
    totalPages: number;
}

export interface CapsuleDetail {
    id: number;
    message: string;
    unlockAt: string;
    createdAt: string;
    expiresAt: string;
    ownerId: number;
}

export interface UpdateCapsuleResponse {
    id: number;
    message: string;
    unlockAt: string;
}

export interface DeleteCapsuleResponse {
    success: true;
    message: string;
}
