/**
 * JSON schema fragments shared by route definitions for the OpenAPI document.
 * Runtime validation of bodies and queries is done with zod in the handlers.
 */
export const errorResponse = {
    type: 'object',
    properties: {
        error: { type: 'string' },
        code: { type: 'string' },
    },
} as const;

export const validationErrorResponse = {
    description: 'Validation error',
    type: 'object',
    properties: {
        error: { type: 'string' },
        details: { type: 'object', additionalProperties: true },
    },
} as const;

export const bearerAuth = [{ bearerAuth: [] }];

export const capsuleIdParams = {
    type: 'object',
    properties: {
        id: { type: 'integer', minimum: 1, description: 'Capsule identifier' },
    },
} as const;

export const unlockCodeQuery = {
    type: 'object',
    properties: {
        code: { type: 'string', description: 'Unlock code (never logged)' },
    },
} as const;
