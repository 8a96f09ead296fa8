/**
 * Domain error taxonomy. Each kind maps to one stable HTTP status; `code`
 * distinguishes causes within a kind for clients.
 */
export type ErrorKind = 'Conflict' | 'Unauthenticated' | 'NotFound' | 'Forbidden' | 'InvalidState' | 'Gone';

export type ErrorCode =
    | 'USERNAME_TAKEN'
    | 'EMAIL_TAKEN'
    | 'PASSWORD_MISMATCH'
    | 'INVALID_CREDENTIALS'
    | 'INVALID_TOKEN'
    | 'USER_NOT_FOUND'
    | 'CAPSULE_NOT_FOUND'
    | 'NOT_OWNER'
    | 'CODE_MISMATCH'
    | 'CAPSULE_LOCKED'
    | 'ALREADY_UNLOCKED'
    | 'UNLOCK_NOT_FUTURE'
    | 'CAPSULE_EXPIRED';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
    Conflict: 409,
    Unauthenticated: 401,
    NotFound: 404,
    Forbidden: 403,
    InvalidState: 422,
    Gone: 410,
};

export class AppError extends Error {
    readonly statusCode: number;

    constructor(
        readonly kind: ErrorKind,
        readonly code: ErrorCode,
        message: string,
    ) {
        super(message);
        this.name = 'AppError';
        this.statusCode = STATUS_BY_KIND[kind];
    }

    toJSON() {
        return { error: this.message, code: this.code };
    }
}

export const conflict = (code: ErrorCode, message: string) => new AppError('Conflict', code, message);
export const unauthenticated = (code: ErrorCode, message: string) => new AppError('Unauthenticated', code, message);
export const notFound = (code: ErrorCode, message: string) => new AppError('NotFound', code, message);
export const forbidden = (code: ErrorCode, message: string) => new AppError('Forbidden', code, message);
export const invalidState = (code: ErrorCode, message: string) => new AppError('InvalidState', code, message);
export const gone = (code: ErrorCode, message: string) => new AppError('Gone', code, message);
