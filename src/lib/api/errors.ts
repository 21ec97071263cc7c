// src/lib/api/errors.ts

/**
 * Base API error class
 */
export class ApiError extends Error {
    public readonly statusCode: number;
    public readonly code: string;
    public readonly details?: unknown;

    constructor(message: string, statusCode: number, code: string, details?: unknown) {
        super(message);
        this.name = 'ApiError';
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
    }
}

/**
 * 400 Bad Request - Invalid request data
 */
export class ValidationError extends ApiError {
    constructor(message: string = 'Validation failed', details?: unknown) {
        super(message, 400, 'VALIDATION_ERROR', details);
        this.name = 'ValidationError';
    }
}

/**
 * 400 Bad Request - Vote names neither or both of post/comment,
 * or a reply names a root other than its parent's
 */
export class InvalidTargetError extends ApiError {
    constructor(message: string = 'Target must be exactly one post or one comment', details?: unknown) {
        super(message, 400, 'INVALID_TARGET', details);
        this.name = 'InvalidTargetError';
    }
}

/**
 * 403 Forbidden - Authenticated but not authorized
 */
export class AuthorizationError extends ApiError {
    constructor(message: string = 'Access denied', details?: unknown) {
        super(message, 403, 'AUTHORIZATION_ERROR', details);
        this.name = 'AuthorizationError';
    }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends ApiError {
    constructor(resource: string = 'Resource') {
        super(`${resource} not found`, 404, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

/**
 * 409 Conflict - Resource already exists or conflict
 */
export class ConflictError extends ApiError {
    constructor(message: string = 'Resource already exists') {
        super(message, 409, 'CONFLICT');
        this.name = 'ConflictError';
    }
}

/**
 * 409 Conflict - Requested change leaves the stored value as it is
 */
export class NoOpError extends ApiError {
    constructor(message: string = 'Nothing to change') {
        super(message, 409, 'NO_OP');
        this.name = 'NoOpError';
    }
}

/**
 * 422 Unprocessable Entity - Node would address itself
 * (message to oneself, reply to one's own message)
 */
export class SelfReferenceError extends ApiError {
    constructor(message: string = 'Sender and receiver cannot be the same') {
        super(message, 422, 'SELF_REFERENCE');
        this.name = 'SelfReferenceError';
    }
}

/**
 * 500 Internal Server Error
 */
export class InternalError extends ApiError {
    constructor(message: string = 'Internal server error', details?: unknown) {
        super(message, 500, 'INTERNAL_ERROR', details);
        this.name = 'InternalError';
    }
}
