// src/lib/api/index.ts

export { parseInput, parsePage } from './validate';

export {
    ApiError,
    ValidationError,
    InvalidTargetError,
    AuthorizationError,
    NotFoundError,
    ConflictError,
    NoOpError,
    SelfReferenceError,
    InternalError,
} from './errors';
