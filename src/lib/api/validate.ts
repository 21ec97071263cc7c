// src/lib/api/validate.ts

import type { ZodType, ZodTypeDef } from 'zod';
import { pageQuerySchema, type PageQuery, type PageRequest } from '@/types/api';
import { ValidationError } from './errors';

/**
 * Parse and validate a service request
 */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new ValidationError('Validation failed', result.error.flatten());
    }
    return result.data;
}

/**
 * Parse limit/offset pagination, applying the defaults
 */
export function parsePage(query: PageQuery = {}): PageRequest {
    return parseInput(pageQuerySchema, query);
}
