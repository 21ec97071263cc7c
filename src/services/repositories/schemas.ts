// src/services/repositories/schemas.ts

import { z } from 'zod';
import type { Comment, Message, Post, Vote } from '@/types/models';

/**
 * Shapes of stored records, checked whenever a record is read back
 */

const threadNodeShape = {
    id: z.string().min(1),
    parentId: z.string().min(1).nullable(),
    rootId: z.string().min(1),
    authorId: z.string().min(1),
    content: z.string(),
    createdAt: z.string(),
    updatedAt: z.string().optional(),
};

export const commentRecordSchema: z.ZodType<Comment, z.ZodTypeDef, unknown> = z.object({
    ...threadNodeShape,
    karma: z.number().int(),
});

export const messageRecordSchema: z.ZodType<Message, z.ZodTypeDef, unknown> = z.object({
    ...threadNodeShape,
    receiverId: z.string().min(1),
});

export const postRecordSchema: z.ZodType<Post, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    title: z.string(),
    content: z.string(),
    authorId: z.string().min(1),
    communityId: z.string().optional(),
    karma: z.number().int(),
    createdAt: z.string(),
    updatedAt: z.string().optional(),
});

export const voteRecordSchema: z.ZodType<Vote, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    userId: z.string().min(1),
    targetId: z.string().min(1),
    targetType: z.enum(['post', 'comment']),
    value: z.union([z.literal(1), z.literal(-1)]),
    createdAt: z.string(),
    updatedAt: z.string().optional(),
});

/**
 * Karma field of a post or comment record
 */
export const scoreRecordSchema = z.object({
    karma: z.number().int(),
});
