// src/types/api/index.ts

import { z } from 'zod';

// ============================================
// Query Schemas
// ============================================

export const pageQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).optional().default(20),
    offset: z.coerce.number().int().min(0).optional().default(0),
});

export type PageQuery = z.input<typeof pageQuerySchema>;
export type PageRequest = z.infer<typeof pageQuerySchema>;

// ============================================
// Post API Schemas
// ============================================

export const createPostSchema = z.object({
    title: z.string().min(1, 'Title is required').max(300),
    content: z.string().min(1, 'Content is required').max(40000),
    communityId: z.string().min(1).optional(),
});

export type CreatePostRequest = z.infer<typeof createPostSchema>;

export const updatePostSchema = z
    .object({
        title: z.string().min(1).max(300).optional(),
        content: z.string().min(1).max(40000).optional(),
    })
    .refine((body) => body.title !== undefined || body.content !== undefined, {
        message: 'Title or content is required',
    });

export type UpdatePostRequest = z.infer<typeof updatePostSchema>;

// ============================================
// Vote API Schemas
// ============================================

/**
 * Exactly one of postId / commentId is expected; the combination is checked
 * when the target is resolved so that it surfaces as an invalid target
 * rather than a validation failure.
 */
export const voteTargetSchema = z.object({
    postId: z.string().min(1).optional(),
    commentId: z.string().min(1).optional(),
});

export type VoteTargetRequest = z.infer<typeof voteTargetSchema>;

export const voteSchema = voteTargetSchema.extend({
    value: z.union([z.literal(1), z.literal(-1)]),
});

export type VoteRequest = z.infer<typeof voteSchema>;

// ============================================
// Comment API Schemas
// ============================================

export const createCommentSchema = z.object({
    postId: z.string().min(1, 'Post ID is required'),
    content: z.string().min(1, 'Content is required').max(10000),
});

export type CreateCommentRequest = z.infer<typeof createCommentSchema>;

export const replyCommentSchema = z.object({
    parentId: z.string().min(1, 'Parent comment ID is required'),
    content: z.string().min(1, 'Content is required').max(10000),
    postId: z.string().min(1).optional(),
});

export type ReplyCommentRequest = z.infer<typeof replyCommentSchema>;

// ============================================
// Message API Schemas
// ============================================

export const sendMessageSchema = z.object({
    receiverId: z.string().min(1, 'Receiver ID is required'),
    content: z.string().min(1, 'Content is required').max(10000),
});

export type SendMessageRequest = z.infer<typeof sendMessageSchema>;

export const replyMessageSchema = z.object({
    parentId: z.string().min(1, 'Parent message ID is required'),
    content: z.string().min(1, 'Content is required').max(10000),
    // Accepted for compatibility; replies always go to the parent's sender
    receiverId: z.string().optional(),
});

export type ReplyMessageRequest = z.infer<typeof replyMessageSchema>;

// ============================================
// Shared Schemas
// ============================================

export const updateContentSchema = z.object({
    content: z.string().min(1, 'Content is required').max(10000),
});

export type UpdateContentRequest = z.infer<typeof updateContentSchema>;
