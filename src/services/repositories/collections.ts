// src/services/repositories/collections.ts

import type { VoteTargetType } from '@/types/models';

export const POSTS_COLLECTION = 'posts';
export const COMMENTS_COLLECTION = 'comments';
export const MESSAGES_COLLECTION = 'messages';
export const VOTES_COLLECTION = 'votes';

/**
 * Collection holding the karma of each vote target type
 */
export const TARGET_COLLECTIONS: Record<VoteTargetType, string> = {
    post: POSTS_COLLECTION,
    comment: COMMENTS_COLLECTION,
};
