// src/types/models/Comment.ts

import type { ThreadNode } from './ThreadNode';

/**
 * Comment on a post or a reply to another comment.
 * rootId is the id of the post the thread hangs off.
 */
export interface Comment extends ThreadNode {
    karma: number;
}

export const DEFAULT_COMMENT_KARMA = 0;
