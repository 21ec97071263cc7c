// src/types/models/Post.ts

/**
 * Core post model stored in Firestore
 */
export interface Post {
    id: string;
    title: string;
    content: string;
    authorId: string;
    communityId?: string;
    karma: number;
    createdAt: string;
    updatedAt?: string;
}

export const DEFAULT_POST_KARMA = 0;
