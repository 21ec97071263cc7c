// src/services/threads/CommentService.ts

import { parseInput, parsePage } from '@/lib/api';
import type { SubsystemLock } from '@/lib/db';
import type { PostRepository, ThreadRepository } from '@/services/repositories/types';
import {
    createCommentSchema,
    replyCommentSchema,
    updateContentSchema,
    type CreateCommentRequest,
    type PageQuery,
    type ReplyCommentRequest,
    type UpdateContentRequest,
} from '@/types/api';
import type { Comment } from '@/types/models';
import { CommentThreadPolicy, type CommentRootInput } from './policies';
import { ThreadStore } from './ThreadStore';

/**
 * Comment threads under posts
 */
export class CommentService {
    private readonly threads: ThreadStore<Comment, CommentRootInput>;

    constructor(comments: ThreadRepository<Comment>, posts: PostRepository, lock: SubsystemLock) {
        this.threads = new ThreadStore(comments, new CommentThreadPolicy(posts), lock);
    }

    async addComment(authorId: string, input: CreateCommentRequest): Promise<Comment> {
        const { postId, content } = parseInput(createCommentSchema, input);
        return this.threads.createRoot(authorId, content, { postId });
    }

    /**
     * The reply joins the parent's post; a postId in the request must name that post
     */
    async replyToComment(authorId: string, input: ReplyCommentRequest): Promise<Comment> {
        const { parentId, content, postId } = parseInput(replyCommentSchema, input);
        return this.threads.createReply(parentId, authorId, content, postId);
    }

    async getComment(id: string): Promise<Comment> {
        return this.threads.get(id);
    }

    /**
     * Top-level comments of a post, newest first
     */
    async getCommentsByPost(postId: string, query?: PageQuery): Promise<Comment[]> {
        return this.threads.listRoots(postId, parsePage(query));
    }

    /**
     * Direct replies to a comment, oldest first
     */
    async getCommentReplies(parentId: string, query?: PageQuery): Promise<Comment[]> {
        return this.threads.listReplies(parentId, parsePage(query));
    }

    async editComment(id: string, editorId: string, input: UpdateContentRequest): Promise<Comment> {
        const { content } = parseInput(updateContentSchema, input);
        return this.threads.editContent(id, editorId, content);
    }
}
