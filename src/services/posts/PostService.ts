// src/services/posts/PostService.ts

import { AuthorizationError, NotFoundError, parseInput, parsePage } from '@/lib/api';
import type { SubsystemLock } from '@/lib/db';
import type { PostChanges, PostRepository } from '@/services/repositories/types';
import {
    createPostSchema,
    updatePostSchema,
    type CreatePostRequest,
    type PageQuery,
    type UpdatePostRequest,
} from '@/types/api';
import type { Post } from '@/types/models';

/**
 * Posts are the anchors comments hang off and one of the two vote targets.
 * Karma starts at zero and is only changed through votes.
 */
export class PostService {
    constructor(
        private readonly posts: PostRepository,
        private readonly lock: SubsystemLock
    ) {}

    async createPost(authorId: string, input: CreatePostRequest): Promise<Post> {
        const { title, content, communityId } = parseInput(createPostSchema, input);
        return this.lock.write(() => this.posts.create({ title, content, authorId, communityId }));
    }

    async getPost(id: string): Promise<Post> {
        return this.lock.read(async () => {
            const post = await this.posts.findById(id);
            if (!post) {
                throw new NotFoundError('Post');
            }
            return post;
        });
    }

    /**
     * Change title and/or content; only the author may do so
     */
    async editPost(id: string, editorId: string, input: UpdatePostRequest): Promise<Post> {
        const { title, content } = parseInput(updatePostSchema, input);

        const changes: PostChanges = {};
        if (title !== undefined) changes.title = title;
        if (content !== undefined) changes.content = content;

        return this.lock.write(async () => {
            const post = await this.posts.findById(id);
            if (!post) {
                throw new NotFoundError('Post');
            }

            if (post.authorId !== editorId) {
                throw new AuthorizationError('You can only edit your own posts');
            }

            const updated = await this.posts.update(id, changes);
            if (!updated) {
                throw new NotFoundError('Post');
            }
            return updated;
        });
    }

    /**
     * All posts, newest first
     */
    async getFeedPosts(query?: PageQuery): Promise<Post[]> {
        return this.lock.read(() => this.posts.listAll(parsePage(query)));
    }

    /**
     * Posts of a community, newest first
     */
    async getCommunityPosts(communityId: string, query?: PageQuery): Promise<Post[]> {
        return this.lock.read(() => this.posts.listByCommunity(communityId, parsePage(query)));
    }
}
