// src/services/repositories/memory/MemoryPostRepository.ts

import type { PageRequest } from '@/types/api';
import { DEFAULT_POST_KARMA, type Post } from '@/types/models';
import { postRecordSchema } from '../schemas';
import type { NewPost, PostChanges, PostRepository } from '../types';
import { paginate, sortByCreation } from './ordering';
import type { MemoryDatabase } from './MemoryDatabase';

export class MemoryPostRepository implements PostRepository {
    constructor(private readonly db: MemoryDatabase) {}

    async create(post: NewPost): Promise<Post> {
        const record = postRecordSchema.parse({
            ...post,
            id: this.db.nextId(),
            karma: DEFAULT_POST_KARMA,
            createdAt: this.db.now(),
        });
        this.db.posts.set(record.id, record);
        return { ...record };
    }

    async findById(id: string): Promise<Post | null> {
        const post = this.db.posts.get(id);
        return post ? { ...post } : null;
    }

    async exists(id: string): Promise<boolean> {
        return this.db.posts.has(id);
    }

    async update(id: string, changes: PostChanges): Promise<Post | null> {
        const current = this.db.posts.get(id);
        if (!current) return null;

        const updated = postRecordSchema.parse({ ...current, ...changes, updatedAt: this.db.now() });
        this.db.posts.set(id, updated);
        return { ...updated };
    }

    async listByCommunity(communityId: string, page: PageRequest): Promise<Post[]> {
        const posts = [...this.db.posts.values()].filter((post) => post.communityId === communityId);
        return this.page(posts, page);
    }

    async listAll(page: PageRequest): Promise<Post[]> {
        return this.page([...this.db.posts.values()], page);
    }

    private page(posts: Post[], page: PageRequest): Post[] {
        return paginate(sortByCreation(posts, 'desc'), page).map((post) => ({ ...post }));
    }
}
