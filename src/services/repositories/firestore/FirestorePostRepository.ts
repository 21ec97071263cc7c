// src/services/repositories/firestore/FirestorePostRepository.ts

import type { Firestore } from 'firebase-admin/firestore';
import type { PageRequest } from '@/types/api';
import { DEFAULT_POST_KARMA, type Post } from '@/types/models';
import { BaseRepository } from '../BaseRepository';
import { POSTS_COLLECTION } from '../collections';
import { postRecordSchema } from '../schemas';
import type { NewPost, PostChanges, PostRepository } from '../types';

export class FirestorePostRepository extends BaseRepository<Post> implements PostRepository {
    constructor(db: Firestore) {
        super(db, POSTS_COLLECTION, postRecordSchema);
    }

    async create(post: NewPost): Promise<Post> {
        return this.createEntity({
            ...post,
            id: this.newId(),
            karma: DEFAULT_POST_KARMA,
        });
    }

    async update(id: string, changes: PostChanges): Promise<Post | null> {
        return this.updateEntity(id, changes);
    }

    async listByCommunity(communityId: string, page: PageRequest): Promise<Post[]> {
        return this.findWhere(
            [{ field: 'communityId', operator: '==', value: communityId }],
            'desc',
            page
        );
    }

    async listAll(page: PageRequest): Promise<Post[]> {
        return this.findWhere([], 'desc', page);
    }
}
