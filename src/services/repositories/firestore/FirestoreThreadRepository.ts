// src/services/repositories/firestore/FirestoreThreadRepository.ts

import type { Firestore } from 'firebase-admin/firestore';
import type { ZodType, ZodTypeDef } from 'zod';
import type { PageRequest } from '@/types/api';
import type { NewThreadNode, ThreadNode } from '@/types/models';
import { BaseRepository } from '../BaseRepository';
import type { AnchorField, ListOrder, ThreadRepository } from '../types';

/**
 * Thread nodes of one kind in a flat collection; parentId and rootId are
 * plain id fields, so every lookup is by id or by an equality filter.
 */
export class FirestoreThreadRepository<T extends ThreadNode>
    extends BaseRepository<T>
    implements ThreadRepository<T>
{
    constructor(db: Firestore, collectionName: string, schema: ZodType<T, ZodTypeDef, unknown>) {
        super(db, collectionName, schema);
    }

    async insert(node: NewThreadNode<T>): Promise<T> {
        return this.createEntity(node);
    }

    async updateContent(id: string, content: string): Promise<T | null> {
        return this.updateEntity(id, { content });
    }

    async listChildren(parentId: string, order: ListOrder, page: PageRequest): Promise<T[]> {
        return this.findWhere(
            [{ field: 'parentId', operator: '==', value: parentId }],
            order,
            page
        );
    }

    async listRootsFor(
        anchorField: AnchorField<T>,
        anchorId: string,
        order: ListOrder,
        page: PageRequest
    ): Promise<T[]> {
        return this.findWhere(
            [
                { field: anchorField, operator: '==', value: anchorId },
                { field: 'parentId', operator: '==', value: null },
            ],
            order,
            page
        );
    }
}
