// src/services/repositories/memory/MemoryThreadRepository.ts

import type { ZodType, ZodTypeDef } from 'zod';
import type { PageRequest } from '@/types/api';
import type { NewThreadNode, ThreadNode } from '@/types/models';
import type { AnchorField, ListOrder, ThreadRepository } from '../types';
import { paginate, sortByCreation } from './ordering';
import type { MemoryDatabase } from './MemoryDatabase';

/**
 * Records are copied on the way in and out; callers never hold the stored object.
 */
export class MemoryThreadRepository<T extends ThreadNode> implements ThreadRepository<T> {
    constructor(
        private readonly db: MemoryDatabase,
        private readonly nodes: Map<string, T>,
        private readonly schema: ZodType<T, ZodTypeDef, unknown>
    ) {}

    newId(): string {
        return this.db.nextId();
    }

    async insert(node: NewThreadNode<T>): Promise<T> {
        const record = this.schema.parse({ ...node, createdAt: this.db.now() });
        if (this.nodes.has(record.id)) {
            throw new Error(`Node ${record.id} already exists`);
        }
        this.nodes.set(record.id, record);
        return { ...record };
    }

    async findById(id: string): Promise<T | null> {
        const node = this.nodes.get(id);
        return node ? { ...node } : null;
    }

    async updateContent(id: string, content: string): Promise<T | null> {
        const current = this.nodes.get(id);
        if (!current) return null;

        const updated = this.schema.parse({ ...current, content, updatedAt: this.db.now() });
        this.nodes.set(id, updated);
        return { ...updated };
    }

    async listChildren(parentId: string, order: ListOrder, page: PageRequest): Promise<T[]> {
        const children = [...this.nodes.values()].filter((node) => node.parentId === parentId);
        return paginate(sortByCreation(children, order), page).map((node) => ({ ...node }));
    }

    async listRootsFor(
        anchorField: AnchorField<T>,
        anchorId: string,
        order: ListOrder,
        page: PageRequest
    ): Promise<T[]> {
        const roots = [...this.nodes.values()].filter(
            (node) => node.parentId === null && node[anchorField] === anchorId
        );
        return paginate(sortByCreation(roots, order), page).map((node) => ({ ...node }));
    }
}
