// src/services/repositories/BaseRepository.ts

import {
    FieldPath,
    type DocumentSnapshot,
    type Firestore,
    type Query,
    type WhereFilterOp,
} from 'firebase-admin/firestore';
import type { ZodType, ZodTypeDef } from 'zod';
import { generateId } from '@/lib/db';
import type { PageRequest } from '@/types/api';
import type { ListOrder } from './types';

/**
 * Base entity interface - all models must have these
 */
export interface BaseEntity {
    id: string;
    createdAt: string;
    updatedAt?: string;
}

/**
 * Query filter
 */
export interface QueryFilter {
    field: string;
    operator: WhereFilterOp;
    value: unknown;
}

/**
 * Base repository class providing common Firestore operations
 * Extend this class for each entity type
 */
export abstract class BaseRepository<T extends BaseEntity> {
    protected db: Firestore;
    protected collectionName: string;
    protected schema: ZodType<T, ZodTypeDef, unknown>;

    constructor(db: Firestore, collectionName: string, schema: ZodType<T, ZodTypeDef, unknown>) {
        this.db = db;
        this.collectionName = collectionName;
        this.schema = schema;
    }

    /**
     * Get collection reference
     */
    protected get collection() {
        return this.db.collection(this.collectionName);
    }

    /**
     * Transform Firestore document to entity
     * The stored shape is checked against the record schema
     */
    protected toEntity(doc: DocumentSnapshot): T | null {
        if (!doc.exists) return null;
        return this.schema.parse({ ...doc.data(), id: doc.id });
    }

    /**
     * Generate a new document ID
     */
    newId(): string {
        return generateId(this.db, this.collectionName);
    }

    /**
     * Find entity by ID
     */
    async findById(id: string): Promise<T | null> {
        const doc = await this.collection.doc(id).get();
        return this.toEntity(doc);
    }

    /**
     * Check if entity exists
     */
    async exists(id: string): Promise<boolean> {
        const doc = await this.collection.doc(id).get();
        return doc.exists;
    }

    /**
     * Create a new entity under the id carried in fields.
     * Fails if a document with that id already exists.
     */
    protected async createEntity(fields: object): Promise<T> {
        const entity = this.schema.parse({
            ...fields,
            createdAt: new Date().toISOString(),
        });

        await this.collection.doc(entity.id).create(entity);
        return entity;
    }

    /**
     * Apply a partial update and return the updated entity, or null when absent
     */
    protected async updateEntity(id: string, data: Record<string, unknown>): Promise<T | null> {
        const docRef = this.collection.doc(id);
        const doc = await docRef.get();

        if (!doc.exists) return null;

        const updateData = {
            ...data,
            updatedAt: new Date().toISOString(),
        };

        await docRef.update(updateData);
        return this.schema.parse({ ...doc.data(), ...updateData, id });
    }

    /**
     * Find entities with filters, ordered on (createdAt, document id)
     */
    protected async findWhere(
        filters: QueryFilter[],
        order: ListOrder,
        page: PageRequest
    ): Promise<T[]> {
        let query: Query = this.collection;

        // Apply filters
        for (const filter of filters) {
            query = query.where(filter.field, filter.operator, filter.value);
        }

        query = query
            .orderBy('createdAt', order)
            .orderBy(FieldPath.documentId(), order)
            .offset(page.offset)
            .limit(page.limit);

        const snapshot = await query.get();

        return snapshot.docs
            .map((doc) => this.toEntity(doc))
            .filter((item): item is T => item !== null);
    }
}
