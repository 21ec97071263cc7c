// src/services/repositories/memory/MemoryDatabase.ts

import type { Comment, Message, Post, Vote } from '@/types/models';

export interface MemoryDatabaseOptions {
    /** Time source for createdAt/updatedAt; defaults to the wall clock */
    clock?: () => Date;
}

/**
 * In-process stand-in for the Firestore collections.
 * Ids are zero-padded sequence numbers, so lexical id order is insertion order.
 */
export class MemoryDatabase {
    readonly posts = new Map<string, Post>();
    readonly comments = new Map<string, Comment>();
    readonly messages = new Map<string, Message>();
    readonly votes = new Map<string, Vote>();

    private sequence = 0;
    private readonly clock: () => Date;

    constructor(options: MemoryDatabaseOptions = {}) {
        this.clock = options.clock ?? (() => new Date());
    }

    nextId(): string {
        this.sequence += 1;
        return String(this.sequence).padStart(8, '0');
    }

    now(): string {
        return this.clock().toISOString();
    }
}
