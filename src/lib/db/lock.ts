// src/lib/db/lock.ts

import { Semaphore } from 'async-mutex';

export const DEFAULT_MAX_READERS = 64;

/**
 * Shared/exclusive lock scoped to the whole vote and thread subsystem.
 *
 * Readers take one unit of a weighted semaphore, writers take all of them,
 * so a writer runs alone and readers run side by side. Waiters are served
 * in queue order: once a writer is queued, later readers wait behind it.
 * Acquisitions must not nest.
 */
export class SubsystemLock {
    private readonly semaphore: Semaphore;
    private readonly maxReaders: number;

    constructor(maxReaders: number = DEFAULT_MAX_READERS) {
        if (!Number.isInteger(maxReaders) || maxReaders < 1) {
            throw new Error(`maxReaders must be a positive integer, got ${maxReaders}`);
        }
        this.maxReaders = maxReaders;
        this.semaphore = new Semaphore(maxReaders);
    }

    /**
     * Run a read-only operation in shared mode
     */
    read<T>(operation: () => Promise<T>): Promise<T> {
        return this.semaphore.runExclusive(() => operation(), 1);
    }

    /**
     * Run a check-then-write sequence in exclusive mode
     */
    write<T>(operation: () => Promise<T>): Promise<T> {
        return this.semaphore.runExclusive(() => operation(), this.maxReaders);
    }
}
