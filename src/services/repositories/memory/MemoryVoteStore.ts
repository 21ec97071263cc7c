// src/services/repositories/memory/MemoryVoteStore.ts

import {
    getVoteId,
    getVoteIdForKey,
    type Vote,
    type VoteKey,
    type VoteTarget,
    type VoteValue,
} from '@/types/models';
import type { NewVote, VoteStore, VoteTransaction } from '../types';
import type { MemoryDatabase } from './MemoryDatabase';

function copyVote(vote: Vote | undefined): Vote | null {
    return vote ? { ...vote } : null;
}

interface Scored {
    karma: number;
    updatedAt?: string;
}

/**
 * Applies writes straight to the maps and journals how to undo each one.
 * rollback() replays the journal backwards.
 */
export class MemoryVoteTransaction implements VoteTransaction {
    private readonly journal: Array<() => void> = [];

    constructor(private readonly db: MemoryDatabase) {}

    private remember<T>(map: Map<string, T>, key: string): void {
        const existed = map.has(key);
        const previous = map.get(key);
        this.journal.push(() => {
            if (existed && previous !== undefined) {
                map.set(key, previous);
            } else {
                map.delete(key);
            }
        });
    }

    async getVote(key: VoteKey): Promise<Vote | null> {
        return copyVote(this.db.votes.get(getVoteIdForKey(key)));
    }

    async insertVote(vote: NewVote): Promise<Vote> {
        const id = getVoteId(vote.userId, vote.targetId, vote.targetType);
        if (this.db.votes.has(id)) {
            throw new Error(`Vote ${id} already exists`);
        }

        const record: Vote = { ...vote, id, createdAt: this.db.now() };
        this.remember(this.db.votes, id);
        this.db.votes.set(id, record);
        return { ...record };
    }

    async updateVoteValue(voteId: string, value: VoteValue): Promise<{ updatedAt: string }> {
        const current = this.db.votes.get(voteId);
        if (!current) {
            throw new Error(`Vote ${voteId} does not exist`);
        }

        const updatedAt = this.db.now();
        this.remember(this.db.votes, voteId);
        this.db.votes.set(voteId, { ...current, value, updatedAt });
        return { updatedAt };
    }

    async deleteVote(voteId: string): Promise<boolean> {
        if (!this.db.votes.has(voteId)) return false;

        this.remember(this.db.votes, voteId);
        this.db.votes.delete(voteId);
        return true;
    }

    async getScore(target: VoteTarget): Promise<number | null> {
        const record = target.type === 'post'
            ? this.db.posts.get(target.id)
            : this.db.comments.get(target.id);
        return record ? record.karma : null;
    }

    async setScore(target: VoteTarget, score: number): Promise<void> {
        if (target.type === 'post') {
            this.writeScore(this.db.posts, target.id, score);
        } else {
            this.writeScore(this.db.comments, target.id, score);
        }
    }

    private writeScore<T extends Scored>(map: Map<string, T>, id: string, score: number): void {
        const current = map.get(id);
        if (!current) {
            throw new Error(`Score target ${id} does not exist`);
        }

        this.remember(map, id);
        map.set(id, { ...current, karma: score, updatedAt: this.db.now() });
    }

    rollback(): void {
        for (const undo of this.journal.reverse()) {
            undo();
        }
        this.journal.length = 0;
    }
}

export class MemoryVoteStore implements VoteStore {
    constructor(private readonly db: MemoryDatabase) {}

    async getVote(key: VoteKey): Promise<Vote | null> {
        return copyVote(this.db.votes.get(getVoteIdForKey(key)));
    }

    async runTransaction<T>(work: (tx: VoteTransaction) => Promise<T>): Promise<T> {
        const tx = new MemoryVoteTransaction(this.db);
        try {
            return await work(tx);
        } catch (error) {
            tx.rollback();
            throw error;
        }
    }
}
