// src/services/repositories/firestore/FirestoreVoteStore.ts

import type { DocumentReference, Firestore, Transaction } from 'firebase-admin/firestore';
import { docRef, withTransaction } from '@/lib/db';
import {
    getVoteId,
    getVoteIdForKey,
    type Vote,
    type VoteKey,
    type VoteTarget,
    type VoteValue,
} from '@/types/models';
import { TARGET_COLLECTIONS, VOTES_COLLECTION } from '../collections';
import { scoreRecordSchema, voteRecordSchema } from '../schemas';
import type { NewVote, VoteStore, VoteTransaction } from '../types';

/**
 * Vote and score access bound to one Firestore transaction.
 * Writes are buffered by Firestore and committed when the callback resolves;
 * a document read earlier in the transaction that changes before commit
 * makes Firestore retry the whole callback.
 */
class FirestoreVoteTransaction implements VoteTransaction {
    constructor(
        private readonly db: Firestore,
        private readonly tx: Transaction
    ) {}

    private voteRef(voteId: string): DocumentReference {
        return docRef(this.db, VOTES_COLLECTION, voteId);
    }

    private targetRef(target: VoteTarget): DocumentReference {
        return docRef(this.db, TARGET_COLLECTIONS[target.type], target.id);
    }

    async getVote(key: VoteKey): Promise<Vote | null> {
        const snapshot = await this.tx.get(this.voteRef(getVoteIdForKey(key)));
        if (!snapshot.exists) return null;
        return voteRecordSchema.parse({ ...snapshot.data(), id: snapshot.id });
    }

    async insertVote(vote: NewVote): Promise<Vote> {
        const record: Vote = {
            ...vote,
            id: getVoteId(vote.userId, vote.targetId, vote.targetType),
            createdAt: new Date().toISOString(),
        };
        this.tx.create(this.voteRef(record.id), record);
        return record;
    }

    async updateVoteValue(voteId: string, value: VoteValue): Promise<{ updatedAt: string }> {
        const updatedAt = new Date().toISOString();
        this.tx.update(this.voteRef(voteId), { value, updatedAt });
        return { updatedAt };
    }

    // The ledger reads the vote in this transaction before deleting it
    async deleteVote(voteId: string): Promise<boolean> {
        this.tx.delete(this.voteRef(voteId));
        return true;
    }

    async getScore(target: VoteTarget): Promise<number | null> {
        const snapshot = await this.tx.get(this.targetRef(target));
        if (!snapshot.exists) return null;
        return scoreRecordSchema.parse(snapshot.data()).karma;
    }

    async setScore(target: VoteTarget, score: number): Promise<void> {
        this.tx.update(this.targetRef(target), {
            karma: score,
            updatedAt: new Date().toISOString(),
        });
    }
}

export class FirestoreVoteStore implements VoteStore {
    constructor(private readonly db: Firestore) {}

    async getVote(key: VoteKey): Promise<Vote | null> {
        const snapshot = await docRef(this.db, VOTES_COLLECTION, getVoteIdForKey(key)).get();
        if (!snapshot.exists) return null;
        return voteRecordSchema.parse({ ...snapshot.data(), id: snapshot.id });
    }

    async runTransaction<T>(work: (tx: VoteTransaction) => Promise<T>): Promise<T> {
        return withTransaction(this.db, (transaction) =>
            work(new FirestoreVoteTransaction(this.db, transaction))
        );
    }
}
