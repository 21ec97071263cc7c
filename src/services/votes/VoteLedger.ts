// src/services/votes/VoteLedger.ts

import { ConflictError, NoOpError, NotFoundError } from '@/lib/api';
import type { VoteTransaction } from '@/services/repositories/types';
import type { Vote, VoteTarget, VoteValue } from '@/types/models';

/**
 * Result of one ledger mutation
 */
export interface LedgerChange {
    /** Vote as stored after the change; null once removed */
    vote: Vote | null;
    /** Score change the mutation implies for the target */
    delta: number;
}

/**
 * Keeps at most one vote per (user, target) and derives the karma delta
 * of each change. Every method reads and writes through the caller's
 * transaction, which must be held exclusively from the read to the commit.
 */
export class VoteLedger {
    async cast(
        tx: VoteTransaction,
        userId: string,
        target: VoteTarget,
        value: VoteValue
    ): Promise<LedgerChange> {
        const existing = await tx.getVote({ userId, target });
        if (existing) {
            throw new ConflictError(`You have already voted on this ${target.type}`);
        }

        const vote = await tx.insertVote({
            userId,
            targetId: target.id,
            targetType: target.type,
            value,
        });
        return { vote, delta: value };
    }

    async change(
        tx: VoteTransaction,
        userId: string,
        target: VoteTarget,
        value: VoteValue
    ): Promise<LedgerChange> {
        const existing = await tx.getVote({ userId, target });
        if (!existing) {
            throw new NotFoundError('Vote');
        }

        if (existing.value === value) {
            throw new NoOpError('Vote already has this value');
        }

        const { updatedAt } = await tx.updateVoteValue(existing.id, value);
        return {
            vote: { ...existing, value, updatedAt },
            delta: value - existing.value,
        };
    }

    async remove(tx: VoteTransaction, userId: string, target: VoteTarget): Promise<LedgerChange> {
        const existing = await tx.getVote({ userId, target });
        if (!existing) {
            throw new NotFoundError('Vote');
        }

        const deleted = await tx.deleteVote(existing.id);
        if (!deleted) {
            throw new NotFoundError('Vote');
        }
        return { vote: null, delta: -existing.value };
    }
}
