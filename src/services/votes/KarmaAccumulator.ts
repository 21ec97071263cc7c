// src/services/votes/KarmaAccumulator.ts

import { NotFoundError } from '@/lib/api';
import type { VoteTransaction } from '@/services/repositories/types';
import type { VoteTarget } from '@/types/models';

/**
 * Score of a target as read inside a transaction
 */
export interface KarmaSnapshot {
    target: VoteTarget;
    score: number;
}

const TARGET_LABELS: Record<VoteTarget['type'], string> = {
    post: 'Post',
    comment: 'Comment',
};

/**
 * The only writer of post and comment karma.
 *
 * Loading and applying are separate so the score read can be issued before
 * the ledger's writes; both go through the ledger's transaction and commit
 * or roll back with it.
 */
export class KarmaAccumulator {
    async load(tx: VoteTransaction, target: VoteTarget): Promise<KarmaSnapshot> {
        const score = await tx.getScore(target);
        if (score === null) {
            throw new NotFoundError(TARGET_LABELS[target.type]);
        }
        return { target, score };
    }

    /**
     * Write score + delta; returns the new score
     */
    async applyDelta(tx: VoteTransaction, snapshot: KarmaSnapshot, delta: number): Promise<number> {
        if (!Number.isInteger(delta)) {
            throw new Error(`Karma delta must be an integer, got ${delta}`);
        }

        const score = snapshot.score + delta;
        if (delta !== 0) {
            await tx.setScore(snapshot.target, score);
        }
        return score;
    }
}
