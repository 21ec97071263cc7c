// src/services/votes/VoteService.ts

import { ApiError, InternalError, InvalidTargetError, NotFoundError, parseInput } from '@/lib/api';
import type { SubsystemLock } from '@/lib/db';
import type { VoteStore, VoteTransaction } from '@/services/repositories/types';
import {
    voteSchema,
    voteTargetSchema,
    type VoteRequest,
    type VoteTargetRequest,
} from '@/types/api';
import type { Vote, VoteTarget } from '@/types/models';
import { KarmaAccumulator } from './KarmaAccumulator';
import { VoteLedger, type LedgerChange } from './VoteLedger';

/**
 * What a vote mutation did
 */
export interface VoteOutcome {
    /** Stored vote after the change; null after removal */
    vote: Vote | null;
    delta: number;
    /** Target karma after the change */
    score: number;
}

/**
 * Resolve a request to exactly one post or one comment
 */
export function resolveVoteTarget(request: VoteTargetRequest): VoteTarget {
    const { postId, commentId } = request;

    if (postId && commentId) {
        throw new InvalidTargetError('Vote must be on either a post or a comment, not both');
    }
    if (postId) {
        return { type: 'post', id: postId };
    }
    if (commentId) {
        return { type: 'comment', id: commentId };
    }
    throw new InvalidTargetError('Vote must be on either a post or a comment');
}

/**
 * Cast, change and remove votes with the paired karma update.
 *
 * Each mutation holds the subsystem lock exclusively and runs its vote
 * read, vote write and score write in one storage transaction.
 */
export class VoteService {
    private readonly ledger = new VoteLedger();
    private readonly karma = new KarmaAccumulator();

    constructor(
        private readonly store: VoteStore,
        private readonly lock: SubsystemLock
    ) {}

    async castVote(userId: string, input: VoteRequest): Promise<VoteOutcome> {
        const { value, ...request } = parseInput(voteSchema, input);
        const target = resolveVoteTarget(request);

        return this.commit('castVote', target, (tx) => this.ledger.cast(tx, userId, target, value));
    }

    async changeVote(userId: string, input: VoteRequest): Promise<VoteOutcome> {
        const { value, ...request } = parseInput(voteSchema, input);
        const target = resolveVoteTarget(request);

        return this.commit('changeVote', target, (tx) =>
            this.ledger.change(tx, userId, target, value)
        );
    }

    async removeVote(userId: string, input: VoteTargetRequest): Promise<VoteOutcome> {
        const target = resolveVoteTarget(parseInput(voteTargetSchema, input));

        return this.commit('removeVote', target, (tx) => this.ledger.remove(tx, userId, target));
    }

    async getVote(userId: string, input: VoteTargetRequest): Promise<Vote> {
        const target = resolveVoteTarget(parseInput(voteTargetSchema, input));

        return this.lock.read(async () => {
            const vote = await this.store.getVote({ userId, target });
            if (!vote) {
                throw new NotFoundError('Vote');
            }
            return vote;
        });
    }

    private commit(
        operation: string,
        target: VoteTarget,
        mutate: (tx: VoteTransaction) => Promise<LedgerChange>
    ): Promise<VoteOutcome> {
        return this.lock.write(async () => {
            try {
                return await this.store.runTransaction(async (tx) => {
                    // All reads (score, then the vote inside mutate) precede the writes
                    const snapshot = await this.karma.load(tx, target);
                    const change = await mutate(tx);
                    const score = await this.karma.applyDelta(tx, snapshot, change.delta);
                    return { vote: change.vote, delta: change.delta, score };
                });
            } catch (error) {
                if (error instanceof ApiError) throw error;

                console.error(`${operation} on ${target.type} ${target.id} rolled back:`, error);
                throw new InternalError(`Failed to ${operation}; vote and karma left unchanged`);
            }
        });
    }
}
