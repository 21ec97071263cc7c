// src/types/models/Vote.ts

/**
 * Vote value
 */
export type VoteValue = 1 | -1;

/**
 * Vote target type
 */
export type VoteTargetType = 'post' | 'comment';

/**
 * A resolved vote target: exactly one post or one comment
 */
export interface VoteTarget {
    type: VoteTargetType;
    id: string;
}

/**
 * Vote model - tracks upvotes and downvotes
 * Stored in a flat collection: votes/{userId}_{targetType}_{targetId}
 */
export interface Vote {
    id: string;
    userId: string;
    targetId: string;
    targetType: VoteTargetType;
    value: VoteValue;
    createdAt: string;
    updatedAt?: string;
}

/**
 * Lookup key for the single vote a user may hold on a target
 */
export interface VoteKey {
    userId: string;
    target: VoteTarget;
}

/**
 * Composite key for vote lookup
 * One document per (user, target), so a second live vote cannot exist
 */
export function getVoteId(userId: string, targetId: string, targetType: VoteTargetType): string {
    return `${userId}_${targetType}_${targetId}`;
}

export function getVoteIdForKey(key: VoteKey): string {
    return getVoteId(key.userId, key.target.id, key.target.type);
}
