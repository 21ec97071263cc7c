// src/services/repositories/types.ts

import type {
    NewThreadNode,
    Post,
    ThreadNode,
    Vote,
    VoteKey,
    VoteTarget,
    VoteValue,
} from '@/types/models';
import type { PageRequest } from '@/types/api';

/**
 * Sort direction on (createdAt, id)
 */
export type ListOrder = 'asc' | 'desc';

/**
 * Vote as handed to the store; id and timestamps are assigned on insert
 */
export type NewVote = Omit<Vote, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Post as handed to the store
 */
export type NewPost = Omit<Post, 'id' | 'karma' | 'createdAt' | 'updatedAt'>;

/**
 * Post fields an author may change; karma is never among them
 */
export type PostChanges = Partial<Pick<Post, 'title' | 'content'>>;

/**
 * Reads and writes that commit or roll back together.
 * Every read of a transaction must happen before its first write.
 */
export interface VoteTransaction {
    getVote(key: VoteKey): Promise<Vote | null>;
    insertVote(vote: NewVote): Promise<Vote>;
    /** Returns the new modification timestamp */
    updateVoteValue(voteId: string, value: VoteValue): Promise<{ updatedAt: string }>;
    deleteVote(voteId: string): Promise<boolean>;
    /** null when the target record does not exist */
    getScore(target: VoteTarget): Promise<number | null>;
    setScore(target: VoteTarget, score: number): Promise<void>;
}

export interface VoteStore {
    getVote(key: VoteKey): Promise<Vote | null>;
    runTransaction<T>(work: (tx: VoteTransaction) => Promise<T>): Promise<T>;
}

/**
 * String-valued field of a node that top-level listings filter on
 */
export type AnchorField<T> = {
    [K in keyof T]-?: T[K] extends string ? K : never;
}[keyof T] &
    string;

export interface ThreadRepository<T extends ThreadNode> {
    newId(): string;
    insert(node: NewThreadNode<T>): Promise<T>;
    findById(id: string): Promise<T | null>;
    updateContent(id: string, content: string): Promise<T | null>;
    /** Direct children of a node */
    listChildren(parentId: string, order: ListOrder, page: PageRequest): Promise<T[]>;
    /** Nodes without a parent whose anchor field equals anchorId */
    listRootsFor(
        anchorField: AnchorField<T>,
        anchorId: string,
        order: ListOrder,
        page: PageRequest
    ): Promise<T[]>;
}

export interface PostRepository {
    create(post: NewPost): Promise<Post>;
    findById(id: string): Promise<Post | null>;
    exists(id: string): Promise<boolean>;
    /** Returns the updated post, or null when absent */
    update(id: string, changes: PostChanges): Promise<Post | null>;
    listByCommunity(communityId: string, page: PageRequest): Promise<Post[]>;
    /** Every post, newest first */
    listAll(page: PageRequest): Promise<Post[]>;
}
