// src/types/models/ThreadNode.ts

/**
 * Node of a self-referential thread (comments under a post, messages in a conversation).
 * Parent and root are id references into the same collection, never embedded objects.
 */
export interface ThreadNode {
    id: string;
    parentId: string | null;
    rootId: string;
    authorId: string;
    content: string;
    createdAt: string;
    updatedAt?: string;
}

/**
 * Fields fixed at creation time
 */
export type ThreadNodeStructure = Pick<ThreadNode, 'id' | 'parentId' | 'rootId' | 'authorId'>;

/**
 * Node as handed to a repository for insertion; timestamps are assigned on insert
 */
export type NewThreadNode<T extends ThreadNode> = ThreadNodeStructure &
    Pick<ThreadNode, 'content'> &
    Omit<T, keyof ThreadNode>;
