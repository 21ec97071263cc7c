// src/services/threads/ThreadPolicy.ts

import type { NewThreadNode, ThreadNode } from '@/types/models';
import type { AnchorField } from '@/services/repositories/types';

/**
 * Fields the store settles before asking the policy for a new root
 */
export interface RootDraft {
    id: string;
    authorId: string;
    content: string;
}

/**
 * Fields the store settles before asking the policy for a reply;
 * parentId and rootId come from the parent and must be kept
 */
export interface ReplyDraft extends RootDraft {
    parentId: string;
    rootId: string;
}

/**
 * What differs between two kinds of thread: how a root is anchored,
 * how a reply's counterpart is derived, and what top-level listings filter on.
 */
export interface ThreadPolicy<T extends ThreadNode, TRootInput> {
    /** Name used in error messages, e.g. "Comment" */
    readonly nodeLabel: string;
    /** Field top-level listings filter on */
    readonly anchorField: AnchorField<T>;
    /** Reject a listing whose anchor does not exist */
    assertAnchor?(anchorId: string): Promise<void>;
    buildRoot(draft: RootDraft, input: TRootInput): Promise<NewThreadNode<T>>;
    buildReply(draft: ReplyDraft, parent: T): NewThreadNode<T>;
}
