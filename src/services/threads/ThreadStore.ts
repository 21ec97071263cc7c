// src/services/threads/ThreadStore.ts

import {
    AuthorizationError,
    InternalError,
    InvalidTargetError,
    NotFoundError,
    SelfReferenceError,
} from '@/lib/api';
import type { SubsystemLock } from '@/lib/db';
import type { ThreadRepository } from '@/services/repositories/types';
import type { PageRequest } from '@/types/api';
import type { NewThreadNode, ThreadNode } from '@/types/models';
import type { ThreadPolicy } from './ThreadPolicy';

/**
 * Self-referential hierarchy shared by comments and messages.
 *
 * Nodes live in one collection addressed by id. A reply can only name a
 * parent that already exists, and takes the parent's root, so the nodes
 * form a forest. Structure is fixed at creation; only content changes later.
 */
export class ThreadStore<T extends ThreadNode, TRootInput> {
    constructor(
        private readonly repository: ThreadRepository<T>,
        private readonly policy: ThreadPolicy<T, TRootInput>,
        private readonly lock: SubsystemLock
    ) {}

    get nodeLabel(): string {
        return this.policy.nodeLabel;
    }

    /**
     * Start a new thread (parentId = null)
     */
    createRoot(authorId: string, content: string, input: TRootInput): Promise<T> {
        return this.lock.write(async () => {
            const draft = await this.policy.buildRoot(
                { id: this.repository.newId(), authorId, content },
                input
            );
            if (draft.parentId !== null) {
                throw new InternalError(`${this.nodeLabel} root must not have a parent`);
            }
            return this.repository.insert(draft);
        });
    }

    /**
     * Reply to an existing node.
     * expectedRootId, when given, must match the parent's root.
     */
    createReply(
        parentId: string,
        authorId: string,
        content: string,
        expectedRootId?: string
    ): Promise<T> {
        return this.lock.write(async () => {
            const parent = await this.repository.findById(parentId);
            if (!parent) {
                throw new NotFoundError(`Parent ${this.nodeLabel.toLowerCase()}`);
            }

            if (expectedRootId !== undefined && expectedRootId !== parent.rootId) {
                throw new InvalidTargetError(
                    `Parent ${this.nodeLabel.toLowerCase()} belongs to a different thread`,
                    { expectedRootId, parentRootId: parent.rootId }
                );
            }

            const draft = this.policy.buildReply(
                {
                    id: this.repository.newId(),
                    authorId,
                    content,
                    parentId: parent.id,
                    rootId: parent.rootId,
                },
                parent
            );
            this.assertReplyStructure(draft, parent);

            return this.repository.insert(draft);
        });
    }

    private assertReplyStructure(draft: NewThreadNode<T>, parent: T): void {
        if (draft.parentId !== parent.id || draft.rootId !== parent.rootId) {
            throw new InvalidTargetError(`${this.nodeLabel} reply must stay in its parent's thread`);
        }
        if (draft.id === parent.id) {
            throw new SelfReferenceError(`${this.nodeLabel} cannot be its own parent`);
        }
    }

    /**
     * Get a node by id
     */
    get(id: string): Promise<T> {
        return this.lock.read(async () => {
            const node = await this.repository.findById(id);
            if (!node) {
                throw new NotFoundError(this.nodeLabel);
            }
            return node;
        });
    }

    /**
     * Top-level nodes under an anchor, newest first
     */
    listRoots(anchorId: string, page: PageRequest): Promise<T[]> {
        return this.lock.read(async () => {
            if (this.policy.assertAnchor) {
                await this.policy.assertAnchor(anchorId);
            }
            return this.repository.listRootsFor(this.policy.anchorField, anchorId, 'desc', page);
        });
    }

    /**
     * Direct children of a node, oldest first
     */
    listReplies(parentId: string, page: PageRequest): Promise<T[]> {
        return this.lock.read(async () => {
            const parent = await this.repository.findById(parentId);
            if (!parent) {
                throw new NotFoundError(`Parent ${this.nodeLabel.toLowerCase()}`);
            }
            return this.repository.listChildren(parent.id, 'asc', page);
        });
    }

    /**
     * Replace a node's content; only its author may do so
     */
    editContent(id: string, editorId: string, content: string): Promise<T> {
        return this.lock.write(async () => {
            const node = await this.repository.findById(id);
            if (!node) {
                throw new NotFoundError(this.nodeLabel);
            }

            if (node.authorId !== editorId) {
                throw new AuthorizationError(
                    `You can only edit your own ${this.nodeLabel.toLowerCase()}s`
                );
            }

            const updated = await this.repository.updateContent(id, content);
            if (!updated) {
                throw new NotFoundError(this.nodeLabel);
            }
            return updated;
        });
    }
}
