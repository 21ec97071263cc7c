// src/services/threads/policies.ts

import { NotFoundError, SelfReferenceError } from '@/lib/api';
import type { AnchorField, PostRepository } from '@/services/repositories/types';
import { DEFAULT_COMMENT_KARMA, type Comment, type Message, type NewThreadNode } from '@/types/models';
import type { ReplyDraft, RootDraft, ThreadPolicy } from './ThreadPolicy';

export interface CommentRootInput {
    postId: string;
}

export interface MessageRootInput {
    receiverId: string;
}

/**
 * Comments hang off a post: the root anchor is the post id,
 * top-level listings are per post.
 */
export class CommentThreadPolicy implements ThreadPolicy<Comment, CommentRootInput> {
    readonly nodeLabel = 'Comment';
    readonly anchorField: AnchorField<Comment> = 'rootId';

    constructor(private readonly posts: PostRepository) {}

    async assertAnchor(postId: string): Promise<void> {
        if (!(await this.posts.exists(postId))) {
            throw new NotFoundError('Post');
        }
    }

    async buildRoot(draft: RootDraft, input: CommentRootInput): Promise<NewThreadNode<Comment>> {
        await this.assertAnchor(input.postId);
        return {
            ...draft,
            parentId: null,
            rootId: input.postId,
            karma: DEFAULT_COMMENT_KARMA,
        };
    }

    buildReply(draft: ReplyDraft): NewThreadNode<Comment> {
        return { ...draft, karma: DEFAULT_COMMENT_KARMA };
    }
}

/**
 * Messages form conversations: an opening message is its own root and
 * a reply always goes back to the author of the message it answers.
 * Top-level listings are a user's inbox of opening messages.
 */
export class MessageThreadPolicy implements ThreadPolicy<Message, MessageRootInput> {
    readonly nodeLabel = 'Message';
    readonly anchorField: AnchorField<Message> = 'receiverId';

    async buildRoot(draft: RootDraft, input: MessageRootInput): Promise<NewThreadNode<Message>> {
        if (draft.authorId === input.receiverId) {
            throw new SelfReferenceError('Cannot send a message to yourself');
        }
        return {
            ...draft,
            parentId: null,
            rootId: draft.id,
            receiverId: input.receiverId,
        };
    }

    buildReply(draft: ReplyDraft, parent: Message): NewThreadNode<Message> {
        const receiverId = parent.authorId;
        if (draft.authorId === receiverId) {
            throw new SelfReferenceError('Cannot reply to your own message');
        }
        return { ...draft, receiverId };
    }
}
