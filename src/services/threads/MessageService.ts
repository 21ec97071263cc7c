// src/services/threads/MessageService.ts

import { parseInput, parsePage } from '@/lib/api';
import type { SubsystemLock } from '@/lib/db';
import type { ThreadRepository } from '@/services/repositories/types';
import {
    replyMessageSchema,
    sendMessageSchema,
    updateContentSchema,
    type PageQuery,
    type ReplyMessageRequest,
    type SendMessageRequest,
    type UpdateContentRequest,
} from '@/types/api';
import type { Message } from '@/types/models';
import { MessageThreadPolicy, type MessageRootInput } from './policies';
import { ThreadStore } from './ThreadStore';

/**
 * Threaded direct messages
 */
export class MessageService {
    private readonly threads: ThreadStore<Message, MessageRootInput>;

    constructor(messages: ThreadRepository<Message>, lock: SubsystemLock) {
        this.threads = new ThreadStore(messages, new MessageThreadPolicy(), lock);
    }

    async sendMessage(senderId: string, input: SendMessageRequest): Promise<Message> {
        const { receiverId, content } = parseInput(sendMessageSchema, input);
        return this.threads.createRoot(senderId, content, { receiverId });
    }

    /**
     * Replies go to the parent's sender; a receiverId in the request is ignored
     */
    async replyToMessage(senderId: string, input: ReplyMessageRequest): Promise<Message> {
        const { parentId, content } = parseInput(replyMessageSchema, input);
        return this.threads.createReply(parentId, senderId, content);
    }

    async getMessage(id: string): Promise<Message> {
        return this.threads.get(id);
    }

    /**
     * Conversations opened towards a user, newest first
     */
    async getMessagesForUser(userId: string, query?: PageQuery): Promise<Message[]> {
        return this.threads.listRoots(userId, parsePage(query));
    }

    /**
     * Direct replies to a message, oldest first
     */
    async getMessageReplies(parentId: string, query?: PageQuery): Promise<Message[]> {
        return this.threads.listReplies(parentId, parsePage(query));
    }

    async editMessage(id: string, editorId: string, input: UpdateContentRequest): Promise<Message> {
        const { content } = parseInput(updateContentSchema, input);
        return this.threads.editContent(id, editorId, content);
    }
}
