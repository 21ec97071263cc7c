// src/services/index.ts

import type { AppConfig } from '@/lib/config';
import { SubsystemLock } from '@/lib/db';
import { getAdminDb } from '@/lib/firebase';
import type { Comment, Message } from '@/types/models';
import { PostService } from './posts/PostService';
import {
    COMMENTS_COLLECTION,
    commentRecordSchema,
    FirestorePostRepository,
    FirestoreThreadRepository,
    FirestoreVoteStore,
    MemoryDatabase,
    MemoryPostRepository,
    MemoryThreadRepository,
    MemoryVoteStore,
    MESSAGES_COLLECTION,
    messageRecordSchema,
    type PostRepository,
    type ThreadRepository,
    type VoteStore,
} from './repositories';
import { CommentService } from './threads/CommentService';
import { MessageService } from './threads/MessageService';
import { VoteService } from './votes/VoteService';

/**
 * Storage behind the services
 */
export interface Repositories {
    posts: PostRepository;
    comments: ThreadRepository<Comment>;
    messages: ThreadRepository<Message>;
    votes: VoteStore;
}

export interface CommunityCore {
    posts: PostService;
    votes: VoteService;
    comments: CommentService;
    messages: MessageService;
    /** Shared by every service; one writer at a time across the subsystem */
    lock: SubsystemLock;
}

export interface CoreOptions {
    /** In-memory database to use with the memory driver */
    memory?: MemoryDatabase;
}

export function createFirestoreRepositories(config: AppConfig): Repositories {
    const db = getAdminDb(config.firebase);
    return {
        posts: new FirestorePostRepository(db),
        comments: new FirestoreThreadRepository(db, COMMENTS_COLLECTION, commentRecordSchema),
        messages: new FirestoreThreadRepository(db, MESSAGES_COLLECTION, messageRecordSchema),
        votes: new FirestoreVoteStore(db),
    };
}

export function createMemoryRepositories(memory: MemoryDatabase = new MemoryDatabase()): Repositories {
    return {
        posts: new MemoryPostRepository(memory),
        comments: new MemoryThreadRepository(memory, memory.comments, commentRecordSchema),
        messages: new MemoryThreadRepository(memory, memory.messages, messageRecordSchema),
        votes: new MemoryVoteStore(memory),
    };
}

/**
 * Wire the services over one storage driver and one subsystem lock
 */
export function createCommunityCore(config: AppConfig, options: CoreOptions = {}): CommunityCore {
    const repositories = config.storeDriver === 'memory'
        ? createMemoryRepositories(options.memory)
        : createFirestoreRepositories(config);

    if (config.storeDriver === 'memory') {
        console.warn('Community core is using the in-memory store; data is lost on exit');
    }

    const lock = new SubsystemLock(config.lockMaxReaders);

    return {
        posts: new PostService(repositories.posts, lock),
        votes: new VoteService(repositories.votes, lock),
        comments: new CommentService(repositories.comments, repositories.posts, lock),
        messages: new MessageService(repositories.messages, lock),
        lock,
    };
}

export { PostService } from './posts/PostService';
export { VoteService, resolveVoteTarget } from './votes/VoteService';
export type { VoteOutcome } from './votes/VoteService';
export { VoteLedger } from './votes/VoteLedger';
export type { LedgerChange } from './votes/VoteLedger';
export { KarmaAccumulator } from './votes/KarmaAccumulator';
export type { KarmaSnapshot } from './votes/KarmaAccumulator';
export { CommentService } from './threads/CommentService';
export { MessageService } from './threads/MessageService';
export { ThreadStore } from './threads/ThreadStore';
export type { ThreadPolicy, RootDraft, ReplyDraft } from './threads/ThreadPolicy';
export { CommentThreadPolicy, MessageThreadPolicy } from './threads/policies';
export type { CommentRootInput, MessageRootInput } from './threads/policies';
