// src/services/repositories/index.ts

export { BaseRepository } from './BaseRepository';
export type { BaseEntity, QueryFilter } from './BaseRepository';

export type {
    AnchorField,
    ListOrder,
    NewPost,
    NewVote,
    PostChanges,
    PostRepository,
    ThreadRepository,
    VoteStore,
    VoteTransaction,
} from './types';

export {
    commentRecordSchema,
    messageRecordSchema,
    postRecordSchema,
    voteRecordSchema,
} from './schemas';

export {
    COMMENTS_COLLECTION,
    MESSAGES_COLLECTION,
    POSTS_COLLECTION,
    TARGET_COLLECTIONS,
    VOTES_COLLECTION,
} from './collections';

export { FirestorePostRepository } from './firestore/FirestorePostRepository';
export { FirestoreThreadRepository } from './firestore/FirestoreThreadRepository';
export { FirestoreVoteStore } from './firestore/FirestoreVoteStore';

export { MemoryDatabase } from './memory/MemoryDatabase';
export type { MemoryDatabaseOptions } from './memory/MemoryDatabase';
export { MemoryPostRepository } from './memory/MemoryPostRepository';
export { MemoryThreadRepository } from './memory/MemoryThreadRepository';
export { MemoryVoteStore, MemoryVoteTransaction } from './memory/MemoryVoteStore';
