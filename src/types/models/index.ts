// src/types/models/index.ts

// Thread models
export type { ThreadNode, ThreadNodeStructure, NewThreadNode } from './ThreadNode';

// Post models
export type { Post } from './Post';
export { DEFAULT_POST_KARMA } from './Post';

// Comment models
export type { Comment } from './Comment';
export { DEFAULT_COMMENT_KARMA } from './Comment';

// Message models
export type { Message } from './Message';

// Vote models
export type { Vote, VoteValue, VoteTargetType, VoteTarget, VoteKey } from './Vote';
export { getVoteId, getVoteIdForKey } from './Vote';
