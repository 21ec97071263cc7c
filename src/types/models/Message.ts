// src/types/models/Message.ts

import type { ThreadNode } from './ThreadNode';

/**
 * Direct message. A conversation is rooted at the message that opened it:
 * an opening message is its own root, every reply carries the opener's id.
 */
export interface Message extends ThreadNode {
    receiverId: string;
}
