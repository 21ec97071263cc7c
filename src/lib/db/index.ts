// src/lib/db/index.ts

export { withTransaction, docRef, generateId } from './firestore';
export { SubsystemLock, DEFAULT_MAX_READERS } from './lock';
