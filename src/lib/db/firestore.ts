// src/lib/db/firestore.ts

import type { DocumentReference, Firestore, Transaction } from 'firebase-admin/firestore';

/**
 * Execute operations within a transaction
 * Firestore retries the callback on contention, so it must only
 * touch data through the transaction it is given.
 */
export async function withTransaction<T>(
    db: Firestore,
    callback: (transaction: Transaction) => Promise<T>
): Promise<T> {
    return db.runTransaction(callback);
}

/**
 * Create a document reference
 */
export function docRef(db: Firestore, collection: string, id: string): DocumentReference {
    return db.collection(collection).doc(id);
}

/**
 * Generate a new document ID
 */
export function generateId(db: Firestore, collection: string): string {
    return db.collection(collection).doc().id;
}
