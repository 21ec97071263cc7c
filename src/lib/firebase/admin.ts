// src/lib/firebase/admin.ts

import { initializeApp, getApps, cert, type App, type ServiceAccount } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';
import { z } from 'zod';
import type { AppConfig } from '@/lib/config';

let adminApp: App | undefined;
let adminDb: Firestore | undefined;

const serviceAccountSchema = z
    .object({
        project_id: z.string().optional(),
        client_email: z.string().min(1),
        private_key: z.string().min(1),
    })
    .transform((account): ServiceAccount => ({
        projectId: account.project_id,
        clientEmail: account.client_email,
        privateKey: account.private_key,
    }));

function parseServiceAccount(json: string): ServiceAccount {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch {
        throw new Error('FIREBASE_SERVICE_ACCOUNT is not valid JSON');
    }

    const result = serviceAccountSchema.safeParse(parsed);
    if (!result.success) {
        throw new Error('FIREBASE_SERVICE_ACCOUNT is missing client_email or private_key');
    }
    return result.data;
}

/**
 * Initialize Firebase Admin SDK
 * Uses service account credentials from configuration
 */
function initializeFirebaseAdmin(config: AppConfig['firebase']): App {
    const apps = getApps();

    if (apps.length > 0 && apps[0]) {
        return apps[0];
    }

    if (!config.serviceAccountJson) {
        throw new Error('FIREBASE_SERVICE_ACCOUNT environment variable is not set');
    }

    const app = initializeApp({
        credential: cert(parseServiceAccount(config.serviceAccountJson)),
        projectId: config.projectId,
    });

    // Configure Firestore settings
    const db = getFirestore(app);
    db.settings({
        ignoreUndefinedProperties: true,
    });

    return app;
}

/**
 * Get Firebase Admin App instance
 */
export function getAdminApp(config: AppConfig['firebase']): App {
    if (!adminApp) {
        adminApp = initializeFirebaseAdmin(config);
    }
    return adminApp;
}

/**
 * Get Firebase Admin Firestore instance
 */
export function getAdminDb(config: AppConfig['firebase']): Firestore {
    if (!adminDb) {
        adminDb = getFirestore(getAdminApp(config));
    }
    return adminDb;
}
