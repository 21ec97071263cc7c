// src/lib/config.ts

import { z } from 'zod';

const envSchema = z.object({
    STORE_DRIVER: z.enum(['firestore', 'memory']).default('firestore'),
    FIREBASE_SERVICE_ACCOUNT: z.string().min(1).optional(),
    FIREBASE_PROJECT_ID: z.string().min(1).optional(),
    LOCK_MAX_READERS: z.coerce.number().int().min(1).max(10000).default(64),
});

export type StoreDriver = z.infer<typeof envSchema>['STORE_DRIVER'];

/**
 * Runtime configuration for the community core
 */
export interface AppConfig {
    storeDriver: StoreDriver;
    firebase: {
        serviceAccountJson?: string;
        projectId?: string;
    };
    /** Concurrent readers admitted by the subsystem lock */
    lockMaxReaders: number;
}

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        const fields = Object.keys(result.error.flatten().fieldErrors).join(', ');
        throw new Error(`Invalid environment configuration: ${fields}`);
    }

    const parsed = result.data;
    return {
        storeDriver: parsed.STORE_DRIVER,
        firebase: {
            serviceAccountJson: parsed.FIREBASE_SERVICE_ACCOUNT,
            projectId: parsed.FIREBASE_PROJECT_ID,
        },
        lockMaxReaders: parsed.LOCK_MAX_READERS,
    };
}
