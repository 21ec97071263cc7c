// src/index.ts

export { loadConfig } from './lib/config';
export type { AppConfig, StoreDriver } from './lib/config';
export * from './lib/api';
export { SubsystemLock } from './lib/db';
export * from './services';
export { MemoryDatabase } from './services/repositories';
export type { MemoryDatabaseOptions, PostChanges } from './services/repositories';
export * from './types/models';
export * from './types/api';
