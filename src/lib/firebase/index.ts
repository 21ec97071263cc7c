// src/lib/firebase/index.ts

export { getAdminApp, getAdminDb } from './admin';
