/**
 * @firemapper/adapters-firebase: Firestore backend for @firemapper/core
 */

export { FirestoreStore, MAX_BATCH_WRITES, isGrpcNotFound, toPlainData, toWriteData } from './store';
export type { FirestoreStoreConfig } from './store';

export { initializeFirestoreStore, loadFirestoreConfig } from './config';
export type { FirestoreEnvConfig } from './config';
