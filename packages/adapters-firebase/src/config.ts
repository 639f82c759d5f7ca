/**
 * @fileoverview Firestore connection settings
 * @description Environment-driven configuration and FirestoreStore bootstrap
 */

import * as admin from 'firebase-admin';
import { getFirestore } from 'firebase-admin/firestore';
import { FirestoreStore } from './store';

export interface FirestoreEnvConfig {
  /** Google Cloud project ID */
  projectId?: string;
  /** host:port of a Firestore emulator */
  emulatorHost?: string;
  /** Named database (defaults to "(default)") */
  databaseId?: string;
}

export function loadFirestoreConfig(env: NodeJS.ProcessEnv = process.env): FirestoreEnvConfig {
  return {
    projectId: env.GOOGLE_CLOUD_PROJECT || env.GCLOUD_PROJECT || undefined,
    emulatorHost: env.FIRESTORE_EMULATOR_HOST || undefined,
    databaseId: env.FIRESTORE_DATABASE_ID || undefined,
  };
}

/**
 * Create a FirestoreStore on the default Firebase app, initialising the app
 * when none exists yet.
 */
export function initializeFirestoreStore(
  config: FirestoreEnvConfig = loadFirestoreConfig(),
): FirestoreStore {
  const app = admin.apps.length > 0
    ? admin.app()
    : admin.initializeApp(config.projectId ? { projectId: config.projectId } : undefined);

  const firestore = config.databaseId ? getFirestore(app, config.databaseId) : getFirestore(app);

  if (config.emulatorHost) {
    // firebase-admin already honours FIRESTORE_EMULATOR_HOST; only explicit hosts need settings()
    if (process.env.FIRESTORE_EMULATOR_HOST !== config.emulatorHost) {
      firestore.settings({ host: config.emulatorHost, ssl: false });
    }
    console.info(`[firemapper:firestore] using emulator at ${config.emulatorHost}`);
  }

  return new FirestoreStore({ firestore });
}
