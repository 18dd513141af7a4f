import fs from 'node:fs';
import admin from 'firebase-admin';
import { getEnv } from './env.js';
import { errorMessage } from './lib/errors.js';
import type { StoreContext } from './store/firestoreDocumentStore.js';

let app: admin.app.App | undefined;

function initFirebaseApp(): admin.app.App {
  if (app) return app;

  const env = getEnv();

  // Prefer explicit service account json (useful for CI and simple local setup)
  if (env.FIREBASE_SERVICE_ACCOUNT_JSON) {
    const serviceAccount = JSON.parse(env.FIREBASE_SERVICE_ACCOUNT_JSON) as admin.ServiceAccount;
    app = admin.initializeApp({
      credential: admin.credential.cert(serviceAccount)
    });
    return app;
  }

  if (env.FIREBASE_SERVICE_ACCOUNT_PATH) {
    const serviceAccount = JSON.parse(
      fs.readFileSync(env.FIREBASE_SERVICE_ACCOUNT_PATH, { encoding: 'utf8' })
    ) as admin.ServiceAccount;
    app = admin.initializeApp({
      credential: admin.credential.cert(serviceAccount)
    });
    return app;
  }

  // The emulator needs a project id but no credentials.
  if (env.FIRESTORE_EMULATOR_HOST) {
    app = admin.initializeApp({ projectId: env.FIREBASE_PROJECT_ID ?? 'demo-listings' });
    return app;
  }

  // Fallback to ADC (e.g. GOOGLE_APPLICATION_CREDENTIALS)
  app = admin.initializeApp({
    credential: admin.credential.applicationDefault(),
    projectId: env.FIREBASE_PROJECT_ID
  });
  return app;
}

export function getFirestore(): admin.firestore.Firestore {
  initFirebaseApp();
  return admin.firestore();
}

/**
 * Builds the store handle shared by every request. A Firestore that cannot be
 * initialized leaves `db` null: listing endpoints then return no results and
 * lookups and writes report the store as unavailable.
 */
export function createStoreContext(): StoreContext {
  try {
    return { db: getFirestore() };
  } catch (err) {
    console.warn('[firebase] Firestore not initialized; running without a database', {
      error: errorMessage(err)
    });
    return { db: null };
  }
}
