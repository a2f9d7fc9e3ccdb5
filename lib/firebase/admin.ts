import { initializeApp, getApps, cert, type App, type ServiceAccount } from "firebase-admin/app";
import { getFirestore, type Firestore } from "firebase-admin/firestore";
import { readFileSync } from "fs";
import { isAbsolute, join } from "path";

export interface FirebaseSettings {
  projectId?: string;
  serviceAccountPath?: string;
  serviceAccountKey?: string;
}

function getCredential(settings: FirebaseSettings): ServiceAccount | null {
  const path = settings.serviceAccountPath?.trim();
  if (path) {
    const resolved = isAbsolute(path) ? path : join(process.cwd(), path);
    return JSON.parse(readFileSync(resolved, "utf-8")) as ServiceAccount;
  }
  const key = settings.serviceAccountKey?.trim();
  if (key) {
    return JSON.parse(key) as ServiceAccount;
  }
  return null;
}

let db: Firestore | null = null;

/**
 * Firestore handle, initialized on first use so runs on the file store never touch Firebase.
 * Throws when the app cannot be initialized; a run without its state store must not proceed.
 */
export function getAdminDb(settings: FirebaseSettings): Firestore {
  if (db) return db;
  const existing = getApps()[0];
  let app: App;
  if (existing) {
    app = existing;
  } else {
    const cred = getCredential(settings);
    if (!cred) {
      console.warn(
        "[firebase] No service account credential loaded. Set FIREBASE_SERVICE_ACCOUNT_PATH (path to JSON key file) or FIREBASE_SERVICE_ACCOUNT_KEY (JSON string); falling back to application default credentials.",
        { projectId: settings.projectId ?? "(missing)" }
      );
    }
    app = initializeApp({
      projectId: settings.projectId,
      ...(cred ? { credential: cert(cred) } : {}),
    });
  }
  db = getFirestore(app);
  return db;
}
