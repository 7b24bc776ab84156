import * as admin from 'firebase-admin';

/**
 * Lazily initialized Firestore handle for the secondary Health Index tier.
 * Nothing touches firebase-admin until the first fallback write or read.
 */

let firestoreInstance: admin.firestore.Firestore | null = null;

export function getFirestore(projectId: string): admin.firestore.Firestore {
  if (firestoreInstance) return firestoreInstance;

  if (!admin.apps.length) {
    admin.initializeApp({
      credential: admin.credential.applicationDefault(),
      projectId
    });
    console.log(`[Firestore] firebase-admin initialized for project ${projectId}`);
  }

  firestoreInstance = admin.firestore();
  return firestoreInstance;
}
