import { initializeApp, getApps, getApp, cert, type App } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';

export type FirebaseAdminCredentials = {
    projectId?: string;
    clientEmail?: string;
    privateKey?: string;
};

/**
 * Returns the shared admin app, initializing it from service-account
 * credentials on first use.
 */
export function getAdminApp(credentials: FirebaseAdminCredentials = readCredentialsFromEnv()): App {
    if (getApps().length > 0) {
        return getApp();
    }

    const { projectId, clientEmail, privateKey } = credentials;

    if (!projectId || !clientEmail || !privateKey) {
        throw new Error('Missing Firebase Admin configuration in environment variables.');
    }

    return initializeApp({
        credential: cert({
            projectId,
            clientEmail,
            privateKey: privateKey.replace(/\\n/g, '\n'),
        }),
    });
}

let firestore: Firestore | null = null;

export function getAdminFirestore(credentials?: FirebaseAdminCredentials): Firestore {
    if (firestore) {
        return firestore;
    }
    firestore = getFirestore(getAdminApp(credentials));
    // Optional record fields are written as absent, not as explicit undefined.
    firestore.settings({ ignoreUndefinedProperties: true });
    return firestore;
}

function readCredentialsFromEnv(): FirebaseAdminCredentials {
    return {
        projectId: process.env.FIREBASE_PROJECT_ID,
        clientEmail: process.env.FIREBASE_CLIENT_EMAIL,
        privateKey: process.env.FIREBASE_PRIVATE_KEY,
    };
}
