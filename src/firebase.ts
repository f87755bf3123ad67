import { cert, getApps, initializeApp, applicationDefault, type App } from "firebase-admin/app";
import { getAuth, type Auth } from "firebase-admin/auth";
import { getFirestore, type Firestore } from "firebase-admin/firestore";
import type { AppConfig } from "./config.js";

export interface FirebaseClients {
    app: App;
    auth: Auth;
    db: Firestore;
}

/**
 * Initializes the default Firebase app once. A service-account file is used
 * when GOOGLE_APPLICATION_CREDENTIALS is set, otherwise the ambient
 * application-default credentials.
 */
export function initFirebase(config: AppConfig["firebase"]): FirebaseClients {
    const [existing] = getApps();
    const app =
        existing ??
        initializeApp({
            credential: config.credentialsPath ? cert(config.credentialsPath) : applicationDefault(),
            projectId: config.projectId,
        });

    const db = getFirestore(app);
    if (!existing) {
        // optional fields are written as null; anything left undefined is skipped
        db.settings({ ignoreUndefinedProperties: true });
    }

    return { app, auth: getAuth(app), db };
}
