import { FirebaseApp, initializeApp } from 'firebase/app';
import { Auth, getAuth } from 'firebase/auth';
import { Firestore, getFirestore } from 'firebase/firestore';

import { FirebaseConfig, environment } from '../environments/environment';

export interface FirebaseServices {
  app: FirebaseApp;
  auth: Auth;
  db: Firestore;
}

let services: FirebaseServices | undefined;

// --- Firebase initialization (once per process)
export function firebaseServices(config: FirebaseConfig = environment.firebase): FirebaseServices {
  if (!services) {
    const app = initializeApp(config);
    services = {
      app,
      auth: getAuth(app),
      db: getFirestore(app),
    };
  }
  return services;
}
