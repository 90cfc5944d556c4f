import { environment } from '../environments/environment';
import { firebaseServices } from './app.config';
import { FirestoreDocumentStore } from './core/data/firestore-document-store';
import { AuthService } from './core/services/auth';
import { AuthStore } from './core/store/auth.store';
import { createMessagingServices } from './core/store/messaging-session';
import { MessagingSessionManager } from './core/store/session.manager';

export interface MessagingApp {
  auth: AuthService;
  authStore: AuthStore;
  sessions: MessagingSessionManager;
  /** Ends the current session and stops listening to auth changes. */
  shutdown(): void;
}

export function createMessagingApp(): MessagingApp {
  const { auth, db } = firebaseServices();
  const authService = new AuthService(auth);
  const authStore = new AuthStore(authService.authState());
  const sessions = new MessagingSessionManager(
    authStore,
    createMessagingServices(new FirestoreDocumentStore(db), environment.messaging),
  );

  return {
    auth: authService,
    authStore,
    sessions,
    shutdown: () => {
      sessions.stop();
      authStore.stop();
    },
  };
}
