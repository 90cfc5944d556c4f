import {
  Auth,
  User,
  createUserWithEmailAndPassword,
  onAuthStateChanged,
  signInWithEmailAndPassword,
  signOut,
  updateProfile,
} from 'firebase/auth';
import { toStoreError } from '../errors/messaging-errors';
import { AuthStateSource, SessionUser } from '../store/auth.store';

export function toSessionUser(user: User): SessionUser {
  return {
    uid: user.uid,
    displayName: user.displayName ?? null,
    photoURL: user.photoURL ?? null,
    email: user.email ?? null,
  };
}

export class AuthService {
  constructor(private auth: Auth) {}

  async register(email: string, password: string, name: string) {
    try {
      const cred = await createUserWithEmailAndPassword(this.auth, email, password);
      await updateProfile(cred.user, { displayName: name });
      return toSessionUser(cred.user);
    } catch (error) {
      throw toStoreError(error, 'register');
    }
  }

  async login(email: string, password: string) {
    try {
      const cred = await signInWithEmailAndPassword(this.auth, email, password);
      return toSessionUser(cred.user);
    } catch (error) {
      throw toStoreError(error, 'login');
    }
  }

  /** Listeners of the signed-out session are torn down by the session manager. */
  logout() {
    return signOut(this.auth);
  }

  authState(): AuthStateSource {
    return (next, error) =>
      onAuthStateChanged(
        this.auth,
        user => next(user ? toSessionUser(user) : null),
        err => error(err),
      );
  }
}
