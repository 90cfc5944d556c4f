import { BehaviorSubject } from 'rxjs';
import { Unsubscribe } from '../data/document-store';

export interface SessionUser {
  uid: string;
  displayName: string | null;
  photoURL: string | null;
  email?: string | null;
}

export type AuthStateSource = (
  next: (user: SessionUser | null) => void,
  error: (error: Error) => void,
) => Unsubscribe;

export class AuthStore {
  readonly user$ = new BehaviorSubject<SessionUser | null>(null);
  private unsubscribeAuth?: Unsubscribe;
  private initialAuthResolved = false;
  private initialAuthPromise: Promise<void>;
  private resolveInitialAuth?: () => void;

  constructor(source: AuthStateSource) {
    this.initialAuthPromise = new Promise(resolve => {
      this.resolveInitialAuth = resolve;
    });

    this.unsubscribeAuth = source(
      user => this.handleAuthChange(user),
      error => {
        console.error('Auth state listener failed', error);
        this.handleAuthChange(null);
      },
    );
  }

  currentUser(): SessionUser | null {
    return this.user$.value;
  }

  waitForInitialAuth(): Promise<void> {
    return this.initialAuthResolved ? Promise.resolve() : this.initialAuthPromise;
  }

  isInitialAuthResolved() {
    return this.initialAuthResolved;
  }

  stop() {
    this.unsubscribeAuth?.();
    this.unsubscribeAuth = undefined;
  }

  private handleAuthChange(user: SessionUser | null) {
    const current = this.user$.value;
    // Token refreshes re-emit the same user; only identity changes matter here.
    if (current?.uid !== user?.uid || !this.initialAuthResolved) {
      this.user$.next(user);
    }
    this.markInitialAuthDone();
  }

  private markInitialAuthDone() {
    if (this.initialAuthResolved) {
      return;
    }
    this.initialAuthResolved = true;
    this.resolveInitialAuth?.();
  }
}
