import { BehaviorSubject, Subscription } from 'rxjs';
import { AuthStore, SessionUser } from './auth.store';
import { MessagingServices, MessagingSession } from './messaging-session';

/**
 * Keeps one MessagingSession per signed-in user. Signing out or switching
 * accounts tears the previous session's listeners down before the next
 * session is published.
 */
export class MessagingSessionManager {
  readonly session$ = new BehaviorSubject<MessagingSession | null>(null);
  private authSub?: Subscription;

  constructor(
    private authStore: AuthStore,
    private services: MessagingServices,
  ) {
    this.authSub = this.authStore.user$.subscribe(user => this.switchTo(user));
  }

  current(): MessagingSession | null {
    return this.session$.value;
  }

  stop() {
    this.authSub?.unsubscribe();
    this.authSub = undefined;
    this.endCurrent();
    this.session$.next(null);
  }

  private switchTo(user: SessionUser | null) {
    const current = this.session$.value;
    if (current && current.user.uid === user?.uid) {
      return;
    }

    this.endCurrent();
    this.session$.next(user ? new MessagingSession(user, this.services) : null);
  }

  private endCurrent() {
    const current = this.session$.value;
    if (!current?.isActive()) return;

    const report = current.teardownAllSubscriptions();
    if (report.failures.length) {
      console.warn(`Session for ${current.user.uid} ended with ${report.failures.length} listener(s) not shut down`);
    }
  }
}
