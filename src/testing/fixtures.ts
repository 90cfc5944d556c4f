import { DEFAULT_MESSAGING_CONFIG, MessagingConfig } from '../environments/environment';
import { COLLECTIONS } from '../app/core/constants/collections';
import { Clock } from '../app/core/utils/clock';
import { SessionUser } from '../app/core/store/auth.store';
import { MessagingServices, createMessagingServices } from '../app/core/store/messaging-session';
import { MemoryDocumentStore } from './memory-document-store';

/** Returns `start`, then `start + step`, and so on. */
export function steppingClock(start = 1000, step = 1): Clock {
  let now = start;
  return () => {
    const value = now;
    now += step;
    return value;
  };
}

export const ALICE: SessionUser = {
  uid: 'alice',
  displayName: 'Alice',
  photoURL: 'https://img.test/alice.png',
};

export const BOB: SessionUser = {
  uid: 'bob',
  displayName: 'Bob',
  photoURL: null,
};

export interface Harness {
  store: MemoryDocumentStore;
  services: MessagingServices;
}

export function createHarness(config: MessagingConfig = DEFAULT_MESSAGING_CONFIG, clock = steppingClock()): Harness {
  const store = new MemoryDocumentStore();
  store.seed(COLLECTIONS.users, 'alice', { name: 'Alice', profileImageURL: 'https://img.test/alice.png' });
  store.seed(COLLECTIONS.users, 'bob', { displayName: 'Bob' });
  return { store, services: createMessagingServices(store, config, clock) };
}

/** Resolves after every pending promise callback has run. */
export function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
