import { Observable, Subscription } from 'rxjs';
import {
  MessagingError,
  MessagingErrorType,
  createMessagingError,
  toStoreError,
} from '../errors/messaging-errors';

export type ListenerKind = 'conversations' | 'messages' | 'likes' | 'reviews';

export interface SnapshotResult<T> {
  items: T[];
  error: MessagingError | null;
}

export interface ListenerHandle {
  readonly kind: ListenerKind;
  readonly key: string;
  cancel(): void;
  isActive(): boolean;
}

export interface TeardownFailure {
  kind: ListenerKind;
  key: string;
  error: unknown;
}

export interface TeardownReport {
  cancelled: number;
  failures: TeardownFailure[];
}

interface Entry {
  kind: ListenerKind;
  key: string;
  subscription: Subscription;
}

/**
 * Owns at most one live subscription per (kind, key). One registry belongs to
 * one signed-in session and is closed when that session ends.
 */
export class ListenerRegistry {
  private entries = new Map<ListenerKind, Map<string, Entry>>();
  private closed = false;

  subscribe<T>(
    kind: ListenerKind,
    key: string,
    source$: Observable<T[]>,
    onSnapshot: (result: SnapshotResult<T>) => void,
  ): ListenerHandle {
    if (this.closed) {
      throw createMessagingError(
        MessagingErrorType.UNAUTHENTICATED,
        undefined,
        `Cannot listen to ${kind}/${key} after sign-out`,
      );
    }

    const previous = this.take(kind, key);
    if (previous) {
      const error = this.cancelEntry(previous);
      if (error) {
        console.warn(`Listener ${kind}/${key} did not shut down cleanly before being replaced`, error);
      }
    }

    const entry: Entry = { kind, key, subscription: new Subscription() };
    this.bucket(kind).set(key, entry);

    const deliver = (result: SnapshotResult<T>) => {
      if (entry.subscription.closed) return;
      try {
        onSnapshot(result);
      } catch (error) {
        console.error(`Snapshot handler for ${kind}/${key} failed`, error);
      }
    };

    entry.subscription.add(
      source$.subscribe({
        next: items => deliver({ items, error: null }),
        error: (error: unknown) => {
          console.error(`Listener ${kind}/${key} failed`, error);
          deliver({ items: [], error: toStoreError(error, `listen ${kind}`) });
        },
      }),
    );

    return {
      kind,
      key,
      cancel: () => {
        if (this.entries.get(kind)?.get(key) === entry) {
          this.unsubscribe(kind, key);
        } else {
          entry.subscription.unsubscribe();
        }
      },
      isActive: () => this.entries.get(kind)?.get(key) === entry,
    };
  }

  /** No-op when nothing is registered for (kind, key). */
  unsubscribe(kind: ListenerKind, key: string): void {
    const entry = this.take(kind, key);
    if (!entry) return;
    const error = this.cancelEntry(entry);
    if (error) {
      throw toStoreError(error, `stop listening to ${kind}/${key}`);
    }
  }

  /** Cancels everything, continuing past individual failures. */
  unsubscribeAll(): TeardownReport {
    const all = [...this.entries.values()].flatMap(bucket => [...bucket.values()]);
    this.entries.clear();

    const failures: TeardownFailure[] = [];
    for (const entry of all) {
      const error = this.cancelEntry(entry);
      if (error) {
        failures.push({ kind: entry.kind, key: entry.key, error });
      }
    }

    if (failures.length) {
      console.error(`${failures.length} of ${all.length} listeners failed to shut down`, failures);
    }
    return { cancelled: all.length - failures.length, failures };
  }

  close(): TeardownReport {
    this.closed = true;
    return this.unsubscribeAll();
  }

  isClosed() {
    return this.closed;
  }

  has(kind: ListenerKind, key: string): boolean {
    return this.entries.get(kind)?.has(key) ?? false;
  }

  activeCount(): number {
    let count = 0;
    for (const bucket of this.entries.values()) {
      count += bucket.size;
    }
    return count;
  }

  activeKeys(): Array<{ kind: ListenerKind; key: string }> {
    return [...this.entries.values()].flatMap(bucket =>
      [...bucket.values()].map(({ kind, key }) => ({ kind, key })),
    );
  }

  private bucket(kind: ListenerKind) {
    let bucket = this.entries.get(kind);
    if (!bucket) {
      bucket = new Map();
      this.entries.set(kind, bucket);
    }
    return bucket;
  }

  private take(kind: ListenerKind, key: string): Entry | undefined {
    const bucket = this.entries.get(kind);
    const entry = bucket?.get(key);
    if (!bucket || !entry) return undefined;
    bucket.delete(key);
    if (!bucket.size) this.entries.delete(kind);
    return entry;
  }

  private cancelEntry(entry: Entry): unknown {
    try {
      entry.subscription.unsubscribe();
      return null;
    } catch (error) {
      return error;
    }
  }
}
