export type DocumentData = Record<string, unknown>;

export interface StoredDocument {
  id: string;
  data: DocumentData;
}

export type FilterOp = '==' | '!=' | 'array-contains' | 'in';

export interface FieldFilter {
  field: string;
  op: FilterOp;
  value: unknown;
}

/** Orders by the document id instead of a field. */
export const DOCUMENT_ID = '__name__';

export interface FieldOrder {
  field: string;
  direction: 'asc' | 'desc';
}

export interface DocumentQuery {
  collection: string;
  where?: FieldFilter[];
  orderBy?: FieldOrder[];
  limit?: number;
  /** One value per `orderBy` entry, exclusive. */
  startAfter?: unknown[];
}

type TransformSpec =
  | { kind: 'increment'; by: number }
  | { kind: 'arrayUnion'; values: unknown[] }
  | { kind: 'arrayRemove'; values: unknown[] }
  | { kind: 'delete' };

export class FieldTransform {
  private constructor(readonly spec: TransformSpec) {}

  static of(spec: TransformSpec) {
    return new FieldTransform(spec);
  }
}

export const increment = (by: number) => FieldTransform.of({ kind: 'increment', by });
export const arrayUnion = (...values: unknown[]) => FieldTransform.of({ kind: 'arrayUnion', values });
export const arrayRemove = (...values: unknown[]) => FieldTransform.of({ kind: 'arrayRemove', values });
export const deleteField = () => FieldTransform.of({ kind: 'delete' });

/** Keys may be dotted paths (`unreadCounts.uid`) into nested maps. */
export type UpdateData = Record<string, unknown>;

export interface WriteBatch {
  /** Reserves an id immediately; nothing is written before `commit`. */
  create(collection: string, data: DocumentData): string;
  update(collection: string, id: string, data: UpdateData): void;
  delete(collection: string, id: string): void;
  /** All-or-nothing. */
  commit(): Promise<void>;
}

export type Unsubscribe = () => void;

export interface DocumentStore {
  query(query: DocumentQuery): Promise<StoredDocument[]>;
  get(collection: string, id: string): Promise<StoredDocument | null>;
  create(collection: string, data: DocumentData): Promise<string>;
  /** Resolves `true` only for the call that wrote the document. */
  createIfAbsent(collection: string, id: string, data: DocumentData): Promise<boolean>;
  update(collection: string, id: string, data: UpdateData): Promise<void>;
  delete(collection: string, id: string): Promise<void>;
  batch(): WriteBatch;
  subscribe(
    query: DocumentQuery,
    onNext: (documents: StoredDocument[]) => void,
    onError: (error: Error) => void,
  ): Unsubscribe;
}
