import {
  Firestore,
  QueryConstraint,
  addDoc,
  arrayRemove,
  arrayUnion,
  collection,
  deleteDoc,
  deleteField,
  doc,
  documentId,
  getDoc,
  getDocs,
  increment,
  limit,
  onSnapshot,
  orderBy,
  query,
  runTransaction,
  startAfter,
  updateDoc,
  where,
  writeBatch,
} from 'firebase/firestore';
import { toStoreError } from '../errors/messaging-errors';
import {
  DOCUMENT_ID,
  DocumentData,
  DocumentQuery,
  DocumentStore,
  FieldTransform,
  StoredDocument,
  Unsubscribe,
  UpdateData,
  WriteBatch,
} from './document-store';

function toFieldValue(value: unknown): unknown {
  if (!(value instanceof FieldTransform)) return value;
  const { spec } = value;
  switch (spec.kind) {
    case 'increment':
      return increment(spec.by);
    case 'arrayUnion':
      return arrayUnion(...spec.values);
    case 'arrayRemove':
      return arrayRemove(...spec.values);
    case 'delete':
      return deleteField();
  }
}

/** Flattens to the variadic `field, value, ...` form `updateDoc` accepts. */
export function toUpdateArgs(data: UpdateData): [string, unknown, ...unknown[]] {
  const entries = Object.entries(data);
  if (!entries.length) {
    throw new Error('Update payload is empty');
  }
  const [[firstField, firstValue], ...rest] = entries;
  const more = rest.flatMap(([field, value]) => [field, toFieldValue(value)]);
  return [firstField, toFieldValue(firstValue), ...more];
}

export class FirestoreDocumentStore implements DocumentStore {
  constructor(private db: Firestore) {}

  query(spec: DocumentQuery): Promise<StoredDocument[]> {
    return this.run(`query ${spec.collection}`, async () => {
      const snap = await getDocs(this.buildQuery(spec));
      return snap.docs.map(docSnap => ({ id: docSnap.id, data: docSnap.data() }));
    });
  }

  get(collectionName: string, id: string): Promise<StoredDocument | null> {
    return this.run(`get ${collectionName}/${id}`, async () => {
      const snap = await getDoc(doc(this.db, collectionName, id));
      if (!snap.exists()) return null;
      return { id: snap.id, data: snap.data() };
    });
  }

  create(collectionName: string, data: DocumentData): Promise<string> {
    return this.run(`create in ${collectionName}`, async () => {
      const ref = await addDoc(collection(this.db, collectionName), data);
      return ref.id;
    });
  }

  createIfAbsent(collectionName: string, id: string, data: DocumentData): Promise<boolean> {
    return this.run(`create ${collectionName}/${id}`, () =>
      runTransaction(this.db, async tx => {
        const ref = doc(this.db, collectionName, id);
        const snap = await tx.get(ref);
        if (snap.exists()) return false;
        tx.set(ref, data);
        return true;
      }),
    );
  }

  update(collectionName: string, id: string, data: UpdateData): Promise<void> {
    return this.run(`update ${collectionName}/${id}`, () =>
      updateDoc(doc(this.db, collectionName, id), ...toUpdateArgs(data)),
    );
  }

  delete(collectionName: string, id: string): Promise<void> {
    return this.run(`delete ${collectionName}/${id}`, () => deleteDoc(doc(this.db, collectionName, id)));
  }

  batch(): WriteBatch {
    const db = this.db;
    const batch = writeBatch(db);
    const run = this.run.bind(this);
    let writes = 0;

    return {
      create(collectionName, data) {
        const ref = doc(collection(db, collectionName));
        batch.set(ref, data);
        writes++;
        return ref.id;
      },
      update(collectionName, id, data) {
        batch.update(doc(db, collectionName, id), ...toUpdateArgs(data));
        writes++;
      },
      delete(collectionName, id) {
        batch.delete(doc(db, collectionName, id));
        writes++;
      },
      commit() {
        return run(`commit batch of ${writes}`, () => batch.commit());
      },
    };
  }

  subscribe(
    spec: DocumentQuery,
    onNext: (documents: StoredDocument[]) => void,
    onError: (error: Error) => void,
  ): Unsubscribe {
    try {
      return onSnapshot(
        this.buildQuery(spec),
        snapshot => onNext(snapshot.docs.map(docSnap => ({ id: docSnap.id, data: docSnap.data() }))),
        error => onError(toStoreError(error, `listen ${spec.collection}`)),
      );
    } catch (error) {
      onError(toStoreError(error, `listen ${spec.collection}`));
      return () => undefined;
    }
  }

  private buildQuery(spec: DocumentQuery) {
    const constraints: QueryConstraint[] = [];
    const fieldPath = (field: string) => (field === DOCUMENT_ID ? documentId() : field);

    for (const filter of spec.where ?? []) {
      constraints.push(where(fieldPath(filter.field), filter.op, filter.value));
    }
    for (const order of spec.orderBy ?? []) {
      constraints.push(orderBy(fieldPath(order.field), order.direction));
    }
    if (spec.startAfter?.length) {
      constraints.push(startAfter(...spec.startAfter));
    }
    if (spec.limit !== undefined && Number.isFinite(spec.limit)) {
      constraints.push(limit(spec.limit));
    }
    return query(collection(this.db, spec.collection), ...constraints);
  }

  private async run<T>(context: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toStoreError(error, context);
    }
  }
}
