import type { DocumentData } from 'firebase-admin/firestore';
import { createLogger } from '../lib/logger';
import { CancelFillError, StoreUnavailableError } from '../utils/errors';
import type {
    CasResult,
    CommitResult,
    ConditionalWrite,
    DocumentStore,
    FieldFilter,
    StoredRecord,
} from './document-store';

const log = createLogger('FirestoreStore');

export interface DocumentSnapshotLike {
    readonly exists: boolean;
    data(): DocumentData | undefined;
}

export interface DocumentRefLike {
    readonly path: string;
    get(): Promise<DocumentSnapshotLike>;
    set(data: DocumentData): Promise<unknown>;
}

export interface QueryLike {
    where(field: string, op: '==', value: unknown): QueryLike;
    get(): Promise<{ docs: Array<{ data(): DocumentData }> }>;
}

export interface CollectionLike extends QueryLike {
    doc(id: string): DocumentRefLike;
}

export interface TransactionLike {
    get(ref: DocumentRefLike): Promise<DocumentSnapshotLike>;
    getAll(...refs: DocumentRefLike[]): Promise<DocumentSnapshotLike[]>;
    set(ref: DocumentRefLike, data: DocumentData): unknown;
}

/** The slice of the admin `Firestore` the adapter uses. */
export interface FirestoreClient {
    collection(path: string): CollectionLike;
    runTransaction<T>(update: (transaction: TransactionLike) => Promise<T>): Promise<T>;
}

const toRecord = (data: DocumentData | undefined): StoredRecord | null => (data ? { ...data } : null);

/**
 * DocumentStore over Firestore (admin SDK). Guarded writes run inside
 * runTransaction: all transaction reads come first, then the predicate
 * checks, then the writes. Firestore retries the callback on contention, so
 * predicates always see the latest committed value.
 */
export class FirestoreDocumentStore implements DocumentStore {
    constructor(private readonly firestore: FirestoreClient) {}

    async get(collection: string, id: string): Promise<StoredRecord | null> {
        return this.guard('get', async () => {
            const snap = await this.firestore.collection(collection).doc(id).get();
            return snap.exists ? toRecord(snap.data()) : null;
        });
    }

    async put(collection: string, id: string, value: StoredRecord): Promise<void> {
        await this.guard('put', async () => {
            await this.firestore.collection(collection).doc(id).set(value);
        });
    }

    async create(collection: string, id: string, value: StoredRecord): Promise<boolean> {
        return this.guard('create', () =>
            this.firestore.runTransaction(async (transaction) => {
                const ref = this.firestore.collection(collection).doc(id);
                const snap = await transaction.get(ref);
                if (snap.exists) {
                    return false;
                }
                transaction.set(ref, value);
                return true;
            })
        );
    }

    async conditionalUpdate(
        collection: string,
        id: string,
        expected: (current: StoredRecord | null) => boolean,
        next: (current: StoredRecord | null) => StoredRecord
    ): Promise<CasResult<StoredRecord>> {
        return this.guard('conditionalUpdate', () =>
            this.firestore.runTransaction(async (transaction): Promise<CasResult<StoredRecord>> => {
                const ref = this.firestore.collection(collection).doc(id);
                const snap = await transaction.get(ref);
                const current = snap.exists ? toRecord(snap.data()) : null;

                if (!expected(current)) {
                    return { ok: false, current };
                }

                const value = next(current);
                transaction.set(ref, value);
                return { ok: true, value };
            })
        );
    }

    async commitAll(writes: ConditionalWrite[]): Promise<CommitResult> {
        if (writes.length === 0) {
            return { ok: true };
        }

        return this.guard('commitAll', () =>
            this.firestore.runTransaction(async (transaction): Promise<CommitResult> => {
                const refs = writes.map(write => this.firestore.collection(write.collection).doc(write.id));
                const snaps = await transaction.getAll(...refs);
                const currents = snaps.map(snap => (snap.exists ? toRecord(snap.data()) : null));

                const failedIndex = writes.findIndex((write, index) => !write.expected(currents[index]));
                if (failedIndex !== -1) {
                    return { ok: false, failedIndex };
                }

                writes.forEach((write, index) => {
                    transaction.set(refs[index], write.next(currents[index]));
                });
                return { ok: true };
            })
        );
    }

    async list(collection: string, filter: FieldFilter = {}): Promise<StoredRecord[]> {
        return this.guard('list', async () => {
            let query: QueryLike = this.firestore.collection(collection);
            for (const [field, value] of Object.entries(filter)) {
                query = query.where(field, '==', value);
            }
            const snapshot = await query.get();
            return snapshot.docs.map(doc => ({ ...doc.data() }));
        });
    }

    private async guard<T>(operation: string, run: () => Promise<T>): Promise<T> {
        try {
            return await run();
        } catch (error) {
            if (error instanceof CancelFillError) {
                throw error;
            }
            log.error(`${operation} failed:`, error);
            throw new StoreUnavailableError(operation, error);
        }
    }
}
