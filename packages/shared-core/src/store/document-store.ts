export type StoredRecord = Record<string, unknown>;

export type FieldFilter = Record<string, string | number | boolean>;

export type CasResult<T> =
    | { ok: true; value: T }
    | { ok: false; current: T | null };

export type CommitResult =
    | { ok: true }
    | { ok: false; failedIndex: number };

/**
 * One guarded write inside an atomic multi-document commit. `next` only runs
 * when `expected` accepted the current value.
 */
export interface ConditionalWrite {
    collection: string;
    id: string;
    expected: (current: StoredRecord | null) => boolean;
    next: (current: StoredRecord | null) => StoredRecord;
}

/**
 * Keyed transactional document store the engine runs on. Every record lives
 * here; the engine itself keeps no state between calls.
 *
 * Backend failures (anything other than a predicate rejecting the current
 * value) surface as StoreUnavailableError.
 */
export interface DocumentStore {
    get(collection: string, id: string): Promise<StoredRecord | null>;
    put(collection: string, id: string, value: StoredRecord): Promise<void>;
    /** Insert-if-absent. Resolves false when the document already exists. */
    create(collection: string, id: string, value: StoredRecord): Promise<boolean>;
    conditionalUpdate(
        collection: string,
        id: string,
        expected: (current: StoredRecord | null) => boolean,
        next: (current: StoredRecord | null) => StoredRecord
    ): Promise<CasResult<StoredRecord>>;
    /** All predicates are checked and all writes applied in one transaction, or nothing is written. */
    commitAll(writes: ConditionalWrite[]): Promise<CommitResult>;
    list(collection: string, filter?: FieldFilter): Promise<StoredRecord[]>;
}

export const COLLECTIONS = {
    slots: 'slots',
    waitlist: 'waitlist-entries',
    tokens: 'booking-tokens',
    tokenSecrets: 'token-secrets',
    tokenBindings: 'token-bindings',
    notifications: 'notification-records',
    claimResponses: 'claim-responses',
    dispatches: 'dispatches',
} as const;

export type CollectionName = typeof COLLECTIONS[keyof typeof COLLECTIONS];
