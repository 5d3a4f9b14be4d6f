import { StoreUnavailableError } from '../utils/errors';
import type {
    CasResult,
    CommitResult,
    ConditionalWrite,
    DocumentStore,
    FieldFilter,
    StoredRecord,
} from './document-store';

export interface InMemoryStoreOptions {
    /** Artificial round-trip delay before each operation reaches its commit point. */
    latencyMs?: number;
}

type Operation = 'get' | 'put' | 'create' | 'conditionalUpdate' | 'commitAll' | 'list';

/**
 * In-process DocumentStore for tests and local runs.
 *
 * Every operation awaits its simulated round trip first and then reads,
 * checks and writes without yielding, so compare-and-set is atomic on the
 * event loop. Values are deep-copied in and out.
 */
export class InMemoryDocumentStore implements DocumentStore {
    private readonly collections = new Map<string, Map<string, StoredRecord>>();
    private readonly latencyMs: number;
    private readonly faults: Array<{ operation: Operation | 'any'; remaining: number }> = [];

    constructor(options: InMemoryStoreOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
    }

    /** Makes the next `count` matching operations throw StoreUnavailableError. */
    failNext(operation: Operation | 'any' = 'any', count = 1): void {
        this.faults.push({ operation, remaining: count });
    }

    async get(collection: string, id: string): Promise<StoredRecord | null> {
        await this.roundTrip('get');
        const value = this.bucket(collection).get(id);
        return value ? structuredClone(value) : null;
    }

    async put(collection: string, id: string, value: StoredRecord): Promise<void> {
        await this.roundTrip('put');
        this.bucket(collection).set(id, structuredClone(value));
    }

    async create(collection: string, id: string, value: StoredRecord): Promise<boolean> {
        await this.roundTrip('create');
        const bucket = this.bucket(collection);
        if (bucket.has(id)) {
            return false;
        }
        bucket.set(id, structuredClone(value));
        return true;
    }

    async conditionalUpdate(
        collection: string,
        id: string,
        expected: (current: StoredRecord | null) => boolean,
        next: (current: StoredRecord | null) => StoredRecord
    ): Promise<CasResult<StoredRecord>> {
        await this.roundTrip('conditionalUpdate');
        const bucket = this.bucket(collection);
        const stored = bucket.get(id);
        const current = stored ? structuredClone(stored) : null;

        if (!expected(current)) {
            return { ok: false, current };
        }

        const value = next(current);
        bucket.set(id, structuredClone(value));
        return { ok: true, value: structuredClone(value) };
    }

    async commitAll(writes: ConditionalWrite[]): Promise<CommitResult> {
        await this.roundTrip('commitAll');

        const currents = writes.map(write => {
            const stored = this.bucket(write.collection).get(write.id);
            return stored ? structuredClone(stored) : null;
        });

        const failedIndex = writes.findIndex((write, index) => !write.expected(currents[index]));
        if (failedIndex !== -1) {
            return { ok: false, failedIndex };
        }

        const nextValues = writes.map((write, index) => write.next(currents[index]));
        writes.forEach((write, index) => {
            this.bucket(write.collection).set(write.id, structuredClone(nextValues[index]));
        });
        return { ok: true };
    }

    async list(collection: string, filter: FieldFilter = {}): Promise<StoredRecord[]> {
        await this.roundTrip('list');
        const entries = Object.entries(filter);
        return [...this.bucket(collection).values()]
            .filter(record => entries.every(([field, value]) => record[field] === value))
            .map(record => structuredClone(record));
    }

    /** Number of documents in a collection; test helper. */
    size(collection: string): number {
        return this.bucket(collection).size;
    }

    private bucket(collection: string): Map<string, StoredRecord> {
        let bucket = this.collections.get(collection);
        if (!bucket) {
            bucket = new Map();
            this.collections.set(collection, bucket);
        }
        return bucket;
    }

    private async roundTrip(operation: Operation): Promise<void> {
        if (this.latencyMs > 0) {
            await new Promise(resolve => setTimeout(resolve, this.latencyMs));
        } else {
            await Promise.resolve();
        }

        const fault = this.faults.find(f => f.operation === 'any' || f.operation === operation);
        if (fault) {
            fault.remaining -= 1;
            if (fault.remaining <= 0) {
                this.faults.splice(this.faults.indexOf(fault), 1);
            }
            throw new StoreUnavailableError(operation);
        }
    }
}
