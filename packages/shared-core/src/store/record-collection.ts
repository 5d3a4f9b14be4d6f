import type { z } from 'zod';
import type { BookingToken, ClaimResponse, DispatchResult, NotificationRecord, Slot, WaitlistEntry } from '@cancelfill/shared-types';
import { ValidationError } from '../utils/errors';
import { bookingTokenSchema, tokenBindingSchema, tokenSecretSchema, type TokenBinding, type TokenSecretIndex } from '../models/booking-token';
import { claimResponseSchema, dispatchResultSchema, notificationRecordSchema } from '../models/notification-record';
import { slotSchema } from '../models/slot';
import { waitlistEntrySchema } from '../models/waitlist-entry';
import { COLLECTIONS, type CasResult, type ConditionalWrite, type DocumentStore, type FieldFilter, type StoredRecord } from './document-store';

/**
 * Typed view over one store collection. Every value read back is validated
 * against the record schema, so a malformed document never reaches engine
 * logic.
 */
export class RecordCollection<T extends StoredRecord> {
    constructor(
        private readonly store: DocumentStore,
        readonly name: string,
        private readonly schema: z.ZodType<T>
    ) {}

    parse(raw: unknown): T {
        const result = this.schema.safeParse(raw);
        if (!result.success) {
            throw new ValidationError(
                `Malformed ${this.name} record`,
                result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
            );
        }
        return result.data;
    }

    async get(id: string): Promise<T | null> {
        const raw = await this.store.get(this.name, id);
        return raw ? this.parse(raw) : null;
    }

    async put(id: string, value: T): Promise<void> {
        await this.store.put(this.name, id, this.parse(value));
    }

    async create(id: string, value: T): Promise<boolean> {
        return this.store.create(this.name, id, this.parse(value));
    }

    async list(filter?: FieldFilter): Promise<T[]> {
        const raws = await this.store.list(this.name, filter);
        return raws.map(raw => this.parse(raw));
    }

    /**
     * Compare-and-set on an existing document. A missing document fails the
     * predicate.
     */
    async conditionalUpdate(
        id: string,
        expected: (current: T) => boolean,
        next: (current: T) => T
    ): Promise<CasResult<T>> {
        const result = await this.store.conditionalUpdate(this.name, id, ...this.guards(expected, next));
        if (result.ok) {
            return { ok: true, value: this.parse(result.value) };
        }
        return { ok: false, current: result.current ? this.parse(result.current) : null };
    }

    /** Builds a guarded write for DocumentStore.commitAll. */
    write(id: string, expected: (current: T) => boolean, next: (current: T) => T): ConditionalWrite {
        const [guard, apply] = this.guards(expected, next);
        return { collection: this.name, id, expected: guard, next: apply };
    }

    /** Guarded insert for DocumentStore.commitAll: succeeds only if absent, or if `replaceable` accepts the current value. */
    insert(id: string, value: T, replaceable: (current: T) => boolean = () => false): ConditionalWrite {
        const checked = this.parse(value);
        return {
            collection: this.name,
            id,
            expected: current => current === null || replaceable(this.parse(current)),
            next: () => checked,
        };
    }

    private guards(
        expected: (current: T) => boolean,
        next: (current: T) => T
    ): [(current: StoredRecord | null) => boolean, (current: StoredRecord | null) => StoredRecord] {
        return [
            current => current !== null && expected(this.parse(current)),
            current => {
                if (current === null) {
                    throw new ValidationError(`${this.name} record disappeared during update`);
                }
                return this.parse(next(this.parse(current)));
            },
        ];
    }
}

export interface EngineRecords {
    slots: RecordCollection<Slot>;
    waitlist: RecordCollection<WaitlistEntry>;
    tokens: RecordCollection<BookingToken>;
    tokenSecrets: RecordCollection<TokenSecretIndex>;
    tokenBindings: RecordCollection<TokenBinding>;
    notifications: RecordCollection<NotificationRecord>;
    claimResponses: RecordCollection<ClaimResponse>;
    dispatches: RecordCollection<DispatchResult>;
}

export function createEngineRecords(store: DocumentStore): EngineRecords {
    return {
        slots: new RecordCollection(store, COLLECTIONS.slots, slotSchema),
        waitlist: new RecordCollection(store, COLLECTIONS.waitlist, waitlistEntrySchema),
        tokens: new RecordCollection(store, COLLECTIONS.tokens, bookingTokenSchema),
        tokenSecrets: new RecordCollection(store, COLLECTIONS.tokenSecrets, tokenSecretSchema),
        tokenBindings: new RecordCollection(store, COLLECTIONS.tokenBindings, tokenBindingSchema),
        notifications: new RecordCollection(store, COLLECTIONS.notifications, notificationRecordSchema),
        claimResponses: new RecordCollection(store, COLLECTIONS.claimResponses, claimResponseSchema),
        dispatches: new RecordCollection(store, COLLECTIONS.dispatches, dispatchResultSchema),
    };
}
