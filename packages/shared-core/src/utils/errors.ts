import type { BookingToken, NotificationChannelName, RejectionReason } from '@cancelfill/shared-types';

export type ErrorCode =
    | 'VALIDATION'
    | 'NOT_FOUND'
    | 'TOKEN_REJECTED'
    | 'DUPLICATE_BINDING'
    | 'DISPATCH_FAILED'
    | 'CONFLICT'
    | 'STORE_UNAVAILABLE'
    | 'BOOKING_IN_DOUBT'
    | 'CONFIG';

export class CancelFillError extends Error {
    public readonly code: ErrorCode;
    public readonly retryable: boolean;

    constructor(code: ErrorCode, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.code = code;
        this.retryable = options.retryable ?? false;

        // This is to ensure the stack trace is captured correctly
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }
}

/** Malformed input, rejected before any state is touched. */
export class ValidationError extends CancelFillError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super('VALIDATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}

export class NotFoundError extends CancelFillError {
    constructor(public readonly collection: string, public readonly id: string) {
        super('NOT_FOUND', `${collection}/${id} not found`);
    }
}

/** A claim rejection carried as an exception, for front ends that prefer throwing. */
export class TokenError extends CancelFillError {
    constructor(public readonly reason: RejectionReason) {
        super('TOKEN_REJECTED', `Claim rejected: ${reason}`);
    }
}

export class DuplicateBindingError extends CancelFillError {
    constructor(public readonly existing: BookingToken) {
        super(
            'DUPLICATE_BINDING',
            `An unexpired token already binds entry ${existing.entryId} to slot ${existing.slotId}`
        );
    }
}

export class DispatchError extends CancelFillError {
    constructor(
        public readonly channel: NotificationChannelName,
        public readonly reason: string,
        public readonly permanent: boolean,
        cause?: unknown
    ) {
        super('DISPATCH_FAILED', `[${channel}] ${reason}`, { cause, retryable: !permanent });
    }
}

/** Compare-and-set lost: someone else changed the record first. */
export class ConflictError extends CancelFillError {
    constructor(public readonly collection: string, public readonly id: string) {
        super('CONFLICT', `Concurrent update on ${collection}/${id}`);
    }
}

export class StoreUnavailableError extends CancelFillError {
    constructor(operation: string, cause?: unknown) {
        super('STORE_UNAVAILABLE', `Store unavailable during ${operation}`, { cause, retryable: true });
    }
}

/**
 * The store failed while the booking commit was in flight; the outcome is
 * unknown. Callers should retry the claim shortly.
 */
export class BookingInDoubtError extends CancelFillError {
    constructor(public readonly slotId: string, cause?: unknown) {
        super('BOOKING_IN_DOUBT', `Booking outcome for slot ${slotId} is unknown, please retry shortly`, {
            cause,
            retryable: true,
        });
    }
}

export class ConfigError extends CancelFillError {
    constructor(public readonly keys: string[], message: string) {
        super('CONFIG', message);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
