/**
 * Notification Service
 * Sends claim offers to waitlisted patients over SMS and email, and the
 * follow-up confirmations once a slot is booked or given up on.
 */

import type {
    ChannelDispatchSummary,
    DispatchResult,
    FailureKind,
    IssuedToken,
    NotificationChannelName,
    NotificationRecord,
    Slot,
    WaitlistEntry,
} from '@cancelfill/shared-types';
import type { ChannelSendResult, NotificationChannel } from '../channels/notification-channel';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import { incrementNotifiedCount } from '../models/waitlist-entry';
import { durationMs } from '../utils/date-utils';
import { describeError, DispatchError, NotFoundError } from '../utils/errors';
import { buildNotificationDocId } from '../utils/key-utils';
import {
    buildBookingConfirmedMessage,
    buildClaimOfferMessage,
    buildStaffSlotFilledMessage,
    buildStaffSlotUnfilledMessage,
    type MessageContent,
} from './notification-templates';
import { buildClaimLink } from './token-issuer-service';

const log = createLogger('Notification');

const TIMED_OUT = Symbol('timed-out');
const MAX_BACKOFF_MS = 30_000;

const backoffDelay = (backoffMs: number, attempt: number) => Math.min(backoffMs * 2 ** (attempt - 1), MAX_BACKOFF_MS);

type ChannelDelivery = {
    summary: ChannelDispatchSummary;
    failure?: DispatchError;
};

async function withTimeout<T>(run: () => Promise<T>, timeoutMs: number): Promise<T | typeof TIMED_OUT> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<typeof TIMED_OUT>(resolve => {
        timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
    });
    try {
        return await Promise.race([run(), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

async function sendOnce(
    channel: NotificationChannel,
    to: string,
    content: MessageContent,
    timeoutMs: number
): Promise<{ result: ChannelSendResult; failureKind?: FailureKind }> {
    try {
        const outcome = await withTimeout(() => channel.send({ ...content, to }), timeoutMs);
        if (outcome === TIMED_OUT) {
            return {
                result: { ok: false, error: `timed out after ${timeoutMs}ms`, permanent: false },
                failureKind: 'timeout',
            };
        }
        if (outcome.ok) {
            return { result: outcome };
        }
        return { result: outcome, failureKind: outcome.permanent ? 'permanent' : 'transient' };
    } catch (error) {
        return { result: { ok: false, error: describeError(error), permanent: false }, failureKind: 'transient' };
    }
}

async function appendRecord(ctx: EngineContext, record: NotificationRecord): Promise<void> {
    const created = await ctx.records.notifications.create(record.id, record);
    if (!created) {
        log.debug(`Notification record ${record.id} already written`);
    }
}

/**
 * Delivers one message over one channel. Transient failures and timeouts are
 * retried with exponential backoff up to the configured attempt count;
 * permanent failures stop immediately. Every attempt is recorded.
 */
async function deliverOverChannel(
    ctx: EngineContext,
    token: IssuedToken,
    channel: NotificationChannel,
    to: string | undefined,
    content: MessageContent
): Promise<ChannelDelivery> {
    const baseRecord = { tokenId: token.id, slotId: token.slotId, entryId: token.entryId, channel: channel.name };

    if (!to) {
        await appendRecord(ctx, {
            ...baseRecord,
            id: buildNotificationDocId(token.id, channel.name, 1),
            attempt: 1,
            sentAt: ctx.clock().toISOString(),
            outcome: 'skipped',
            latencyMs: 0,
            error: 'no contact address',
        });
        return { summary: { channel: channel.name, outcome: 'skipped', attempts: 0, error: 'no contact address' } };
    }

    const { maxAttempts, backoffMs, timeoutMs } = ctx.config.notification;
    let failure = new DispatchError(channel.name, 'not attempted', false);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        const startedAt = ctx.clock();
        const { result, failureKind } = await sendOnce(channel, to, content, timeoutMs);
        const latencyMs = Math.max(0, ctx.clock().getTime() - startedAt.getTime());
        const record: NotificationRecord = {
            ...baseRecord,
            id: buildNotificationDocId(token.id, channel.name, attempt),
            attempt,
            sentAt: startedAt.toISOString(),
            outcome: result.ok ? 'delivered' : 'failed',
            latencyMs,
        };

        if (result.ok) {
            await appendRecord(ctx, { ...record, providerId: result.providerId });
            return {
                summary: { channel: channel.name, outcome: 'delivered', attempts: attempt, providerId: result.providerId },
            };
        }

        await appendRecord(ctx, { ...record, failureKind, error: result.error });
        failure = new DispatchError(channel.name, result.error, result.permanent);
        log.warn(`[${channel.name}] ${result.error} (token ${token.id}, attempt ${attempt}/${maxAttempts}, ${failureKind})`);

        if (result.permanent) {
            return { summary: { channel: channel.name, outcome: 'failed', attempts: attempt, error: result.error }, failure };
        }
        if (attempt < maxAttempts) {
            await ctx.sleep(backoffDelay(backoffMs, attempt));
        }
    }

    return {
        summary: { channel: channel.name, outcome: 'failed', attempts: maxAttempts, error: failure.reason },
        failure,
    };
}

/**
 * Longest a live dispatch can run: every attempt timing out, plus the backoff
 * between attempts, plus one timeout of slack for store round trips.
 */
export function dispatchLeaseMs(notification: EngineContext['config']['notification']): number {
    const { maxAttempts, backoffMs, timeoutMs } = notification;
    let total = (maxAttempts + 1) * timeoutMs;
    for (let attempt = 1; attempt < maxAttempts; attempt++) {
        total += backoffDelay(backoffMs, attempt);
    }
    return total;
}

type DispatchClaim = { claimed: true; marker: DispatchResult } | { claimed: false; existing: DispatchResult };

/**
 * Writes the pending marker and counts the notification in one commit. A
 * pending marker older than the lease belongs to a dispatch that died midway
 * and is taken over; the entry was already counted for it.
 */
async function claimDispatch(
    ctx: EngineContext,
    entry: WaitlistEntry,
    slot: Slot,
    token: IssuedToken
): Promise<DispatchClaim> {
    const now = ctx.clock();
    const marker: DispatchResult = {
        tokenId: token.id,
        entryId: entry.id,
        slotId: slot.id,
        status: 'pending',
        channels: [],
        startedAt: now.toISOString(),
    };

    const committed = await ctx.store.commitAll([
        ctx.records.dispatches.insert(token.id, marker),
        ctx.records.waitlist.write(entry.id, () => true, current => incrementNotifiedCount(current, now)),
    ]);
    if (committed.ok) {
        return { claimed: true, marker };
    }

    const existing = await ctx.records.dispatches.get(token.id);
    if (!existing) {
        throw new NotFoundError(ctx.records.waitlist.name, entry.id);
    }
    const stalled =
        existing.status === 'pending' &&
        durationMs(existing.startedAt, now.toISOString()) > dispatchLeaseMs(ctx.config.notification);
    if (!stalled) {
        return { claimed: false, existing };
    }

    const takeover = await ctx.records.dispatches.conditionalUpdate(
        token.id,
        current => current.status === 'pending' && current.startedAt === existing.startedAt,
        current => ({ ...current, startedAt: now.toISOString() })
    );
    if (!takeover.ok) {
        return { claimed: false, existing: takeover.current ?? existing };
    }
    log.warn(`Taking over stalled dispatch for token ${token.id} (started ${existing.startedAt})`);
    return { claimed: true, marker: takeover.value };
}

/**
 * Sends the claim link for a token over SMS and email concurrently.
 *
 * Idempotent per token: the dispatch marker and the entry's notified-count
 * are written together before anything is sent, so a repeated call returns
 * the stored result without sending or counting again. A dispatch where no channel got
 * through is reported as failed; the token stays claimable.
 */
export async function dispatchClaimNotification(
    ctx: EngineContext,
    entry: WaitlistEntry,
    slot: Slot,
    token: IssuedToken
): Promise<DispatchResult> {
    const claim = await claimDispatch(ctx, entry, slot, token);
    if (!claim.claimed) {
        log.info(`Token ${token.id} already dispatched (${claim.existing.status})`);
        return claim.existing;
    }

    const content = buildClaimOfferMessage({
        clinicName: ctx.config.clinicName,
        entry,
        slot,
        claimLink: buildClaimLink(ctx.config.claimBaseUrl, token.secret),
        ttlMs: durationMs(token.issuedAt, token.expiresAt),
    });

    const targets: Array<[NotificationChannelName, NotificationChannel, string | undefined]> = [
        ['sms', ctx.channels.sms, entry.phone],
        ['email', ctx.channels.email, entry.email],
    ];

    const settled = await Promise.allSettled(
        targets.map(([, channel, to]) => deliverOverChannel(ctx, token, channel, to, content))
    );

    const deliveries = settled.map((outcome, index): ChannelDelivery => {
        if (outcome.status === 'fulfilled') {
            return outcome.value;
        }
        const channel = targets[index][0];
        const error = describeError(outcome.reason);
        return {
            summary: { channel, outcome: 'failed', attempts: 0, error },
            failure: new DispatchError(channel, error, false, outcome.reason),
        };
    });
    const channels = deliveries.map(delivery => delivery.summary);

    const result: DispatchResult = {
        ...claim.marker,
        status: channels.some(channel => channel.outcome === 'delivered') ? 'sent' : 'failed',
        channels,
        completedAt: ctx.clock().toISOString(),
    };

    await ctx.records.dispatches.put(token.id, result);

    if (result.status === 'failed') {
        log.warn(`All channels failed for entry ${entry.id} on slot ${slot.id}; token ${token.id} remains claimable. Staff follow-up needed.`);
        const failures = deliveries.flatMap(delivery => (delivery.failure ? [delivery.failure] : []));
        ctx.events.emit('dispatch-failed', result, failures);
    } else {
        log.info(`Offer for slot ${slot.id} sent to entry ${entry.id}`);
    }

    return result;
}

async function sendBestEffort(
    channel: NotificationChannel,
    to: string | undefined,
    content: MessageContent,
    timeoutMs: number
): Promise<boolean> {
    if (!to) {
        return false;
    }
    const { result } = await sendOnce(channel, to, content, timeoutMs);
    if (!result.ok) {
        log.warn(`[${channel.name}] ${content.subject} not delivered to ${to}: ${result.error}`);
    }
    return result.ok;
}

/**
 * Booking confirmation to the patient and a notice to staff. Single attempt
 * per channel; the booking itself is already committed.
 */
export async function sendBookingConfirmation(ctx: EngineContext, entry: WaitlistEntry, slot: Slot): Promise<void> {
    const { timeoutMs } = ctx.config.notification;
    const patientMessage = buildBookingConfirmedMessage({ clinicName: ctx.config.clinicName, slot });

    await Promise.all([
        sendBestEffort(ctx.channels.sms, entry.phone, patientMessage, timeoutMs),
        sendBestEffort(ctx.channels.email, entry.email, patientMessage, timeoutMs),
        sendBestEffort(ctx.channels.email, ctx.config.staffEmail, buildStaffSlotFilledMessage({ slot, entry }), timeoutMs),
    ]);
}

export async function sendStaffUnfilledNotice(ctx: EngineContext, slot: Slot): Promise<void> {
    await sendBestEffort(
        ctx.channels.email,
        ctx.config.staffEmail,
        buildStaffSlotUnfilledMessage({ slot }),
        ctx.config.notification.timeoutMs
    );
}
