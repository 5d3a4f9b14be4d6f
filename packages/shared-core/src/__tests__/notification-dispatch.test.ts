/**
 * Claim offer dispatch over SMS and email: retries, timeouts, idempotency.
 */

import { describe, test, expect, beforeEach, vi } from 'vitest';
import type { IssuedToken, OpenSlot, WaitlistEntry } from '@cancelfill/shared-types';
import { dispatchClaimNotification, dispatchLeaseMs } from '../services/notification-service';
import { issueToken } from '../services/token-issuer-service';
import { SmsChannel, truncateSms, SMS_MAX_LENGTH, type SmsClient } from '../channels/sms-channel';
import { DispatchError, StoreUnavailableError } from '../utils/errors';
import { buildNotificationDocId } from '../utils/key-utils';
import {
    buildEntry,
    createHarness,
    HOUR_MS,
    seedCancelledSlot,
    seedEntries,
    seedSlot,
    type TestHarness,
} from './test-helpers';

const transientFailure = { ok: false as const, error: 'provider busy', permanent: false };

async function setup(h: TestHarness, entryOverrides: Partial<WaitlistEntry> = {}) {
    const slot: OpenSlot = await seedCancelledSlot(h.ctx);
    const [entry] = await seedEntries(h.ctx, [buildEntry(1, entryOverrides)]);
    const token: IssuedToken = await issueToken(h.ctx, slot, entry, { wave: 1 });
    return { slot, entry, token };
}

describe('Notification dispatch', () => {
    let h: TestHarness;

    beforeEach(() => {
        h = createHarness();
    });

    test('should send the claim link over both channels', async () => {
        const { slot, entry, token } = await setup(h);

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(result.status).toBe('sent');
        expect(result.channels).toEqual([
            { channel: 'sms', outcome: 'delivered', attempts: 1, providerId: 'sms:5550000001' },
            { channel: 'email', outcome: 'delivered', attempts: 1, providerId: 'email:patient1@example.com' },
        ]);
        expect(h.sms.send).toHaveBeenCalledTimes(1);
        expect(h.sms.send.mock.calls[0][0].to).toBe('5550000001');
        expect(h.sms.send.mock.calls[0][0].text).toContain(`https://clinic.test/claim?token=${token.secret}`);
        expect(h.email.send.mock.calls[0][0].to).toBe('patient1@example.com');
        expect(h.sleep).not.toHaveBeenCalled();
    });

    test('should count the notification once on the entry', async () => {
        const { slot, entry, token } = await setup(h);
        await dispatchClaimNotification(h.ctx, entry, slot, token);
        expect((await h.ctx.records.waitlist.get(entry.id))?.notifiedCount).toBe(1);
    });

    test('should record every attempt', async () => {
        const { slot, entry, token } = await setup(h);
        h.sms.send.mockResolvedValueOnce(transientFailure);

        await dispatchClaimNotification(h.ctx, entry, slot, token);

        const records = await h.ctx.records.notifications.list({ tokenId: token.id, channel: 'sms' });
        expect(records.map(record => [record.attempt, record.outcome, record.failureKind])).toEqual([
            [1, 'failed', 'transient'],
            [2, 'delivered', undefined],
        ]);
        expect(await h.ctx.records.notifications.get(buildNotificationDocId(token.id, 'email', 1))).toMatchObject({
            outcome: 'delivered',
            providerId: 'email:patient1@example.com',
        });
    });

    test('should retry transient failures with exponential backoff', async () => {
        const { slot, entry, token } = await setup(h);
        h.sms.send.mockResolvedValueOnce(transientFailure).mockResolvedValueOnce(transientFailure);

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(result.channels[0]).toMatchObject({ channel: 'sms', outcome: 'delivered', attempts: 3 });
        expect(h.sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    });

    test('should cap the backoff delay', async () => {
        const slow = createHarness({ env: { NOTIFY_MAX_ATTEMPTS: '5', NOTIFY_BACKOFF_MS: '10000' } });
        const { slot, entry, token } = await setup(slow);
        slow.sms.send.mockResolvedValue(transientFailure);

        const result = await dispatchClaimNotification(slow.ctx, entry, slot, token);

        expect(result.channels[0]).toMatchObject({ outcome: 'failed', attempts: 5, error: 'provider busy' });
        expect(slow.sleep.mock.calls.map(([ms]) => ms)).toEqual([10000, 20000, 30000, 30000]);
    });

    test('should not retry a permanent failure', async () => {
        const { slot, entry, token } = await setup(h);
        h.sms.send.mockResolvedValue({ ok: false, error: 'invalid number', permanent: true });

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(h.sms.send).toHaveBeenCalledTimes(1);
        expect(result.channels[0]).toEqual({ channel: 'sms', outcome: 'failed', attempts: 1, error: 'invalid number' });
        expect(result.status).toBe('sent');
        const [record] = await h.ctx.records.notifications.list({ tokenId: token.id, channel: 'sms' });
        expect(record.failureKind).toBe('permanent');
    });

    test('should give up on a channel call that hangs', async () => {
        const { slot, entry, token } = await setup(h);
        h.sms.send.mockImplementation(() => new Promise(() => undefined));

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(result.channels[0]).toEqual({
            channel: 'sms',
            outcome: 'failed',
            attempts: 3,
            error: 'timed out after 50ms',
        });
        const records = await h.ctx.records.notifications.list({ tokenId: token.id, channel: 'sms' });
        expect(records.map(record => record.failureKind)).toEqual(['timeout', 'timeout', 'timeout']);
        expect(result.channels[1].outcome).toBe('delivered');
    });

    test('should treat a thrown channel error as transient', async () => {
        const { slot, entry, token } = await setup(h);
        h.email.send.mockRejectedValueOnce(new Error('socket hang up'));

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(result.channels[1]).toMatchObject({ channel: 'email', outcome: 'delivered', attempts: 2 });
        const [first] = await h.ctx.records.notifications.list({ tokenId: token.id, channel: 'email', attempt: 1 });
        expect(first.error).toBe('socket hang up');
    });

    test('should skip a channel without a contact address', async () => {
        const { slot, entry, token } = await setup(h, { phone: undefined });

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(h.sms.send).not.toHaveBeenCalled();
        expect(result.channels[0]).toEqual({ channel: 'sms', outcome: 'skipped', attempts: 0, error: 'no contact address' });
        expect(result.status).toBe('sent');
        expect(await h.ctx.records.notifications.get(buildNotificationDocId(token.id, 'sms', 1))).toMatchObject({
            outcome: 'skipped',
        });
    });

    test('a failing channel does not hold up the other', async () => {
        const { slot, entry, token } = await setup(h);
        h.sms.send.mockImplementation(() => new Promise(() => undefined));

        await dispatchClaimNotification(h.ctx, entry, slot, token);

        const [emailRecord] = await h.ctx.records.notifications.list({ tokenId: token.id, channel: 'email' });
        const smsRecords = await h.ctx.records.notifications.list({ tokenId: token.id, channel: 'sms' });
        expect(emailRecord.outcome).toBe('delivered');
        expect(smsRecords).toHaveLength(3);
    });

    test('should be idempotent per token', async () => {
        const { slot, entry, token } = await setup(h);

        const first = await dispatchClaimNotification(h.ctx, entry, slot, token);
        const second = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(second).toEqual(first);
        expect(h.sms.send).toHaveBeenCalledTimes(1);
        expect(h.email.send).toHaveBeenCalledTimes(1);
        expect((await h.ctx.records.waitlist.get(entry.id))?.notifiedCount).toBe(1);
    });

    test('all channels failing marks the dispatch failed and leaves the token alone', async () => {
        const { slot, entry, token } = await setup(h);
        h.sms.send.mockResolvedValue(transientFailure);
        h.email.send.mockResolvedValue({ ok: false, error: 'bad address', permanent: true });
        const onFailed = vi.fn();
        h.events.on('dispatch-failed', onFailed);

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(result.status).toBe('failed');
        expect(onFailed).toHaveBeenCalledTimes(1);
        const [emitted, failures] = onFailed.mock.calls[0];
        expect(emitted).toEqual(result);
        expect(failures).toHaveLength(2);
        expect(failures.every((failure: unknown) => failure instanceof DispatchError)).toBe(true);
        expect(failures.map((failure: DispatchError) => [failure.channel, failure.message, failure.permanent])).toEqual([
            ['sms', '[sms] provider busy', false],
            ['email', '[email] bad address', true],
        ]);
        expect(await h.ctx.records.tokens.get(token.id)).toEqual(token);
        expect(await h.ctx.records.slots.get(slot.id)).toEqual(slot);
        expect(await h.ctx.records.dispatches.get(token.id)).toEqual(result);
    });
});

describe('Dispatch after a store failure', () => {
    let h: TestHarness;

    beforeEach(() => {
        h = createHarness();
    });

    test('a failed marker commit leaves nothing behind and the retry sends', async () => {
        const { slot, entry, token } = await setup(h);
        h.store.failNext('commitAll');

        await expect(dispatchClaimNotification(h.ctx, entry, slot, token)).rejects.toBeInstanceOf(StoreUnavailableError);
        expect(await h.ctx.records.dispatches.get(token.id)).toBeNull();
        expect((await h.ctx.records.waitlist.get(entry.id))?.notifiedCount).toBe(0);

        const retried = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(retried.status).toBe('sent');
        expect(h.sms.send).toHaveBeenCalledTimes(1);
        expect(h.email.send).toHaveBeenCalledTimes(1);
        expect((await h.ctx.records.waitlist.get(entry.id))?.notifiedCount).toBe(1);
    });

    test('a pending marker is left alone while its dispatch may still be running', async () => {
        const { slot, entry, token } = await setup(h);
        h.store.failNext('put');
        await expect(dispatchClaimNotification(h.ctx, entry, slot, token)).rejects.toBeInstanceOf(StoreUnavailableError);

        const again = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(again.status).toBe('pending');
        expect(h.sms.send).toHaveBeenCalledTimes(1);
        expect(h.email.send).toHaveBeenCalledTimes(1);
    });

    test('a stalled pending marker is taken over without counting the entry twice', async () => {
        const { slot, entry, token } = await setup(h);
        h.store.failNext('put');
        await expect(dispatchClaimNotification(h.ctx, entry, slot, token)).rejects.toBeInstanceOf(StoreUnavailableError);
        h.clock.advance(HOUR_MS);

        const retried = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(retried.status).toBe('sent');
        expect(retried.startedAt).toBe(h.clock.now().toISOString());
        expect(h.sms.send).toHaveBeenCalledTimes(2);
        expect(h.email.send).toHaveBeenCalledTimes(2);
        expect((await h.ctx.records.waitlist.get(entry.id))?.notifiedCount).toBe(1);
        expect(await h.ctx.records.dispatches.get(token.id)).toEqual(retried);
    });

    test('the lease covers every attempt timing out plus the backoff', () => {
        expect(dispatchLeaseMs({ maxAttempts: 3, backoffMs: 10, timeoutMs: 50 })).toBe(4 * 50 + 10 + 20);
    });
});

describe('Claim offer over the real SMS channel', () => {
    test('the truncated body still carries the whole claim link', async () => {
        const h = createHarness();
        const createMessage = vi.fn<SmsClient['createMessage']>(async () => ({ sid: 'SM-test' }));
        h.ctx.channels.sms = new SmsChannel({ createMessage }, '+15550009999');
        const slot = await seedCancelledSlot(h.ctx, { provider: 'Dr. Evangeline Montgomery-Whitfield' });
        const [entry] = await seedEntries(h.ctx, [buildEntry(1)]);
        const token = await issueToken(h.ctx, slot, entry, { wave: 1 });

        const result = await dispatchClaimNotification(h.ctx, entry, slot, token);

        expect(result.channels[0]).toMatchObject({ channel: 'sms', outcome: 'delivered', providerId: 'SM-test' });
        const { body, to } = createMessage.mock.calls[0][0];
        expect(to).toBe('+15550000001');
        expect(body).toHaveLength(SMS_MAX_LENGTH);
        expect(body.startsWith(`Book now: https://clinic.test/claim?token=${token.secret}\n`)).toBe(true);
    });
});

describe('Unreachable candidate can still claim', () => {
    test('token stays claimable after both channels fail', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        await seedEntries(h.ctx, [buildEntry(1)]);
        h.sms.send.mockResolvedValue(transientFailure);
        h.email.send.mockResolvedValue(transientFailure);
        const onFailed = vi.fn();
        h.events.on('dispatch-failed', onFailed);

        const outcome = await h.engine.cancelSlot('slot-1');
        await h.ctx.background.drain();

        expect(outcome.kind).toBe('launched');
        if (outcome.kind !== 'launched') return;
        const [token] = outcome.tokens;
        expect(onFailed).toHaveBeenCalledTimes(1);
        expect((await h.ctx.records.tokens.get(token.id))?.state).toBe('issued');
        expect((await h.ctx.records.slots.get('slot-1'))?.status).toBe('offering');

        const claim = await h.engine.claim(token.secret);
        expect(claim.outcome).toBe('booked');
    });
});

describe('SMS text', () => {
    test('should be cut to the SMS limit', () => {
        const text = 'x'.repeat(200);
        const truncated = truncateSms(text);
        expect(truncated).toHaveLength(SMS_MAX_LENGTH);
        expect(truncated.endsWith('...')).toBe(true);
    });

    test('should leave short text alone', () => {
        expect(truncateSms('See you soon')).toBe('See you soon');
    });
});
