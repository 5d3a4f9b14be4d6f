/**
 * Cancellation entry points: first wave, idempotent replays, reopening.
 */

import { describe, test, expect, vi } from 'vitest';
import { NotFoundError, ValidationError } from '../utils/errors';
import { buildEntry, createHarness, HOUR_MS, seedEntries, seedSlot } from './test-helpers';

describe('Slot cancellation', () => {
    test('should offer the slot to every matching entry in signup order', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        await seedEntries(h.ctx, [
            buildEntry(3),
            buildEntry(1),
            buildEntry(2, { timePreferences: ['evening'] }),
            buildEntry(4, { specialty: 'cardiology' }),
        ]);

        const outcome = await h.engine.cancelSlot('slot-1', 'provider ill');
        await h.ctx.background.drain();

        expect(outcome.kind).toBe('launched');
        const slot = await h.ctx.records.slots.get('slot-1');
        expect(slot).toMatchObject({
            status: 'offering',
            cycle: 0,
            wave: 1,
            notifiedEntryIds: ['entry-1', 'entry-3'],
            cancellationReason: 'provider ill',
            cancelledAt: '2025-03-10T08:00:00.000Z',
            offeringStartedAt: '2025-03-10T08:00:00.000Z',
        });
        expect(h.sms.send.mock.calls.map(([message]) => message.to).sort()).toEqual(['5550000001', '5550000003']);
    });

    test('urgent mode offers a wider wave', async () => {
        const h = createHarness({ env: { WAVE_SIZE: '1', URGENT_FILL_MODE: 'true', URGENT_WAVE_SIZE: '3' } });
        await seedSlot(h.ctx);
        await seedEntries(h.ctx, [buildEntry(1), buildEntry(2), buildEntry(3), buildEntry(4)]);

        const outcome = await h.engine.cancelSlot('slot-1');

        expect(outcome.kind === 'launched' && outcome.tokens.length).toBe(3);
    });

    test('should mark the slot unfilled when nobody matches', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        const onUnfilled = vi.fn();
        h.events.on('slot-unfilled', onUnfilled);

        const outcome = await h.engine.cancelSlot('slot-1');
        await h.ctx.background.drain();

        expect(outcome.kind).toBe('exhausted');
        expect((await h.ctx.records.slots.get('slot-1'))?.status).toBe('unfilled');
        expect(onUnfilled).toHaveBeenCalledTimes(1);
        expect(h.email.send).toHaveBeenCalledTimes(1);
        expect(h.email.send.mock.calls[0][0].to).toBe('staff@clinic.test');
    });

    test('replaying the cancellation event changes nothing', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        await seedEntries(h.ctx, [buildEntry(1)]);

        await h.engine.cancelSlot('slot-1');
        const replay = await h.engine.onSlotCancelled('slot-1');
        await h.ctx.background.drain();

        expect(replay.kind).toBe('already-offering');
        expect(await h.ctx.records.tokens.list({ slotId: 'slot-1' })).toHaveLength(1);
        expect(h.sms.send).toHaveBeenCalledTimes(1);
    });

    test('onSlotCancelled accepts a slot cancelled elsewhere', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        await seedEntries(h.ctx, [buildEntry(1)]);

        const outcome = await h.engine.onSlotCancelled('slot-1');

        expect(outcome.kind).toBe('launched');
    });

    test('two replicas handling the same event launch one wave', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        await seedEntries(h.ctx, [buildEntry(1), buildEntry(2)]);

        const outcomes = await Promise.all([h.engine.onSlotCancelled('slot-1'), h.engine.onSlotCancelled('slot-1')]);
        await h.ctx.background.drain();

        expect(outcomes.filter(outcome => outcome.kind === 'launched')).toHaveLength(1);
        expect(await h.ctx.records.tokens.list({ slotId: 'slot-1' })).toHaveLength(2);
        expect(h.sms.send).toHaveBeenCalledTimes(2);
    });

    test('should reject unknown and closed slots', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);

        await expect(h.engine.cancelSlot('missing')).rejects.toBeInstanceOf(NotFoundError);
        await h.engine.cancelSlot('slot-1');
        await expect(h.engine.cancelSlot('slot-1')).rejects.toBeInstanceOf(ValidationError);
    });
});

describe('Reopening', () => {
    test('starts a new cycle and offers the slot again', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        await seedEntries(h.ctx, [buildEntry(1)]);
        const first = await h.engine.cancelSlot('slot-1');
        await h.ctx.background.drain();
        if (first.kind !== 'launched') throw new Error('expected a wave');
        h.clock.advance(2 * HOUR_MS + 1);
        await h.engine.runReaperPass();
        await h.ctx.background.drain();

        const reopened = await h.engine.reopenSlot('slot-1');
        expect(reopened).toMatchObject({ status: 'cancelled', cycle: 1, wave: 0, notifiedEntryIds: [] });

        const second = await h.engine.onSlotCancelled('slot-1');
        await h.ctx.background.drain();
        expect(second.kind).toBe('launched');
        if (second.kind !== 'launched') return;
        expect(second.tokens[0]).toMatchObject({ entryId: 'entry-1', cycle: 1, wave: 1 });

        expect(await h.engine.claim(first.tokens[0].secret)).toEqual({ outcome: 'rejected', reason: 'Expired' });
        expect((await h.engine.claim(second.tokens[0].secret)).outcome).toBe('booked');
    });

    test('only unfilled slots can be reopened', async () => {
        const h = createHarness();
        await seedSlot(h.ctx);
        await expect(h.engine.reopenSlot('slot-1')).rejects.toBeInstanceOf(ValidationError);
    });
});
