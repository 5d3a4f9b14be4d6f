import type { OpenSlot, Slot } from '@cancelfill/shared-types';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import { markSlotCancelled } from '../models/slot';
import { NotFoundError, ValidationError } from '../utils/errors';
import { launchNextWave, type WaveOutcome } from './wave-service';

const log = createLogger('Cancellation');

export type CancellationOutcome = WaveOutcome | { kind: 'already-offering'; slot: Slot };

async function loadSlot(ctx: EngineContext, slotId: string): Promise<Slot> {
    const slot = await ctx.records.slots.get(slotId);
    if (!slot) {
        throw new NotFoundError(ctx.records.slots.name, slotId);
    }
    return slot;
}

async function moveToCancelled(ctx: EngineContext, slot: Slot, reason?: string): Promise<Slot> {
    const from = slot.status;
    const result = await ctx.records.slots.conditionalUpdate(
        slot.id,
        current => current.status === from && current.cycle === slot.cycle,
        current => markSlotCancelled(current, ctx.clock(), reason)
    );
    if (result.ok) {
        return result.value;
    }
    if (!result.current) {
        throw new NotFoundError(ctx.records.slots.name, slot.id);
    }
    return result.current;
}

/**
 * Starts filling a freed slot: wave 1 goes out, or the slot is marked
 * unfilled straight away when nobody on the waitlist matches.
 *
 * A scheduled slot is cancelled first. Calling this again for a slot that is
 * already being offered changes nothing.
 */
export async function onSlotCancelled(ctx: EngineContext, slotId: string): Promise<CancellationOutcome> {
    let slot = await loadSlot(ctx, slotId);

    if (slot.status === 'scheduled') {
        slot = await moveToCancelled(ctx, slot);
    }

    switch (slot.status) {
        case 'offering':
            log.debug(`Slot ${slot.id} already offering (cycle ${slot.cycle}, wave ${slot.wave})`);
            return { kind: 'already-offering', slot };
        case 'cancelled':
            return launchNextWave(ctx, slot);
        default:
            throw new ValidationError(`Slot ${slot.id} is ${slot.status} and cannot be offered`);
    }
}

/**
 * Staff or patient cancellation of a booked slot, followed by the first
 * wave of offers.
 */
export async function cancelSlot(ctx: EngineContext, slotId: string, reason?: string): Promise<CancellationOutcome> {
    const slot = await loadSlot(ctx, slotId);
    if (slot.status === 'scheduled') {
        const cancelled = await moveToCancelled(ctx, slot, reason);
        log.info(`Slot ${slotId} cancelled${reason ? `: ${reason}` : ''}`);
        if (cancelled.status === 'scheduled') {
            throw new ValidationError(`Slot ${slotId} could not be cancelled`);
        }
    } else if (slot.status !== 'cancelled' && slot.status !== 'offering') {
        throw new ValidationError(`Slot ${slotId} is ${slot.status} and cannot be cancelled`);
    }
    return onSlotCancelled(ctx, slotId);
}

/**
 * Gives an unfilled slot another cancellation cycle. Tokens from earlier
 * cycles stay dead: they no longer match the slot's cycle.
 */
export async function reopenSlot(ctx: EngineContext, slotId: string): Promise<OpenSlot> {
    const slot = await loadSlot(ctx, slotId);
    if (slot.status !== 'unfilled') {
        throw new ValidationError(`Only unfilled slots can be reopened; slot ${slotId} is ${slot.status}`);
    }

    const result = await ctx.records.slots.conditionalUpdate(
        slotId,
        current => current.status === 'unfilled' && current.cycle === slot.cycle,
        current => markSlotCancelled(current, ctx.clock())
    );
    if (!result.ok || result.value.status === 'filled') {
        throw new ValidationError(`Slot ${slotId} changed while reopening`);
    }

    log.info(`Slot ${slotId} reopened for cycle ${result.value.cycle}`);
    return result.value;
}
