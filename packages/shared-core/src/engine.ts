import type { BookingResult, OpenSlot, WaitlistEntry, DeactivationReason, Slot, SlotStatus } from '@cancelfill/shared-types';
import { createEngineContext, type EngineContext, type EngineContextOptions } from './lib/engine-context';
import { createLogger } from './lib/logger';
import type { SlotInput } from './models/slot';
import type { WaitlistInput } from './models/waitlist-entry';
import { claimSlot } from './services/booking-service';
import { cancelSlot, onSlotCancelled, reopenSlot, type CancellationOutcome } from './services/cancellation-service';
import { ExpiryReaper, type ReaperReport } from './services/expiry-reaper';
import { computeFillMetrics, type FillMetrics } from './services/fill-metrics';
import { getSlot, importSlots, listSlots } from './services/schedule-service';
import {
    addWaitlistEntry,
    deactivateWaitlistEntry,
    getWaitlistEntry,
    listActiveEntries,
} from './services/waitlist-service';

const log = createLogger('Engine');

/**
 * Entry point for front ends and workers. Holds no slot state of its own;
 * any number of engines may share one store.
 */
export class CancellationFillEngine {
    private readonly reaper: ExpiryReaper;

    constructor(readonly ctx: EngineContext) {
        this.reaper = new ExpiryReaper(ctx);
    }

    claim(secret: string): Promise<BookingResult> {
        return claimSlot(this.ctx, secret);
    }

    onSlotCancelled(slotId: string): Promise<CancellationOutcome> {
        return onSlotCancelled(this.ctx, slotId);
    }

    cancelSlot(slotId: string, reason?: string): Promise<CancellationOutcome> {
        return cancelSlot(this.ctx, slotId, reason);
    }

    reopenSlot(slotId: string): Promise<OpenSlot> {
        return reopenSlot(this.ctx, slotId);
    }

    runReaperPass(now?: Date): Promise<ReaperReport> {
        return this.reaper.runPass(now);
    }

    startReaper(intervalMs?: number): void {
        this.reaper.start(intervalMs);
    }

    stopReaper(): Promise<void> {
        return this.reaper.stop();
    }

    importSlots(inputs: SlotInput[]): Promise<OpenSlot[]> {
        return importSlots(this.ctx, inputs);
    }

    getSlot(slotId: string): Promise<Slot> {
        return getSlot(this.ctx, slotId);
    }

    listSlots(status?: SlotStatus): Promise<Slot[]> {
        return listSlots(this.ctx, status);
    }

    addWaitlistEntry(input: WaitlistInput): Promise<WaitlistEntry> {
        return addWaitlistEntry(this.ctx, input);
    }

    deactivateWaitlistEntry(id: string, reason: DeactivationReason): Promise<WaitlistEntry> {
        return deactivateWaitlistEntry(this.ctx, id, reason);
    }

    getWaitlistEntry(id: string): Promise<WaitlistEntry> {
        return getWaitlistEntry(this.ctx, id);
    }

    listActiveEntries(specialty?: string): Promise<WaitlistEntry[]> {
        return listActiveEntries(this.ctx, specialty);
    }

    async fillMetrics(): Promise<FillMetrics> {
        const { records } = this.ctx;
        const [slots, tokens, notifications, responses] = await Promise.all([
            records.slots.list(),
            records.tokens.list(),
            records.notifications.list(),
            records.claimResponses.list(),
        ]);
        return computeFillMetrics(slots, tokens, notifications, responses);
    }

    /** Stops the reaper and waits for background sends and sweeps. */
    async shutdown(): Promise<void> {
        await this.stopReaper();
        if (this.ctx.background.pending > 0) {
            log.info(`Waiting for ${this.ctx.background.pending} background task(s)`);
        }
        await this.ctx.background.drain();
    }
}

export function createCancelFillEngine(options: EngineContextOptions): CancellationFillEngine {
    return new CancellationFillEngine(createEngineContext(options));
}
