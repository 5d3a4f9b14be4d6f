import type { OpenSlot, Slot, SlotStatus } from '@cancelfill/shared-types';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import { createSlot, type SlotInput } from '../models/slot';
import { NotFoundError, ValidationError } from '../utils/errors';

const log = createLogger('Schedule');

/**
 * Creates scheduled slots in one commit. Nothing is written if any input is
 * invalid or any id is already taken.
 */
export async function importSlots(ctx: EngineContext, inputs: SlotInput[]): Promise<OpenSlot[]> {
    const now = ctx.clock();
    const slots = inputs.map(input => createSlot(input, now));

    const ids = slots.map(slot => slot.id);
    const repeated = [...new Set(ids.filter((id, index) => ids.indexOf(id) !== index))];
    if (repeated.length > 0) {
        throw new ValidationError('Duplicate slot ids in import', repeated);
    }

    const result = await ctx.store.commitAll(slots.map(slot => ctx.records.slots.insert(slot.id, slot)));
    if (!result.ok) {
        throw new ValidationError('Slot already exists', [slots[result.failedIndex].id]);
    }

    log.info(`Imported ${slots.length} slot(s)`);
    return slots;
}

export async function getSlot(ctx: EngineContext, slotId: string): Promise<Slot> {
    const slot = await ctx.records.slots.get(slotId);
    if (!slot) {
        throw new NotFoundError(ctx.records.slots.name, slotId);
    }
    return slot;
}

/** Slots ordered by date and time. */
export async function listSlots(ctx: EngineContext, status?: SlotStatus): Promise<Slot[]> {
    const slots = await ctx.records.slots.list(status ? { status } : undefined);
    return slots.sort((a, b) => `${a.date} ${a.time}`.localeCompare(`${b.date} ${b.time}`) || a.id.localeCompare(b.id));
}
