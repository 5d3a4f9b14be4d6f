import { v4 as uuidv4 } from 'uuid';
import type { DeactivationReason, WaitlistEntry } from '@cancelfill/shared-types';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import {
    createWaitlistEntry,
    deactivateEntry,
    MAX_ACTIVE_ENTRIES_PER_PHONE,
    type WaitlistInput,
} from '../models/waitlist-entry';
import { toSlotDate } from '../utils/date-utils';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';

const log = createLogger('Waitlist');

export async function addWaitlistEntry(ctx: EngineContext, input: WaitlistInput): Promise<WaitlistEntry> {
    const now = ctx.clock();
    const entry = createWaitlistEntry(uuidv4(), input, now, toSlotDate(now));

    if (entry.phone) {
        const active = await ctx.records.waitlist.list({ phone: entry.phone, active: true });
        if (active.length >= MAX_ACTIVE_ENTRIES_PER_PHONE) {
            throw new ValidationError('Invalid waitlist entry', [
                `phone: already on the waitlist ${active.length} times (max ${MAX_ACTIVE_ENTRIES_PER_PHONE})`,
            ]);
        }
    }

    const created = await ctx.records.waitlist.create(entry.id, entry);
    if (!created) {
        throw new ConflictError(ctx.records.waitlist.name, entry.id);
    }

    log.info(`Entry ${entry.id} added for ${entry.specialty} (${entry.preferredDates.length} date(s))`);
    return entry;
}

export async function getWaitlistEntry(ctx: EngineContext, id: string): Promise<WaitlistEntry> {
    const entry = await ctx.records.waitlist.get(id);
    if (!entry) {
        throw new NotFoundError(ctx.records.waitlist.name, id);
    }
    return entry;
}

/**
 * Takes an entry off the waitlist. Already-inactive entries are returned as
 * they are.
 */
export async function deactivateWaitlistEntry(
    ctx: EngineContext,
    id: string,
    reason: DeactivationReason,
    bookedSlotId?: string
): Promise<WaitlistEntry> {
    const result = await ctx.records.waitlist.conditionalUpdate(
        id,
        current => current.active,
        current => deactivateEntry(current, reason, ctx.clock(), bookedSlotId)
    );
    if (result.ok) {
        log.info(`Entry ${id} deactivated (${reason})`);
        return result.value;
    }
    if (!result.current) {
        throw new NotFoundError(ctx.records.waitlist.name, id);
    }
    return result.current;
}

/** Active entries, oldest first. */
export async function listActiveEntries(ctx: EngineContext, specialty?: string): Promise<WaitlistEntry[]> {
    const entries = await ctx.records.waitlist.list(specialty ? { active: true, specialty } : { active: true });
    return entries.sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
}
