import type { Slot, WaitlistEntry } from '@cancelfill/shared-types';
import type { EngineContext } from '../lib/engine-context';
import { getTimeOfDay } from '../utils/date-utils';
import { ValidationError } from '../utils/errors';

/**
 * Specialty, date and time-of-day must all line up; "any" matches every time.
 */
export function isEligibleForSlot(entry: WaitlistEntry, slot: Slot): boolean {
    if (!entry.active) return false;
    if (entry.specialty !== slot.specialty) return false;
    if (!entry.preferredDates.includes(slot.date)) return false;
    if (entry.timePreferences.includes('any')) return true;
    return entry.timePreferences.includes(getTimeOfDay(slot.time));
}

/**
 * First come, first served; ties go to the less-notified patient, then to id
 * so the order is stable across replicas.
 */
export function compareCandidates(a: WaitlistEntry, b: WaitlistEntry): number {
    if (a.createdAt !== b.createdAt) {
        return a.createdAt < b.createdAt ? -1 : 1;
    }
    if (a.notifiedCount !== b.notifiedCount) {
        return a.notifiedCount - b.notifiedCount;
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Picks the next wave for a slot out of a candidate pool. Pure: the slot is
 * not touched. An empty result means nobody is left to offer the slot to.
 */
export function selectWave(slot: Slot, pool: WaitlistEntry[], waveSize: number): WaitlistEntry[] {
    if (slot.status !== 'cancelled' && slot.status !== 'offering') {
        throw new ValidationError(`Slot ${slot.id} is ${slot.status}; only cancelled or offering slots can be matched`);
    }
    if (!Number.isInteger(waveSize) || waveSize < 1) {
        throw new ValidationError(`Wave size must be a positive integer, got ${waveSize}`);
    }

    const alreadyOffered = new Set(slot.notifiedEntryIds);

    return pool
        .filter(entry => !alreadyOffered.has(entry.id) && isEligibleForSlot(entry, slot))
        .sort(compareCandidates)
        .slice(0, waveSize);
}

export async function findNextWaveCandidates(
    ctx: EngineContext,
    slot: Slot,
    waveSize: number
): Promise<WaitlistEntry[]> {
    const pool = await ctx.records.waitlist.list({ active: true, specialty: slot.specialty });
    return selectWave(slot, pool, waveSize);
}
