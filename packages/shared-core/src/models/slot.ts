import { z } from 'zod';
import type { FilledSlot, OpenSlot, Slot, SlotStatus } from '@cancelfill/shared-types';
import { isValidSlotDate, normalizeSlotTime } from '../utils/date-utils';
import { ValidationError } from '../utils/errors';

export const MIN_DURATION_MINUTES = 15;
export const MAX_DURATION_MINUTES = 120;

const slotFields = {
    id: z.string().min(1),
    date: z.string().refine(isValidSlotDate, 'date must be yyyy-MM-dd'),
    time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'time must be HH:mm'),
    specialty: z.string().min(1),
    provider: z.string().min(1),
    durationMinutes: z.number().int().min(MIN_DURATION_MINUTES).max(MAX_DURATION_MINUTES),
    cycle: z.number().int().nonnegative(),
    wave: z.number().int().nonnegative(),
    notifiedEntryIds: z.array(z.string()),
    cancellationReason: z.string().optional(),
    cancelledAt: z.string().datetime().optional(),
    offeringStartedAt: z.string().datetime().optional(),
    closedAt: z.string().datetime().optional(),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
};

const openSlotSchema = z.object({
    ...slotFields,
    status: z.enum(['scheduled', 'cancelled', 'offering', 'unfilled']),
});

const filledSlotSchema = z.object({
    ...slotFields,
    status: z.literal('filled'),
    filledByEntryId: z.string().min(1),
    filledByTokenId: z.string().min(1),
    filledAt: z.string().datetime(),
});

export const slotSchema: z.ZodType<Slot> = z.discriminatedUnion('status', [openSlotSchema, filledSlotSchema]);

export const slotInputSchema = z.object({
    id: z.string().min(1),
    date: z.string().refine(isValidSlotDate, 'date must be yyyy-MM-dd'),
    time: z.string().min(1),
    specialty: z.string().trim().min(1),
    provider: z.string().trim().min(1),
    durationMinutes: z.number().int().min(MIN_DURATION_MINUTES).max(MAX_DURATION_MINUTES),
});

export type SlotInput = z.infer<typeof slotInputSchema>;

/**
 * Allowed status moves within one cancellation cycle. `unfilled → cancelled`
 * starts a new cycle and only happens through an explicit reopen.
 */
const TRANSITIONS: Record<SlotStatus, SlotStatus[]> = {
    scheduled: ['cancelled'],
    cancelled: ['offering', 'unfilled'],
    offering: ['filled', 'unfilled'],
    filled: [],
    unfilled: ['cancelled'],
};

export function canTransition(from: SlotStatus, to: SlotStatus): boolean {
    return TRANSITIONS[from].includes(to);
}

function assertTransition(slot: Slot, to: SlotStatus): asserts slot is OpenSlot {
    if (!canTransition(slot.status, to)) {
        throw new ValidationError(`Slot ${slot.id} cannot move from ${slot.status} to ${to}`);
    }
}

export function createSlot(input: SlotInput, now: Date): OpenSlot {
    const parsed = slotInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError('Invalid slot', parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }

    const time = normalizeSlotTime(parsed.data.time);
    if (!time) {
        throw new ValidationError('Invalid slot', [`time: ${parsed.data.time} is not a time of day`]);
    }

    const timestamp = now.toISOString();
    return {
        ...parsed.data,
        time,
        status: 'scheduled',
        cycle: 0,
        wave: 0,
        notifiedEntryIds: [],
        createdAt: timestamp,
        updatedAt: timestamp,
    };
}

export function markSlotCancelled(slot: Slot, now: Date, reason?: string): OpenSlot {
    assertTransition(slot, 'cancelled');
    const timestamp = now.toISOString();
    const reopening = slot.status === 'unfilled';
    return {
        ...slot,
        status: 'cancelled',
        cycle: reopening ? slot.cycle + 1 : slot.cycle,
        wave: 0,
        notifiedEntryIds: [],
        cancellationReason: reason ?? slot.cancellationReason,
        cancelledAt: timestamp,
        offeringStartedAt: undefined,
        closedAt: undefined,
        updatedAt: timestamp,
    };
}

/**
 * Records a launched wave. The first wave moves cancelled → offering; later
 * waves keep the slot offering and only bump the wave counter.
 */
export function markSlotOffering(slot: Slot, wave: number, entryIds: string[], now: Date): OpenSlot {
    if (slot.status !== 'offering') {
        assertTransition(slot, 'offering');
    }
    const timestamp = now.toISOString();
    return {
        ...slot,
        status: 'offering',
        wave,
        notifiedEntryIds: [...new Set([...slot.notifiedEntryIds, ...entryIds])],
        offeringStartedAt: slot.offeringStartedAt ?? timestamp,
        updatedAt: timestamp,
    };
}

export function markSlotFilled(slot: Slot, entryId: string, tokenId: string, now: Date): FilledSlot {
    assertTransition(slot, 'filled');
    const timestamp = now.toISOString();
    return {
        ...slot,
        status: 'filled',
        filledByEntryId: entryId,
        filledByTokenId: tokenId,
        filledAt: timestamp,
        closedAt: timestamp,
        updatedAt: timestamp,
    };
}

export function markSlotUnfilled(slot: Slot, now: Date): OpenSlot {
    assertTransition(slot, 'unfilled');
    const timestamp = now.toISOString();
    return {
        ...slot,
        status: 'unfilled',
        closedAt: timestamp,
        updatedAt: timestamp,
    };
}
