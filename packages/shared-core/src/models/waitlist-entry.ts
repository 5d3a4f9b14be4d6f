import { z } from 'zod';
import type { DeactivationReason, TimePreference, WaitlistEntry } from '@cancelfill/shared-types';
import { isValidSlotDate } from '../utils/date-utils';
import { ValidationError } from '../utils/errors';

export const MAX_PREFERRED_DATES = 10;
export const MAX_ACTIVE_ENTRIES_PER_PHONE = 5;

const TIME_PREFERENCES = ['morning', 'afternoon', 'evening', 'any'] as const satisfies readonly TimePreference[];

const slotDate = z.string().refine(isValidSlotDate, 'dates must be yyyy-MM-dd');

export const waitlistEntrySchema: z.ZodType<WaitlistEntry> = z.object({
    id: z.string().min(1),
    patientName: z.string().min(1),
    phone: z.string().regex(/^\d{10,15}$/).optional(),
    email: z.string().email().optional(),
    specialty: z.string().min(1),
    preferredDates: z.array(slotDate).min(1).max(MAX_PREFERRED_DATES),
    timePreferences: z.array(z.enum(TIME_PREFERENCES)).min(1),
    active: z.boolean(),
    notifiedCount: z.number().int().nonnegative(),
    createdAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
    deactivatedAt: z.string().datetime().optional(),
    deactivationReason: z.enum(['patient', 'staff', 'booked']).optional(),
    bookedSlotId: z.string().optional(),
});

export const waitlistInputSchema = z
    .object({
        patientName: z.string().trim().min(2).max(50),
        phone: z
            .string()
            .transform(value => value.replace(/\D/g, ''))
            .pipe(z.string().regex(/^\d{10,15}$/, 'phone must have 10 to 15 digits'))
            .optional(),
        email: z.string().trim().toLowerCase().email().optional(),
        specialty: z.string().trim().min(1),
        preferredDates: z.array(slotDate).min(1).max(MAX_PREFERRED_DATES),
        timePreferences: z.array(z.enum(TIME_PREFERENCES)).min(1),
    })
    .refine(input => input.phone !== undefined || input.email !== undefined, {
        message: 'a phone number or an email address is required',
        path: ['phone'],
    });

export type WaitlistInput = z.input<typeof waitlistInputSchema>;

/**
 * "any" subsumes the other preferences, so it is stored alone.
 */
function normalizeTimePreferences(preferences: TimePreference[]): TimePreference[] {
    if (preferences.includes('any')) {
        return ['any'];
    }
    return [...new Set(preferences)];
}

export function createWaitlistEntry(id: string, input: WaitlistInput, now: Date, today: string): WaitlistEntry {
    const parsed = waitlistInputSchema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError(
            'Invalid waitlist entry',
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const pastDates = parsed.data.preferredDates.filter(date => date < today);
    if (pastDates.length > 0) {
        throw new ValidationError('Invalid waitlist entry', pastDates.map(date => `preferredDates: ${date} is in the past`));
    }

    const timestamp = now.toISOString();
    return {
        id,
        patientName: parsed.data.patientName,
        phone: parsed.data.phone,
        email: parsed.data.email,
        specialty: parsed.data.specialty,
        preferredDates: [...new Set(parsed.data.preferredDates)].sort(),
        timePreferences: normalizeTimePreferences(parsed.data.timePreferences),
        active: true,
        notifiedCount: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
    };
}

export function incrementNotifiedCount(entry: WaitlistEntry, now: Date): WaitlistEntry {
    return { ...entry, notifiedCount: entry.notifiedCount + 1, updatedAt: now.toISOString() };
}

export function deactivateEntry(
    entry: WaitlistEntry,
    reason: DeactivationReason,
    now: Date,
    bookedSlotId?: string
): WaitlistEntry {
    const timestamp = now.toISOString();
    return {
        ...entry,
        active: false,
        deactivatedAt: timestamp,
        deactivationReason: reason,
        bookedSlotId: bookedSlotId ?? entry.bookedSlotId,
        updatedAt: timestamp,
    };
}
