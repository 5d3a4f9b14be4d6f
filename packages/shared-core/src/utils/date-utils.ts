import { addMilliseconds, differenceInMilliseconds, format, isValid, parse, parseISO } from 'date-fns';
import type { TimeOfDay } from '@cancelfill/shared-types';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const DATE_FORMAT = 'yyyy-MM-dd';
const TIME_FORMAT = 'HH:mm';
const ACCEPTED_TIME_FORMATS = ['HH:mm', 'H:mm', 'hh:mm a', 'h:mm a'];

/**
 * Returns true for a real calendar date written as yyyy-MM-dd.
 */
export function isValidSlotDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
        return false;
    }
    const parsed = parse(value, DATE_FORMAT, new Date());
    return isValid(parsed) && format(parsed, DATE_FORMAT) === value;
}

/**
 * Normalises "10:00", "9:30", "02:30 PM" to 24h "HH:mm".
 * Returns null when the input is not a time of day.
 */
export function normalizeSlotTime(value: string): string | null {
    const trimmed = value.trim().toUpperCase();
    for (const pattern of ACCEPTED_TIME_FORMATS) {
        const parsed = parse(trimmed, pattern, new Date(2000, 0, 1));
        if (isValid(parsed)) {
            return format(parsed, TIME_FORMAT);
        }
    }
    return null;
}

/**
 * Morning before 12:00, afternoon until 17:00, evening after.
 */
export function getTimeOfDay(time: string): TimeOfDay {
    const normalized = normalizeSlotTime(time);
    if (!normalized) {
        throw new RangeError(`Invalid slot time: ${time}`);
    }
    const hour = Number(normalized.slice(0, 2));
    if (hour < 12) return 'morning';
    if (hour < 17) return 'afternoon';
    return 'evening';
}

export function addMsIso(date: Date, ms: number): string {
    return addMilliseconds(date, ms).toISOString();
}

export function isPastIso(iso: string, now: Date): boolean {
    return now.getTime() > parseISO(iso).getTime();
}

export function msBetween(fromIso: string, to: Date): number {
    return differenceInMilliseconds(to, parseISO(fromIso));
}

export function formatSlotForDisplay(date: string, time: string): string {
    const parsed = parse(`${date} ${time}`, `${DATE_FORMAT} ${TIME_FORMAT}`, new Date());
    return isValid(parsed) ? format(parsed, 'EEE d MMM yyyy, hh:mm a') : `${date} ${time}`;
}

export function durationMs(fromIso: string, toIso: string): number {
    return differenceInMilliseconds(parseISO(toIso), parseISO(fromIso));
}

/** Calendar date of an instant in the slot date format. */
export function toSlotDate(date: Date): string {
    return format(date, DATE_FORMAT);
}
