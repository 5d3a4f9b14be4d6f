import type { Slot, WaitlistEntry } from '@cancelfill/shared-types';
import type { OutboundMessage } from '../channels/notification-channel';
import { formatSlotForDisplay } from '../utils/date-utils';

export type MessageContent = Omit<OutboundMessage, 'to'>;

const escapeHtml = (value: string) =>
    value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');

function formatTtl(ttlMs: number): string {
    const minutes = Math.round(ttlMs / 60_000);
    if (minutes % 60 === 0) {
        const hours = minutes / 60;
        return `${hours} hour${hours === 1 ? '' : 's'}`;
    }
    return `${minutes} minutes`;
}

export function buildClaimOfferMessage(params: {
    clinicName: string;
    entry: WaitlistEntry;
    slot: Slot;
    claimLink: string;
    ttlMs: number;
}): MessageContent {
    const { clinicName, entry, slot, claimLink, ttlMs } = params;
    const when = formatSlotForDisplay(slot.date, slot.time);
    const expiry = formatTtl(ttlMs);

    return {
        subject: `Appointment Available - ${when}`,
        // Link first: SMS bodies are cut at 160 characters.
        text: `Book now: ${claimLink}\n${clinicName}: ${slot.specialty} appointment ${when} with ${slot.provider}. Expires in ${expiry}.`,
        html: [
            `<p>Dear ${escapeHtml(entry.patientName)},</p>`,
            `<p>An appointment matching your preferences is available:</p>`,
            `<p><strong>${escapeHtml(slot.specialty)}</strong> with ${escapeHtml(slot.provider)}, ${escapeHtml(when)}</p>`,
            `<p><a href="${escapeHtml(claimLink)}">Book This Appointment</a></p>`,
            `<p>This link expires in ${expiry}. First come, first served.</p>`,
        ].join('\n'),
    };
}

export function buildBookingConfirmedMessage(params: { clinicName: string; slot: Slot }): MessageContent {
    const when = formatSlotForDisplay(params.slot.date, params.slot.time);
    return {
        subject: `Appointment Confirmed - ${when}`,
        text: `${params.clinicName}: Your appointment is confirmed for ${when} with ${params.slot.provider}. Please arrive 15 minutes early.`,
    };
}

export function buildStaffSlotFilledMessage(params: { slot: Slot; entry: WaitlistEntry }): MessageContent {
    const { slot, entry } = params;
    const when = formatSlotForDisplay(slot.date, slot.time);
    return {
        subject: `Appointment Filled - ${when}`,
        text: [
            `Slot ${slot.id} (${slot.specialty}, ${slot.provider}, ${when}) was filled from the waitlist.`,
            `Patient: ${entry.patientName}`,
            `Phone: ${entry.phone ?? 'n/a'}`,
            `Email: ${entry.email ?? 'n/a'}`,
        ].join('\n'),
    };
}

export function buildStaffSlotUnfilledMessage(params: { slot: Slot }): MessageContent {
    const { slot } = params;
    const when = formatSlotForDisplay(slot.date, slot.time);
    return {
        subject: `Slot Unfilled - ${when}`,
        text: `Slot ${slot.id} (${slot.specialty}, ${slot.provider}, ${when}) could not be filled after ${slot.wave} wave(s) and ${slot.notifiedEntryIds.length} offer(s). Manual follow-up needed.`,
    };
}
