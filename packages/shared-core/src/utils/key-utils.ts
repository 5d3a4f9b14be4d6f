/**
 * Builds consistent document IDs for keyed engine records.
 *
 * Rules:
 * 1. Replace all whitespaces with underscores.
 * 2. Remove all non-alphanumeric characters except underscores and hyphens.
 */
function toDocId(raw: string): string {
    return raw
        .replace(/\s+/g, '_')
        .replace(/[^a-zA-Z0-9_-]/g, '');
}

/**
 * One binding per (slot, entry, cycle). Creating it is the idempotency lock
 * for token issuance.
 */
export function buildBindingDocId(slotId: string, entryId: string, cycle: number): string {
    return toDocId(`${slotId}_${entryId}_c${cycle}`);
}

export function buildSecretDocId(secret: string): string {
    return toDocId(`ts_${secret}`);
}

export function buildNotificationDocId(tokenId: string, channel: string, attempt: number): string {
    return toDocId(`${tokenId}_${channel}_${attempt}`);
}
