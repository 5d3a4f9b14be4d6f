import { v4 as uuidv4 } from 'uuid';
import type { BookingToken, IssuedToken, Slot, WaitlistEntry } from '@cancelfill/shared-types';
import { resolveFillPolicy } from '../config/engine-config';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import type { FieldFilter } from '../store/document-store';
import { CLAIM_SECRET_PATTERN, isLive } from '../models/booking-token';
import { addMsIso } from '../utils/date-utils';
import { ConflictError, DuplicateBindingError, ValidationError } from '../utils/errors';
import { buildBindingDocId, buildSecretDocId } from '../utils/key-utils';

const log = createLogger('TokenIssuer');

/**
 * 64 hex characters from two v4 UUIDs (244 random bits).
 */
export function generateClaimSecret(): string {
    return `${uuidv4()}${uuidv4()}`.replace(/-/g, '');
}

export function buildClaimLink(baseUrl: string, secret: string): string {
    const url = new URL(baseUrl);
    url.searchParams.set('token', secret);
    return url.toString();
}

export interface IssueOptions {
    wave: number;
    ttlMs?: number;
}

async function findBoundToken(ctx: EngineContext, bindingId: string): Promise<BookingToken | null> {
    const binding = await ctx.records.tokenBindings.get(bindingId);
    return binding ? ctx.records.tokens.get(binding.tokenId) : null;
}

/**
 * Mints a single-use claim token binding one entry to one slot for the
 * slot's current cycle. The binding, token and secret index are written in
 * one commit before anything is sent.
 *
 * Throws DuplicateBindingError when a live token already exists for the pair.
 */
export async function issueToken(
    ctx: EngineContext,
    slot: Slot,
    entry: WaitlistEntry,
    options: IssueOptions
): Promise<IssuedToken> {
    if (slot.status !== 'cancelled' && slot.status !== 'offering') {
        throw new ValidationError(`Cannot issue a token for slot ${slot.id} in status ${slot.status}`);
    }
    if (!entry.active) {
        throw new ValidationError(`Waitlist entry ${entry.id} is not active`);
    }
    if (entry.specialty !== slot.specialty) {
        throw new ValidationError(`Entry ${entry.id} (${entry.specialty}) does not match slot specialty ${slot.specialty}`);
    }
    const ttlMs = options.ttlMs ?? resolveFillPolicy(ctx.config).tokenTtlMs;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
        throw new ValidationError(`Token TTL must be positive, got ${ttlMs}`);
    }

    const now = ctx.clock();
    const bindingId = buildBindingDocId(slot.id, entry.id, slot.cycle);

    const existing = await findBoundToken(ctx, bindingId);
    if (existing && isLive(existing, now)) {
        throw new DuplicateBindingError(existing);
    }

    const token: IssuedToken = {
        id: uuidv4(),
        secret: generateClaimSecret(),
        slotId: slot.id,
        entryId: entry.id,
        cycle: slot.cycle,
        wave: options.wave,
        issuedAt: now.toISOString(),
        expiresAt: addMsIso(now, ttlMs),
        state: 'issued',
    };

    const staleTokenId = existing?.id;
    const committed = await ctx.store.commitAll([
        ctx.records.tokenBindings.insert(
            bindingId,
            { slotId: slot.id, entryId: entry.id, cycle: slot.cycle, tokenId: token.id },
            current => current.tokenId === staleTokenId
        ),
        ctx.records.tokens.insert(token.id, token),
        ctx.records.tokenSecrets.insert(buildSecretDocId(token.secret), { tokenId: token.id }),
    ]);

    if (!committed.ok) {
        // Someone bound the pair between our read and our commit.
        const winner = await findBoundToken(ctx, bindingId);
        if (winner && isLive(winner, ctx.clock())) {
            throw new DuplicateBindingError(winner);
        }
        throw new ConflictError(ctx.records.tokenBindings.name, bindingId);
    }

    log.debug(`Issued token ${token.id} for entry ${entry.id} on slot ${slot.id} (wave ${token.wave})`);
    return token;
}

/**
 * Idempotent issuance: a retry for the same (slot, entry, cycle) gets the
 * live token back instead of a second one.
 */
export async function issueOrReuseToken(
    ctx: EngineContext,
    slot: Slot,
    entry: WaitlistEntry,
    options: IssueOptions
): Promise<IssuedToken> {
    try {
        return await issueToken(ctx, slot, entry, options);
    } catch (error) {
        if (error instanceof DuplicateBindingError && error.existing.state === 'issued') {
            return error.existing;
        }
        throw error;
    }
}

export async function findTokenBySecret(ctx: EngineContext, secret: string): Promise<BookingToken | null> {
    if (!CLAIM_SECRET_PATTERN.test(secret)) {
        return null;
    }
    const index = await ctx.records.tokenSecrets.get(buildSecretDocId(secret));
    if (!index) {
        return null;
    }
    const token = await ctx.records.tokens.get(index.tokenId);
    // The secret index must point back at a token carrying the same secret.
    return token && token.secret === secret ? token : null;
}

export async function listTokensForSlot(ctx: EngineContext, slotId: string, cycle?: number): Promise<BookingToken[]> {
    const filter: FieldFilter = cycle === undefined ? { slotId } : { slotId, cycle };
    return ctx.records.tokens.list(filter);
}
