/**
 * Booking Service
 * Turns a claim link click into a booking. Exactly one claim per slot cycle
 * can win; the slot and token writes commit together or not at all.
 */

import { v4 as uuidv4 } from 'uuid';
import type {
    BookingResult,
    BookingToken,
    ClaimResponse,
    FilledSlot,
    IssuedToken,
    RejectionReason,
    UsedToken,
} from '@cancelfill/shared-types';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import { markTokenExpired, markTokenSuperseded, markTokenUsed, rejectionForState } from '../models/booking-token';
import { markSlotFilled } from '../models/slot';
import { deactivateEntry } from '../models/waitlist-entry';
import type { CommitResult } from '../store/document-store';
import { isPastIso, msBetween } from '../utils/date-utils';
import { BookingInDoubtError, StoreUnavailableError, TokenError } from '../utils/errors';
import { sendBookingConfirmation } from './notification-service';
import { findTokenBySecret, listTokensForSlot } from './token-issuer-service';

const log = createLogger('Resolver');

const rejected = (reason: RejectionReason): BookingResult => ({ outcome: 'rejected', reason });

/**
 * CAS issued → expired. Returns false when the token moved on first
 * (claimed, superseded, or already expired by someone else).
 */
export async function expireToken(ctx: EngineContext, token: IssuedToken, now: Date): Promise<boolean> {
    const result = await ctx.records.tokens.conditionalUpdate(
        token.id,
        current => current.state === 'issued' && isPastIso(current.expiresAt, now),
        current => (current.state === 'issued' ? markTokenExpired(current, now) : current)
    );
    return result.ok;
}

/**
 * Marks every other issued token of the slot cycle as superseded. Each token
 * is its own CAS, so a token that expires or is claimed meanwhile is left
 * alone.
 */
export async function supersedeOutstandingTokens(
    ctx: EngineContext,
    slotId: string,
    cycle: number,
    winnerTokenId: string
): Promise<number> {
    const now = ctx.clock();
    const outstanding = (await listTokensForSlot(ctx, slotId, cycle)).filter(
        token => token.state === 'issued' && token.id !== winnerTokenId
    );

    const results = await Promise.allSettled(
        outstanding.map(token =>
            ctx.records.tokens.conditionalUpdate(
                token.id,
                current => current.state === 'issued',
                current => (current.state === 'issued' ? markTokenSuperseded(current, now) : current)
            )
        )
    );

    let superseded = 0;
    results.forEach((result, index) => {
        if (result.status === 'rejected') {
            log.warn(`Could not supersede token ${outstanding[index].id}:`, result.reason);
        } else if (result.value.ok) {
            superseded++;
        }
    });
    return superseded;
}

async function recordClaimResponse(ctx: EngineContext, token: BookingToken, result: BookingResult): Promise<void> {
    const respondedAt = ctx.clock();
    const response: ClaimResponse = {
        id: uuidv4(),
        tokenId: token.id,
        slotId: token.slotId,
        entryId: token.entryId,
        respondedAt: respondedAt.toISOString(),
        responseLatencyMs: Math.max(0, msBetween(token.issuedAt, respondedAt)),
        result: result.outcome === 'booked' ? 'Booked' : result.reason,
    };
    await ctx.records.claimResponses.create(response.id, response);
}

async function completeBooking(ctx: EngineContext, slot: FilledSlot, token: UsedToken): Promise<void> {
    ctx.events.emit('slot-filled', slot);

    const [superseded, entry] = await Promise.all([
        supersedeOutstandingTokens(ctx, slot.id, token.cycle, token.id),
        ctx.records.waitlist.conditionalUpdate(
            token.entryId,
            current => current.active,
            current => deactivateEntry(current, 'booked', ctx.clock(), slot.id)
        ),
    ]);
    log.info(`Slot ${slot.id} filled by entry ${token.entryId}; ${superseded} outstanding token(s) superseded`);

    const winner = entry.ok ? entry.value : entry.current;
    if (winner) {
        await sendBookingConfirmation(ctx, winner, slot);
    } else {
        log.warn(`Waitlist entry ${token.entryId} for slot ${slot.id} no longer exists; confirmation not sent`);
    }
}

/**
 * The commit lost. Work out why from what the store holds now.
 */
async function explainConflict(ctx: EngineContext, token: IssuedToken): Promise<RejectionReason> {
    const [currentToken, currentSlot] = await Promise.all([
        ctx.records.tokens.get(token.id),
        ctx.records.slots.get(token.slotId),
    ]);

    if (currentToken?.state === 'used') {
        return 'AlreadyUsed';
    }
    if (!currentSlot || currentSlot.status !== 'offering' || currentSlot.cycle !== token.cycle) {
        return 'SlotUnavailable';
    }
    if (currentToken && currentToken.state !== 'issued') {
        return rejectionForState(currentToken);
    }
    return 'SlotUnavailable';
}

/**
 * Resolves a claim for the token behind `secret`.
 *
 * Rejections come back as values. A store failure before the commit throws
 * StoreUnavailableError; a failure during the commit throws
 * BookingInDoubtError, since the booking may or may not have landed.
 */
export async function claimSlot(ctx: EngineContext, secret: string): Promise<BookingResult> {
    const token = await findTokenBySecret(ctx, secret.trim());
    if (!token) {
        return rejected('NotFound');
    }

    const result = await resolveClaim(ctx, token);
    ctx.background.run(`claim response ${token.id}`, () => recordClaimResponse(ctx, token, result));
    return result;
}

async function resolveClaim(ctx: EngineContext, token: BookingToken): Promise<BookingResult> {
    if (token.state !== 'issued') {
        return rejected(rejectionForState(token));
    }

    const now = ctx.clock();
    if (isPastIso(token.expiresAt, now)) {
        await expireToken(ctx, token, now);
        return rejected('Expired');
    }

    const slot = await ctx.records.slots.get(token.slotId);
    if (!slot || slot.status !== 'offering' || slot.cycle !== token.cycle) {
        return rejected('SlotUnavailable');
    }

    let filled: FilledSlot = markSlotFilled(slot, token.entryId, token.id, now);
    const used: UsedToken = markTokenUsed(token, now);

    let committed: CommitResult;
    try {
        committed = await ctx.store.commitAll([
            ctx.records.slots.write(
                slot.id,
                current => current.status === 'offering' && current.cycle === token.cycle,
                current => {
                    filled = markSlotFilled(current, token.entryId, token.id, now);
                    return filled;
                }
            ),
            ctx.records.tokens.write(
                token.id,
                current => current.state === 'issued',
                () => used
            ),
        ]);
    } catch (error) {
        if (error instanceof StoreUnavailableError) {
            log.error(`Commit for slot ${slot.id} (token ${token.id}) failed mid-flight`, error);
            ctx.events.emit('store-error', error, { operation: 'claim', slotId: slot.id });
            throw new BookingInDoubtError(slot.id, error);
        }
        throw error;
    }

    if (!committed.ok) {
        const reason = await explainConflict(ctx, token);
        log.debug(`Claim with token ${token.id} lost on slot ${slot.id}: ${reason}`);
        return rejected(reason);
    }

    const booked = filled;
    ctx.background.run(`complete booking ${slot.id}`, () => completeBooking(ctx, booked, used));
    return { outcome: 'booked', slot: filled, token: used };
}

/** Throwing variant of a claim result, for callers that prefer exceptions. */
export function assertBooked(result: BookingResult): Extract<BookingResult, { outcome: 'booked' }> {
    if (result.outcome === 'rejected') {
        throw new TokenError(result.reason);
    }
    return result;
}
