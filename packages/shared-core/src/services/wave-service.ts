import type { IssuedToken, Slot } from '@cancelfill/shared-types';
import { resolveFillPolicy } from '../config/engine-config';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import { markSlotOffering, markSlotUnfilled } from '../models/slot';
import { findNextWaveCandidates } from './matcher-service';
import { dispatchClaimNotification, sendStaffUnfilledNotice } from './notification-service';
import { issueOrReuseToken } from './token-issuer-service';

const log = createLogger('Wave');

export type WaveOutcome =
    | { kind: 'launched'; slot: Slot; tokens: IssuedToken[] }
    | { kind: 'exhausted'; slot: Slot }
    /** Another caller moved the slot first; nothing was changed here. */
    | { kind: 'contended'; slot: Slot | null };

const unchangedSince = (seen: Slot) => (current: Slot) =>
    current.status === seen.status && current.cycle === seen.cycle && current.wave === seen.wave;

/**
 * Offers a cancelled or offering slot to the next wave of candidates.
 *
 * Tokens are issued (or reused) before the slot's wave counter moves, and the
 * move is a CAS on status, cycle and wave, so two replicas running this for
 * the same slot launch the wave once. Notifications go out in the background
 * only after the CAS wins.
 *
 * With nobody left to offer the slot to, it becomes unfilled and staff are
 * told.
 */
export async function launchNextWave(ctx: EngineContext, slot: Slot): Promise<WaveOutcome> {
    const policy = resolveFillPolicy(ctx.config);
    const candidates = await findNextWaveCandidates(ctx, slot, policy.waveSize);

    if (candidates.length === 0) {
        const result = await ctx.records.slots.conditionalUpdate(slot.id, unchangedSince(slot), current =>
            markSlotUnfilled(current, ctx.clock())
        );
        if (!result.ok) {
            return { kind: 'contended', slot: result.current };
        }

        const unfilled = result.value;
        log.warn(`No candidates left for slot ${slot.id} (cycle ${slot.cycle}, after wave ${slot.wave}); marked unfilled`);
        if (unfilled.status !== 'filled') {
            ctx.events.emit('slot-unfilled', unfilled);
        }
        ctx.background.run(`unfilled notice ${slot.id}`, () => sendStaffUnfilledNotice(ctx, unfilled));
        return { kind: 'exhausted', slot: unfilled };
    }

    const wave = slot.wave + 1;
    const tokens = await Promise.all(
        candidates.map(entry => issueOrReuseToken(ctx, slot, entry, { wave, ttlMs: policy.tokenTtlMs }))
    );

    const result = await ctx.records.slots.conditionalUpdate(slot.id, unchangedSince(slot), current =>
        markSlotOffering(
            current,
            wave,
            candidates.map(entry => entry.id),
            ctx.clock()
        )
    );
    if (!result.ok) {
        log.info(`Wave ${wave} for slot ${slot.id} already launched elsewhere`);
        return { kind: 'contended', slot: result.current };
    }

    const offering = result.value;
    candidates.forEach((entry, index) => {
        const token = tokens[index];
        ctx.background.run(`dispatch ${token.id}`, () => dispatchClaimNotification(ctx, entry, offering, token));
    });

    log.info(`Wave ${wave} for slot ${slot.id}: offered to ${candidates.length} patient(s)`);
    return { kind: 'launched', slot: offering, tokens };
}
