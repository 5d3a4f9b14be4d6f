/**
 * Expiry Reaper
 * Periodic sweep over slots that are being offered: expires overdue tokens
 * and moves a slot on to its next wave (or to unfilled) once every token of
 * the current wave is spent.
 */

import type { Slot } from '@cancelfill/shared-types';
import type { EngineContext } from '../lib/engine-context';
import { createLogger } from '../lib/logger';
import { isLive } from '../models/booking-token';
import { isPastIso } from '../utils/date-utils';
import { CancelFillError, describeError } from '../utils/errors';
import { expireToken } from './booking-service';
import { listTokensForSlot } from './token-issuer-service';
import { launchNextWave } from './wave-service';

const log = createLogger('Reaper');

export type SlotReapAction = 'waiting' | 'launched' | 'exhausted' | 'contended' | 'skipped';

export interface SlotReapOutcome {
    tokensExpired: number;
    action: SlotReapAction;
}

export interface ReaperReport {
    startedAt: string;
    completedAt: string;
    examined: number;
    tokensExpired: number;
    wavesLaunched: number;
    slotsExhausted: number;
    errors: Array<{ slotId: string; error: string }>;
}

export async function reapSlot(ctx: EngineContext, slot: Slot, now: Date): Promise<SlotReapOutcome> {
    if (slot.status !== 'offering') {
        return { tokensExpired: 0, action: 'skipped' };
    }

    const tokens = await listTokensForSlot(ctx, slot.id, slot.cycle);

    let tokensExpired = 0;
    for (const token of tokens) {
        if (token.state === 'issued' && isPastIso(token.expiresAt, now) && (await expireToken(ctx, token, now))) {
            tokensExpired++;
        }
    }

    // Any live offer holds the next wave back, including one reused from an
    // earlier wave by a retried launch.
    const waiting = tokens.some(token => isLive(token, now));
    if (waiting) {
        return { tokensExpired, action: 'waiting' };
    }

    const outcome = await launchNextWave(ctx, slot);
    return { tokensExpired, action: outcome.kind };
}

export class ExpiryReaper {
    private readonly inFlight = new Set<string>();
    private timer: ReturnType<typeof setInterval> | undefined;
    private running: Promise<void> | null = null;

    constructor(private readonly ctx: EngineContext) {}

    /**
     * One sweep over every offering slot, `reaper.concurrency` slots at a
     * time. A slot that fails is reported and the pass moves on.
     */
    async runPass(now: Date = this.ctx.clock()): Promise<ReaperReport> {
        const startedAt = this.ctx.clock().toISOString();
        const slots = await this.ctx.records.slots.list({ status: 'offering' });
        const report: ReaperReport = {
            startedAt,
            completedAt: startedAt,
            examined: 0,
            tokensExpired: 0,
            wavesLaunched: 0,
            slotsExhausted: 0,
            errors: [],
        };

        const { concurrency } = this.ctx.config.reaper;
        for (let offset = 0; offset < slots.length; offset += concurrency) {
            const batch = slots.slice(offset, offset + concurrency);
            const outcomes = await Promise.allSettled(batch.map(slot => this.reapGuarded(slot, now)));

            outcomes.forEach((outcome, index) => {
                const slotId = batch[index].id;
                if (outcome.status === 'rejected') {
                    report.errors.push({ slotId, error: describeError(outcome.reason) });
                    log.error(`Slot ${slotId} failed:`, outcome.reason);
                    if (outcome.reason instanceof CancelFillError) {
                        this.ctx.events.emit('store-error', outcome.reason, { operation: 'reap', slotId });
                    }
                    return;
                }
                if (outcome.value.action === 'skipped') {
                    return;
                }
                report.examined++;
                report.tokensExpired += outcome.value.tokensExpired;
                if (outcome.value.action === 'launched') report.wavesLaunched++;
                if (outcome.value.action === 'exhausted') report.slotsExhausted++;
            });
        }

        report.completedAt = this.ctx.clock().toISOString();
        if (report.tokensExpired + report.wavesLaunched + report.slotsExhausted + report.errors.length > 0) {
            log.info(
                `Pass done: ${report.examined} slot(s), ${report.tokensExpired} expired, ` +
                    `${report.wavesLaunched} wave(s), ${report.slotsExhausted} unfilled, ${report.errors.length} error(s)`
            );
        }
        return report;
    }

    start(intervalMs: number = this.ctx.config.reaper.intervalMs): void {
        if (this.timer) {
            return;
        }
        log.info(`Starting, every ${intervalMs}ms`);
        this.timer = setInterval(() => this.tick(), intervalMs);
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        if (this.running) {
            await this.running;
        }
    }

    get isStarted(): boolean {
        return this.timer !== undefined;
    }

    private tick(): void {
        if (this.running) {
            log.debug('Previous pass still running; skipping tick');
            return;
        }
        this.running = this.runPass()
            .then(
                () => undefined,
                (error: unknown) => {
                    log.error('Pass failed:', error);
                    if (error instanceof CancelFillError) {
                        this.ctx.events.emit('store-error', error, { operation: 'reaper-pass' });
                    }
                }
            )
            .finally(() => {
                this.running = null;
            });
    }

    private async reapGuarded(slot: Slot, now: Date): Promise<SlotReapOutcome> {
        if (this.inFlight.has(slot.id)) {
            return { tokensExpired: 0, action: 'skipped' };
        }
        this.inFlight.add(slot.id);
        try {
            return await reapSlot(this.ctx, slot, now);
        } finally {
            this.inFlight.delete(slot.id);
        }
    }
}
