import type {
    BookingToken,
    ClaimResponse,
    NotificationChannelName,
    NotificationRecord,
    Slot,
} from '@cancelfill/shared-types';
import { durationMs } from '../utils/date-utils';

export interface ChannelDeliveryStats {
    /** Tokens with at least one real send attempt on this channel. */
    attempted: number;
    delivered: number;
    rate: number | null;
}

export interface FillMetrics {
    closedSlots: number;
    filledSlots: number;
    unfilledSlots: number;
    fillRate: number | null;
    averageFillMinutes: number | null;
    tokensIssued: number;
    tokensUsed: number;
    tokensExpired: number;
    tokensSuperseded: number;
    channels: Record<NotificationChannelName, ChannelDeliveryStats>;
    meanResponseLatencyMs: number | null;
}

const mean = (values: number[]): number | null =>
    values.length === 0 ? null : values.reduce((sum, value) => sum + value, 0) / values.length;

function channelStats(records: NotificationRecord[], channel: NotificationChannelName): ChannelDeliveryStats {
    const byToken = new Map<string, boolean>();
    for (const record of records) {
        if (record.channel !== channel || record.outcome === 'skipped') continue;
        byToken.set(record.tokenId, (byToken.get(record.tokenId) ?? false) || record.outcome === 'delivered');
    }
    const attempted = byToken.size;
    const delivered = [...byToken.values()].filter(Boolean).length;
    return { attempted, delivered, rate: attempted === 0 ? null : delivered / attempted };
}

/**
 * Fill performance over a set of records. Only slots whose current cycle is
 * closed (filled or unfilled) count towards the fill rate.
 */
export function computeFillMetrics(
    slots: Slot[],
    tokens: BookingToken[],
    records: NotificationRecord[],
    responses: ClaimResponse[]
): FillMetrics {
    const filled = slots.filter(slot => slot.status === 'filled');
    const unfilledSlots = slots.filter(slot => slot.status === 'unfilled').length;
    const closedSlots = filled.length + unfilledSlots;

    const fillMinutes: number[] = [];
    for (const slot of filled) {
        if (slot.status === 'filled' && slot.cancelledAt) {
            fillMinutes.push(durationMs(slot.cancelledAt, slot.filledAt) / 60_000);
        }
    }

    const countState = (state: BookingToken['state']) => tokens.filter(token => token.state === state).length;

    return {
        closedSlots,
        filledSlots: filled.length,
        unfilledSlots,
        fillRate: closedSlots === 0 ? null : filled.length / closedSlots,
        averageFillMinutes: mean(fillMinutes),
        tokensIssued: tokens.length,
        tokensUsed: countState('used'),
        tokensExpired: countState('expired'),
        tokensSuperseded: countState('superseded'),
        channels: {
            sms: channelStats(records, 'sms'),
            email: channelStats(records, 'email'),
        },
        meanResponseLatencyMs: mean(responses.map(response => response.responseLatencyMs)),
    };
}
