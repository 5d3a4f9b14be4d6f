import { z } from 'zod';
import type { ClaimResponse, DispatchResult, NotificationRecord } from '@cancelfill/shared-types';

const channelName = z.enum(['sms', 'email']);

export const notificationRecordSchema: z.ZodType<NotificationRecord> = z.object({
    id: z.string().min(1),
    tokenId: z.string().min(1),
    slotId: z.string().min(1),
    entryId: z.string().min(1),
    channel: channelName,
    attempt: z.number().int().positive(),
    sentAt: z.string().datetime(),
    outcome: z.enum(['delivered', 'failed', 'skipped']),
    latencyMs: z.number().nonnegative(),
    providerId: z.string().optional(),
    failureKind: z.enum(['transient', 'permanent', 'timeout']).optional(),
    error: z.string().optional(),
});

export const dispatchResultSchema: z.ZodType<DispatchResult> = z.object({
    tokenId: z.string().min(1),
    entryId: z.string().min(1),
    slotId: z.string().min(1),
    status: z.enum(['pending', 'sent', 'failed']),
    channels: z.array(
        z.object({
            channel: channelName,
            outcome: z.enum(['delivered', 'failed', 'skipped']),
            attempts: z.number().int().nonnegative(),
            providerId: z.string().optional(),
            error: z.string().optional(),
        })
    ),
    startedAt: z.string().datetime(),
    completedAt: z.string().datetime().optional(),
});

export const claimResponseSchema: z.ZodType<ClaimResponse> = z.object({
    id: z.string().min(1),
    tokenId: z.string().min(1),
    slotId: z.string().min(1),
    entryId: z.string().min(1),
    respondedAt: z.string().datetime(),
    responseLatencyMs: z.number(),
    result: z.enum(['Booked', 'NotFound', 'Expired', 'AlreadyUsed', 'Superseded', 'SlotUnavailable']),
});
