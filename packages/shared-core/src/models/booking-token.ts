import { z } from 'zod';
import type {
    BookingToken,
    ExpiredToken,
    IssuedToken,
    RejectionReason,
    SupersededToken,
    UsedToken,
} from '@cancelfill/shared-types';
import { isPastIso } from '../utils/date-utils';

export const CLAIM_SECRET_PATTERN = /^[0-9a-f]{64}$/;

const tokenFields = {
    id: z.string().min(1),
    secret: z.string().regex(CLAIM_SECRET_PATTERN),
    slotId: z.string().min(1),
    entryId: z.string().min(1),
    cycle: z.number().int().nonnegative(),
    wave: z.number().int().positive(),
    issuedAt: z.string().datetime(),
    expiresAt: z.string().datetime(),
};

export const bookingTokenSchema: z.ZodType<BookingToken> = z.discriminatedUnion('state', [
    z.object({ ...tokenFields, state: z.literal('issued') }),
    z.object({ ...tokenFields, state: z.literal('used'), usedAt: z.string().datetime() }),
    z.object({ ...tokenFields, state: z.literal('expired'), expiredAt: z.string().datetime() }),
    z.object({ ...tokenFields, state: z.literal('superseded'), supersededAt: z.string().datetime() }),
]);

export const tokenBindingSchema = z.object({
    slotId: z.string(),
    entryId: z.string(),
    cycle: z.number().int().nonnegative(),
    tokenId: z.string(),
});

export type TokenBinding = z.infer<typeof tokenBindingSchema>;

export const tokenSecretSchema = z.object({
    tokenId: z.string(),
});

export type TokenSecretIndex = z.infer<typeof tokenSecretSchema>;

/** Still claimable: issued and not past its expiry. */
export function isLive(token: BookingToken, now: Date): token is IssuedToken {
    return token.state === 'issued' && !isPastIso(token.expiresAt, now);
}

export function rejectionForState(token: Exclude<BookingToken, IssuedToken>): RejectionReason {
    switch (token.state) {
        case 'used':
            return 'AlreadyUsed';
        case 'expired':
            return 'Expired';
        case 'superseded':
            return 'Superseded';
    }
}

export function markTokenUsed(token: IssuedToken, now: Date): UsedToken {
    return { ...token, state: 'used', usedAt: now.toISOString() };
}

export function markTokenExpired(token: IssuedToken, now: Date): ExpiredToken {
    return { ...token, state: 'expired', expiredAt: now.toISOString() };
}

export function markTokenSuperseded(token: IssuedToken, now: Date): SupersededToken {
    return { ...token, state: 'superseded', supersededAt: now.toISOString() };
}
