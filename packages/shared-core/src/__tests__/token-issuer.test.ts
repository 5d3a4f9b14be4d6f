/**
 * Token issuance: unguessable single-use secrets, one live token per
 * (slot, entry, cycle).
 */

import { describe, test, expect, beforeEach } from 'vitest';
import {
    buildClaimLink,
    findTokenBySecret,
    generateClaimSecret,
    issueOrReuseToken,
    issueToken,
    listTokensForSlot,
} from '../services/token-issuer-service';
import { CLAIM_SECRET_PATTERN } from '../models/booking-token';
import { COLLECTIONS } from '../store/document-store';
import { buildBindingDocId, buildSecretDocId } from '../utils/key-utils';
import { DuplicateBindingError, ValidationError } from '../utils/errors';
import { buildEntry, createHarness, seedCancelledSlot, seedSlot, HOUR_MS, type TestHarness } from './test-helpers';

describe('Claim secrets', () => {
    test('should be 64 lowercase hex characters', () => {
        expect(generateClaimSecret()).toMatch(CLAIM_SECRET_PATTERN);
    });

    test('should not repeat', () => {
        const secrets = new Set(Array.from({ length: 200 }, () => generateClaimSecret()));
        expect(secrets.size).toBe(200);
    });

    test('claim link carries the secret as a token parameter', () => {
        expect(buildClaimLink('https://clinic.test/claim', 'abc123')).toBe('https://clinic.test/claim?token=abc123');
    });
});

describe('Token issuance', () => {
    let h: TestHarness;

    beforeEach(() => {
        h = createHarness();
    });

    test('should write token, binding and secret index before returning', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        const entry = buildEntry(1);

        const token = await issueToken(h.ctx, slot, entry, { wave: 1 });

        expect(token).toMatchObject({
            state: 'issued',
            slotId: 'slot-1',
            entryId: 'entry-1',
            cycle: 0,
            wave: 1,
            issuedAt: '2025-03-10T08:00:00.000Z',
            expiresAt: '2025-03-10T10:00:00.000Z',
        });
        expect(await h.ctx.records.tokens.get(token.id)).toEqual(token);
        expect(await h.ctx.records.tokenBindings.get(buildBindingDocId('slot-1', 'entry-1', 0))).toEqual({
            slotId: 'slot-1',
            entryId: 'entry-1',
            cycle: 0,
            tokenId: token.id,
        });
        expect(await h.ctx.records.tokenSecrets.get(buildSecretDocId(token.secret))).toEqual({ tokenId: token.id });
    });

    test('should honour an explicit TTL', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        const token = await issueToken(h.ctx, slot, buildEntry(1), { wave: 1, ttlMs: 30 * 60_000 });
        expect(token.expiresAt).toBe('2025-03-10T08:30:00.000Z');
    });

    test('urgent mode shortens the default TTL', async () => {
        const urgent = createHarness({ env: { URGENT_FILL_MODE: 'true' } });
        const slot = await seedCancelledSlot(urgent.ctx);
        const token = await issueToken(urgent.ctx, slot, buildEntry(1), { wave: 1 });
        expect(token.expiresAt).toBe('2025-03-10T08:30:00.000Z');
    });

    test('should refuse a second live token for the same pair', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        const first = await issueToken(h.ctx, slot, buildEntry(1), { wave: 1 });

        const error = await issueToken(h.ctx, slot, buildEntry(1), { wave: 1 }).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(DuplicateBindingError);
        expect(error instanceof DuplicateBindingError && error.existing.id).toBe(first.id);
        expect(h.store.size(COLLECTIONS.tokens)).toBe(1);
    });

    test('issue-or-reuse returns the live token instead of minting another', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        const first = await issueOrReuseToken(h.ctx, slot, buildEntry(1), { wave: 1 });
        const again = await issueOrReuseToken(h.ctx, slot, buildEntry(1), { wave: 1 });

        expect(again.id).toBe(first.id);
        expect(h.store.size(COLLECTIONS.tokens)).toBe(1);
    });

    test('concurrent issue-or-reuse calls end with one token', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        const entry = buildEntry(1);

        const tokens = await Promise.all([
            issueOrReuseToken(h.ctx, slot, entry, { wave: 1 }),
            issueOrReuseToken(h.ctx, slot, entry, { wave: 1 }),
        ]);

        expect(tokens[0].id).toBe(tokens[1].id);
        expect(h.store.size(COLLECTIONS.tokens)).toBe(1);
    });

    test('an expired binding is replaced by a fresh token', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        const first = await issueToken(h.ctx, slot, buildEntry(1), { wave: 1 });

        h.clock.advance(2 * HOUR_MS + 1);
        const second = await issueToken(h.ctx, slot, buildEntry(1), { wave: 2 });

        expect(second.id).not.toBe(first.id);
        expect((await h.ctx.records.tokenBindings.get(buildBindingDocId('slot-1', 'entry-1', 0)))?.tokenId).toBe(second.id);
    });

    test('should reject an inactive entry', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        await expect(issueToken(h.ctx, slot, buildEntry(1, { active: false }), { wave: 1 })).rejects.toBeInstanceOf(
            ValidationError
        );
    });

    test('should reject a specialty mismatch', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        await expect(
            issueToken(h.ctx, slot, buildEntry(1, { specialty: 'cardiology' }), { wave: 1 })
        ).rejects.toBeInstanceOf(ValidationError);
    });

    test('should reject a slot that was never cancelled', async () => {
        const slot = await seedSlot(h.ctx);
        await expect(issueToken(h.ctx, slot, buildEntry(1), { wave: 1 })).rejects.toBeInstanceOf(ValidationError);
        expect(h.store.size(COLLECTIONS.tokens)).toBe(0);
    });

    test('should reject a non-positive TTL', async () => {
        const slot = await seedCancelledSlot(h.ctx);
        await expect(issueToken(h.ctx, slot, buildEntry(1), { wave: 1, ttlMs: 0 })).rejects.toBeInstanceOf(
            ValidationError
        );
    });
});

describe('Token lookup', () => {
    test('should find a token by its secret', async () => {
        const h = createHarness();
        const slot = await seedCancelledSlot(h.ctx);
        const token = await issueToken(h.ctx, slot, buildEntry(1), { wave: 1 });

        expect((await findTokenBySecret(h.ctx, token.secret))?.id).toBe(token.id);
    });

    test('should return null for malformed or unknown secrets', async () => {
        const h = createHarness();
        expect(await findTokenBySecret(h.ctx, 'not-a-secret')).toBeNull();
        expect(await findTokenBySecret(h.ctx, 'a'.repeat(64))).toBeNull();
    });

    test('should list tokens of a slot, optionally per cycle', async () => {
        const h = createHarness();
        const slot = await seedCancelledSlot(h.ctx);
        await issueToken(h.ctx, slot, buildEntry(1), { wave: 1 });
        await issueToken(h.ctx, slot, buildEntry(2), { wave: 1 });

        expect(await listTokensForSlot(h.ctx, 'slot-1')).toHaveLength(2);
        expect(await listTokensForSlot(h.ctx, 'slot-1', 0)).toHaveLength(2);
        expect(await listTokensForSlot(h.ctx, 'slot-1', 1)).toHaveLength(0);
    });
});
