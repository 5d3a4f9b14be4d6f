import { describe, test, expect } from 'vitest';
import { loadEngineConfig, resolveFillPolicy } from '../config/engine-config';
import { ConfigError } from '../utils/errors';

describe('Engine configuration', () => {
    test('should fall back to defaults', () => {
        const config = loadEngineConfig({});

        expect(config).toMatchObject({
            waveSize: 10,
            tokenTtlMs: 2 * 60 * 60 * 1000,
            urgentFillMode: false,
            notification: { maxAttempts: 3, backoffMs: 500, timeoutMs: 10_000 },
            reaper: { intervalMs: 60_000, concurrency: 5 },
            claimBaseUrl: 'http://localhost:3000/booking',
            clinicName: 'Medical Center',
            senderEmail: 'noreply@cancelfill.local',
        });
        expect(config.staffEmail).toBeUndefined();
    });

    test('should read numbers and flags from strings', () => {
        const config = loadEngineConfig({
            WAVE_SIZE: '4',
            TOKEN_TTL_MINUTES: '45',
            URGENT_FILL_MODE: '1',
            TWILIO_ACCOUNT_SID: 'AC-test',
            TWILIO_AUTH_TOKEN: 'test-secret',
            TWILIO_PHONE_NUMBER: '+15550000000',
        });

        expect(config.waveSize).toBe(4);
        expect(config.tokenTtlMs).toBe(45 * 60 * 1000);
        expect(config.urgentFillMode).toBe(true);
        expect(config.twilio).toEqual({
            accountSid: 'AC-test',
            authToken: 'test-secret',
            fromNumber: '+15550000000',
            defaultCountryCode: '1',
        });
    });

    test('blank values count as unset', () => {
        expect(loadEngineConfig({ WAVE_SIZE: '  ', STAFF_NOTIFICATION_EMAIL: '' }).waveSize).toBe(10);
    });

    test('should name every invalid key', () => {
        const error = (() => {
            try {
                loadEngineConfig({ WAVE_SIZE: '0', CLAIM_BASE_URL: 'not a url', URGENT_FILL_MODE: 'maybe' });
            } catch (caught) {
                return caught;
            }
            return null;
        })();

        expect(error).toBeInstanceOf(ConfigError);
        expect(error instanceof ConfigError && [...error.keys].sort()).toEqual([
            'CLAIM_BASE_URL',
            'URGENT_FILL_MODE',
            'WAVE_SIZE',
        ]);
    });

    test('urgent mode swaps wave size and TTL', () => {
        const normal = loadEngineConfig({ WAVE_SIZE: '5', TOKEN_TTL_MINUTES: '60' });
        const urgent = loadEngineConfig({ URGENT_FILL_MODE: 'true', URGENT_WAVE_SIZE: '15', URGENT_TOKEN_TTL_MINUTES: '20' });

        expect(resolveFillPolicy(normal)).toEqual({ waveSize: 5, tokenTtlMs: 60 * 60 * 1000 });
        expect(resolveFillPolicy(urgent)).toEqual({ waveSize: 15, tokenTtlMs: 20 * 60 * 1000 });
    });
});
