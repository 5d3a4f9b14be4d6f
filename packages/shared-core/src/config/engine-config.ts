import { z } from 'zod';
import { ConfigError } from '../utils/errors';

const MINUTE_MS = 60 * 1000;

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(value => value === 'true' || value === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z.string().optional();

const envSchema = z.object({
    WAVE_SIZE: positiveInt(10),
    TOKEN_TTL_MINUTES: positiveInt(120),
    URGENT_FILL_MODE: booleanFlag,
    URGENT_WAVE_SIZE: positiveInt(20),
    URGENT_TOKEN_TTL_MINUTES: positiveInt(30),
    NOTIFY_MAX_ATTEMPTS: positiveInt(3),
    NOTIFY_BACKOFF_MS: positiveInt(500),
    NOTIFY_TIMEOUT_MS: positiveInt(10_000),
    REAPER_INTERVAL_MS: positiveInt(60_000),
    REAPER_CONCURRENCY: positiveInt(5),
    CLAIM_BASE_URL: z.string().url().default('http://localhost:3000/booking'),
    CLINIC_NAME: z.string().min(1).default('Medical Center'),
    STAFF_NOTIFICATION_EMAIL: z.string().email().optional(),
    TWILIO_ACCOUNT_SID: optionalString,
    TWILIO_AUTH_TOKEN: optionalString,
    TWILIO_PHONE_NUMBER: optionalString,
    SMS_DEFAULT_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default('1'),
    SENDGRID_API_KEY: optionalString,
    SENDER_EMAIL: z.string().email().default('noreply@cancelfill.local'),
    FIREBASE_PROJECT_ID: optionalString,
    FIREBASE_CLIENT_EMAIL: optionalString,
    FIREBASE_PRIVATE_KEY: optionalString,
});

export type EngineConfig = {
    waveSize: number;
    tokenTtlMs: number;
    urgentFillMode: boolean;
    urgentWaveSize: number;
    urgentTokenTtlMs: number;
    notification: {
        maxAttempts: number;
        backoffMs: number;
        timeoutMs: number;
    };
    reaper: {
        intervalMs: number;
        concurrency: number;
    };
    claimBaseUrl: string;
    clinicName: string;
    staffEmail?: string;
    senderEmail: string;
    twilio: {
        accountSid?: string;
        authToken?: string;
        fromNumber?: string;
        defaultCountryCode: string;
    };
    sendgridApiKey?: string;
    firebase: {
        projectId?: string;
        clientEmail?: string;
        privateKey?: string;
    };
};

export type EnvSource = Record<string, string | undefined>;

/**
 * Parses engine settings out of an environment map. Unset keys take their
 * defaults; set-but-invalid keys fail loudly.
 */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
    // Blank variables count as unset.
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = envSchema.safeParse(present);

    if (!parsed.success) {
        const keys = [...new Set(parsed.error.issues.map(issue => String(issue.path[0])))];
        throw new ConfigError(keys, `Invalid engine configuration: ${keys.join(', ')}`);
    }

    const values = parsed.data;

    return {
        waveSize: values.WAVE_SIZE,
        tokenTtlMs: values.TOKEN_TTL_MINUTES * MINUTE_MS,
        urgentFillMode: values.URGENT_FILL_MODE,
        urgentWaveSize: values.URGENT_WAVE_SIZE,
        urgentTokenTtlMs: values.URGENT_TOKEN_TTL_MINUTES * MINUTE_MS,
        notification: {
            maxAttempts: values.NOTIFY_MAX_ATTEMPTS,
            backoffMs: values.NOTIFY_BACKOFF_MS,
            timeoutMs: values.NOTIFY_TIMEOUT_MS,
        },
        reaper: {
            intervalMs: values.REAPER_INTERVAL_MS,
            concurrency: values.REAPER_CONCURRENCY,
        },
        claimBaseUrl: values.CLAIM_BASE_URL,
        clinicName: values.CLINIC_NAME,
        staffEmail: values.STAFF_NOTIFICATION_EMAIL,
        senderEmail: values.SENDER_EMAIL,
        twilio: {
            accountSid: values.TWILIO_ACCOUNT_SID,
            authToken: values.TWILIO_AUTH_TOKEN,
            fromNumber: values.TWILIO_PHONE_NUMBER,
            defaultCountryCode: values.SMS_DEFAULT_COUNTRY_CODE,
        },
        sendgridApiKey: values.SENDGRID_API_KEY,
        firebase: {
            projectId: values.FIREBASE_PROJECT_ID,
            clientEmail: values.FIREBASE_CLIENT_EMAIL,
            privateKey: values.FIREBASE_PRIVATE_KEY,
        },
    };
}

export type FillPolicy = {
    waveSize: number;
    tokenTtlMs: number;
};

/**
 * Urgent fill mode trades a wider wave for a shorter claim window.
 */
export function resolveFillPolicy(config: EngineConfig): FillPolicy {
    if (config.urgentFillMode) {
        return { waveSize: config.urgentWaveSize, tokenTtlMs: config.urgentTokenTtlMs };
    }
    return { waveSize: config.waveSize, tokenTtlMs: config.tokenTtlMs };
}
