import twilio from 'twilio';
import { createLogger } from '../lib/logger';
import {
    isPermanentStatus,
    readProviderError,
    unconfiguredChannel,
    type ChannelSendResult,
    type NotificationChannel,
    type OutboundMessage,
} from './notification-channel';

const log = createLogger('SMS');

export const SMS_MAX_LENGTH = 160;

/** Twilio error codes for numbers that can never receive the message. */
const PERMANENT_TWILIO_CODES = new Set([21211, 21214, 21408, 21610, 21612, 21614]);

export interface SmsClient {
    createMessage(params: { body: string; from: string; to: string }): Promise<{ sid: string }>;
}

/**
 * Stored numbers are bare digits. Ten digits is a national number and gets
 * the default country code; longer numbers already carry one.
 */
export function toE164(phone: string, defaultCountryCode = '1'): string {
    if (phone.startsWith('+')) {
        return phone;
    }
    const digits = phone.replace(/\D/g, '');
    return digits.length === 10 ? `+${defaultCountryCode}${digits}` : `+${digits}`;
}

export function truncateSms(text: string): string {
    return text.length > SMS_MAX_LENGTH ? `${text.slice(0, SMS_MAX_LENGTH - 3)}...` : text;
}

/**
 * Short-message channel. Numbers are stored as digits; Twilio wants E.164.
 */
export class SmsChannel implements NotificationChannel {
    readonly name = 'sms' as const;

    constructor(
        private readonly client: SmsClient,
        private readonly fromNumber: string,
        private readonly defaultCountryCode = '1'
    ) {}

    async send(message: OutboundMessage): Promise<ChannelSendResult> {
        const to = toE164(message.to, this.defaultCountryCode);
        try {
            const result = await this.client.createMessage({
                body: truncateSms(message.text),
                from: this.fromNumber,
                to,
            });
            log.debug(`Message sent: ${result.sid}`);
            return { ok: true, providerId: result.sid };
        } catch (error) {
            const { status, code, message: reason } = readProviderError(error);
            const permanent = (typeof code === 'number' && PERMANENT_TWILIO_CODES.has(code)) || isPermanentStatus(status);
            log.warn(`Send failed (status ${status ?? 'n/a'}, code ${code ?? 'n/a'}): ${reason}`);
            return { ok: false, error: reason, permanent };
        }
    }
}

export function createTwilioSmsChannel(settings: {
    accountSid?: string;
    authToken?: string;
    fromNumber?: string;
    defaultCountryCode?: string;
}): NotificationChannel {
    const { accountSid, authToken, fromNumber, defaultCountryCode } = settings;

    if (!accountSid || !authToken || !fromNumber) {
        log.warn('Twilio credentials are not configured. SMS notifications are disabled.');
        return unconfiguredChannel('sms');
    }

    const client = twilio(accountSid, authToken);
    return new SmsChannel(
        {
            createMessage: async params => {
                const created = await client.messages.create(params);
                return { sid: created.sid };
            },
        },
        fromNumber,
        defaultCountryCode
    );
}
