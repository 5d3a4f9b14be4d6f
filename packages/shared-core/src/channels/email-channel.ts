import sgMail from '@sendgrid/mail';
import { createLogger } from '../lib/logger';
import {
    isPermanentStatus,
    readProviderError,
    unconfiguredChannel,
    type ChannelSendResult,
    type NotificationChannel,
    type OutboundMessage,
} from './notification-channel';

const log = createLogger('Email');

export interface EmailClient {
    sendMail(params: { to: string; from: string; subject: string; text: string; html?: string }): Promise<{
        statusCode: number;
        messageId?: string;
    }>;
}

/**
 * Electronic-mail channel.
 */
export class EmailChannel implements NotificationChannel {
    readonly name = 'email' as const;

    constructor(private readonly client: EmailClient, private readonly senderEmail: string) {}

    async send(message: OutboundMessage): Promise<ChannelSendResult> {
        try {
            const response = await this.client.sendMail({
                to: message.to,
                from: this.senderEmail,
                subject: message.subject,
                text: message.text,
                html: message.html,
            });
            if (response.statusCode >= 300) {
                return {
                    ok: false,
                    error: `Unexpected status ${response.statusCode}`,
                    permanent: isPermanentStatus(response.statusCode),
                };
            }
            return { ok: true, providerId: response.messageId ?? `status-${response.statusCode}` };
        } catch (error) {
            // SendGrid's ResponseError carries the HTTP status in `code`.
            const { status, code, message: reason } = readProviderError(error);
            const httpStatus = status ?? (typeof code === 'number' ? code : undefined);
            log.warn(`Send failed (status ${httpStatus ?? 'n/a'}): ${reason}`);
            return { ok: false, error: reason, permanent: isPermanentStatus(httpStatus) };
        }
    }
}

export function createSendGridEmailChannel(settings: { apiKey?: string; senderEmail: string }): NotificationChannel {
    if (!settings.apiKey) {
        log.warn('SendGrid API key is not configured. Email notifications are disabled.');
        return unconfiguredChannel('email');
    }

    sgMail.setApiKey(settings.apiKey);
    return new EmailChannel(
        {
            sendMail: async params => {
                const [response] = await sgMail.send(params);
                const header: unknown = response.headers['x-message-id'];
                return {
                    statusCode: response.statusCode,
                    messageId: typeof header === 'string' ? header : undefined,
                };
            },
        },
        settings.senderEmail
    );
}
