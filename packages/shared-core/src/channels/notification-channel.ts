import type { NotificationChannelName } from '@cancelfill/shared-types';

export type OutboundMessage = {
    to: string;
    subject: string;
    text: string;
    html?: string;
};

export type ChannelSendResult =
    | { ok: true; providerId: string }
    | { ok: false; error: string; permanent: boolean };

export interface NotificationChannel {
    readonly name: NotificationChannelName;
    send(message: OutboundMessage): Promise<ChannelSendResult>;
}

/**
 * Reads an HTTP-ish status and provider code off an SDK error without
 * trusting its shape.
 */
export function readProviderError(error: unknown): { status?: number; code?: number | string; message: string } {
    if (typeof error !== 'object' || error === null) {
        return { message: String(error) };
    }
    const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
    const code = 'code' in error && (typeof error.code === 'number' || typeof error.code === 'string') ? error.code : undefined;
    const message = error instanceof Error ? error.message : 'Unknown provider error';
    return { status, code, message };
}

/** 4xx responses other than rate limiting will not succeed on retry. */
export function isPermanentStatus(status: number | undefined): boolean {
    return status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429;
}

export const unconfiguredChannel = (name: NotificationChannelName): NotificationChannel => ({
    name,
    send: async () => ({ ok: false, error: `${name} service not configured`, permanent: true }),
});
