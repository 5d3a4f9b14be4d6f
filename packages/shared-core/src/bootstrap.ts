import { getAdminFirestore } from '@cancelfill/shared-firebase';
import { createSendGridEmailChannel } from './channels/email-channel';
import { createTwilioSmsChannel } from './channels/sms-channel';
import { loadEngineConfig, type EnvSource } from './config/engine-config';
import { createCancelFillEngine, type CancellationFillEngine } from './engine';
import { logger, sanitizeForLog } from './lib/logger';
import { FirestoreDocumentStore } from './store/firestore-store';

/**
 * Wires an engine to Firestore, Twilio and SendGrid from environment
 * settings. Channels without credentials are disabled, not fatal.
 */
export function createProductionEngine(env: EnvSource = process.env): CancellationFillEngine {
    const config = loadEngineConfig(env);
    const store = new FirestoreDocumentStore(getAdminFirestore(config.firebase));

    logger.info(
        'Engine configured',
        sanitizeForLog({
            waveSize: config.waveSize,
            ttlMs: config.tokenTtlMs,
            urgentFillMode: config.urgentFillMode,
            projectId: config.firebase.projectId,
            twilioAuthToken: config.twilio.authToken,
            sendgridApiKey: config.sendgridApiKey,
        })
    );

    return createCancelFillEngine({
        store,
        config,
        channels: {
            sms: createTwilioSmsChannel(config.twilio),
            email: createSendGridEmailChannel({ apiKey: config.sendgridApiKey, senderEmail: config.senderEmail }),
        },
    });
}
