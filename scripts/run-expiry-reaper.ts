/**
 * Long-running reaper worker. Stops cleanly on SIGINT/SIGTERM after the
 * current pass and any in-flight notifications finish.
 */
import * as dotenv from 'dotenv';
import * as path from 'path';
import { createProductionEngine, engineEvents, logger } from '@cancelfill/shared-core';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const engine = createProductionEngine();

engineEvents.on('slot-unfilled', slot => {
    logger.warn(`Slot ${slot.id} (${slot.date} ${slot.time}) could not be filled`);
});
engineEvents.on('dispatch-failed', result => {
    logger.warn(`Offer for slot ${result.slotId} could not reach entry ${result.entryId}`);
});

engine.startReaper();

let stopping = false;
async function shutdown(signal: string) {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, stopping reaper`);
    await engine.shutdown();
    process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        shutdown(signal).catch(error => {
            console.error('Shutdown failed:', error);
            process.exit(1);
        });
    });
}
