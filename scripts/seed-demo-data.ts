/**
 * Seeds demo slots and waitlist entries.
 *
 *   npm run seed:demo               writes to Firestore (credentials from .env)
 *   npm run seed:demo -- --dry-run  runs against an in-memory store and
 *                                   cancels the first slot to show a wave
 */
import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { addDays } from 'date-fns';
import { z } from 'zod';
import {
    createCancelFillEngine,
    createProductionEngine,
    InMemoryDocumentStore,
    loadEngineConfig,
    logger,
    toSlotDate,
    type CancellationFillEngine,
    type NotificationChannel,
} from '@cancelfill/shared-core';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const demoFileSchema = z.object({
    slots: z.array(
        z.object({
            id: z.string(),
            dayOffset: z.number().int().nonnegative(),
            time: z.string(),
            specialty: z.string(),
            provider: z.string(),
            durationMinutes: z.number().int(),
        })
    ),
    waitlist: z.array(
        z.object({
            patientName: z.string(),
            phone: z.string().optional(),
            email: z.string().optional(),
            specialty: z.string(),
            dayOffsets: z.array(z.number().int().nonnegative()),
            timePreferences: z.array(z.enum(['morning', 'afternoon', 'evening', 'any'])),
        })
    ),
});

const consoleChannel = (name: 'sms' | 'email'): NotificationChannel => ({
    name,
    send: async message => {
        console.log(`[${name}] -> ${message.to}: ${message.subject}\n${message.text}\n`);
        return { ok: true, providerId: `console-${Date.now()}` };
    },
});

function buildEngine(dryRun: boolean): CancellationFillEngine {
    if (!dryRun) {
        return createProductionEngine();
    }
    return createCancelFillEngine({
        store: new InMemoryDocumentStore(),
        config: loadEngineConfig(),
        channels: { sms: consoleChannel('sms'), email: consoleChannel('email') },
    });
}

async function seed() {
    const dryRun = process.argv.includes('--dry-run');
    const dataPath = fileURLToPath(new URL('./data/demo-schedule.json', import.meta.url));
    const demo = demoFileSchema.parse(JSON.parse(fs.readFileSync(dataPath, 'utf8')));

    const today = new Date();
    const dateFor = (offset: number) => toSlotDate(addDays(today, offset));

    const engine = buildEngine(dryRun);

    const slots = await engine.importSlots(
        demo.slots.map(({ dayOffset, ...slot }) => ({ ...slot, date: dateFor(dayOffset) }))
    );
    logger.info(`Imported ${slots.length} slots`);

    for (const { dayOffsets, ...entry } of demo.waitlist) {
        await engine.addWaitlistEntry({ ...entry, preferredDates: dayOffsets.map(dateFor) });
    }
    logger.info(`Added ${demo.waitlist.length} waitlist entries`);

    if (dryRun && slots.length > 0) {
        const outcome = await engine.cancelSlot(slots[0].id, 'demo cancellation');
        logger.info(`Cancelled ${slots[0].id}: ${outcome.kind}`);
        await engine.shutdown();
    }
}

seed()
    .then(() => process.exit(0))
    .catch(error => {
        console.error('Seeding failed:', error);
        process.exit(1);
    });
