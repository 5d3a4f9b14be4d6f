/**
 * Claims a slot from the command line, as the booking page would.
 *
 *   npm run claim -- <token>
 */
import * as dotenv from 'dotenv';
import * as path from 'path';
import { BookingInDoubtError, createProductionEngine, formatSlotForDisplay } from '@cancelfill/shared-core';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

async function claim() {
    const secret = process.argv[2];
    if (!secret) {
        console.error('Usage: npm run claim -- <token>');
        process.exit(1);
    }

    const engine = createProductionEngine();
    try {
        const result = await engine.claim(secret);
        if (result.outcome === 'booked') {
            console.log(`Booked ${formatSlotForDisplay(result.slot.date, result.slot.time)} with ${result.slot.provider}`);
        } else {
            console.log(`Claim rejected: ${result.reason}`);
        }
    } catch (error) {
        if (error instanceof BookingInDoubtError) {
            console.error(error.message);
            process.exit(2);
        }
        throw error;
    } finally {
        await engine.shutdown();
    }
}

claim()
    .then(() => process.exit(0))
    .catch(error => {
        console.error('Claim failed:', error);
        process.exit(1);
    });
