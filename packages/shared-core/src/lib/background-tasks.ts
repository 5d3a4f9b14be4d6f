import { createLogger } from './logger';

const log = createLogger('Background');

/**
 * Runs fire-and-forget work (post-commit sweeps, notification fan-out)
 * without blocking the caller. Failures are logged, never rethrown.
 * `drain()` waits for everything in flight, for shutdown and tests.
 */
export class BackgroundTasks {
    private readonly inFlight = new Set<Promise<void>>();

    run(label: string, task: () => Promise<unknown>): void {
        const tracked: Promise<void> = task()
            .then(() => undefined)
            .catch((error: unknown) => {
                log.error(`${label} failed:`, error);
            })
            .finally(() => {
                this.inFlight.delete(tracked);
            });
        this.inFlight.add(tracked);
    }

    get pending(): number {
        return this.inFlight.size;
    }

    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }
}
