import { logger } from '../utils/logger';

/**
 * Periodic tick source on the event loop. Starting an active scheduler and
 * stopping an idle one are both no-ops.
 */
export class Scheduler {
    private interval: NodeJS.Timeout | null = null;

    constructor(private tickRateMs: number = 1000) { }

    public start(onTick: () => void): void {
        if (this.interval) return;
        logger.debug(`Scheduler started with tick rate: ${this.tickRateMs}ms`);

        this.interval = setInterval(() => {
            onTick();
        }, this.tickRateMs);
    }

    public stop(): void {
        if (!this.interval) return;
        clearInterval(this.interval);
        this.interval = null;
        logger.debug('Scheduler stopped');
    }

    public isActive(): boolean {
        return this.interval !== null;
    }

    public getTickRateMs(): number {
        return this.tickRateMs;
    }
}
