import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';
import { formatClock } from '../utils/format';
import { Scheduler } from './Scheduler';
import { Session } from './types';

export type CountdownEventType = 'tick' | 'completed' | 'state';
export type CountdownListener = (session: Session) => void;

const MS_PER_HOUR = 3_600_000;

/**
 * Focus countdown. Every tick takes exactly one tick period off the remaining
 * time, independent of wall-clock drift. Time is counted in whole ticks and
 * the hour values of the session are derived from the tick counts.
 */
export class CountdownEngine {
    private totalHours = 0;
    private totalTicks = 0;
    private elapsedTicks = 0;
    private running = false;
    private paused = false;
    private completionEmitted = false;
    private listeners = new Map<CountdownEventType, Set<CountdownListener>>();

    constructor(private scheduler: Scheduler) { }

    public on(event: CountdownEventType, fn: CountdownListener): void {
        let set = this.listeners.get(event);
        if (!set) {
            set = new Set();
            this.listeners.set(event, set);
        }
        set.add(fn);
    }

    public off(event: CountdownEventType, fn: CountdownListener): void {
        this.listeners.get(event)?.delete(fn);
    }

    private emit(event: CountdownEventType): void {
        const snapshot = this.getSession();
        for (const fn of this.listeners.get(event) ?? []) {
            try {
                fn(snapshot);
            } catch (error) {
                logger.error(`CountdownEngine: ${event} listener threw: ${ErrorHandler.describe(error)}`);
            }
        }
    }

    /**
     * Begins a new session. Durations that are not positive become a
     * zero-length session which completes on the first tick.
     */
    public start(durationHours: number): void {
        this.scheduler.stop();

        const valid = Number.isFinite(durationHours) && durationHours > 0;
        this.totalHours = valid ? durationHours : 0;
        this.totalTicks = valid ? Math.round(durationHours * MS_PER_HOUR / this.scheduler.getTickRateMs()) : 0;
        this.elapsedTicks = 0;
        this.running = true;
        this.paused = false;
        this.completionEmitted = false;

        this.scheduler.start(() => this.tick());
        logger.info(`CountdownEngine: Started ${formatClock(this.getRemainingSeconds())} session (${this.totalTicks} ticks)`);
        this.emit('state');
    }

    public pause(): void {
        if (!this.running) return;
        this.scheduler.stop();
        this.running = false;
        this.paused = true;
        logger.info(`CountdownEngine: Paused at ${formatClock(this.getRemainingSeconds())}`);
        this.emit('state');
    }

    public resume(): void {
        if (!this.paused) return;
        this.paused = false;
        this.running = true;
        this.scheduler.start(() => this.tick());
        logger.info(`CountdownEngine: Resumed with ${this.totalTicks - this.elapsedTicks} ticks left`);
        this.emit('state');
    }

    /**
     * Cancels ticking. The remaining time is kept as it was.
     */
    public stop(): void {
        const wasActive = this.running || this.paused;
        this.scheduler.stop();
        this.running = false;
        this.paused = false;
        if (wasActive) {
            logger.info(`CountdownEngine: Stopped at ${formatClock(this.getRemainingSeconds())}`);
            this.emit('state');
        }
    }

    /**
     * Stops and clears the session back to an empty one.
     */
    public reset(): void {
        this.stop();
        this.totalHours = 0;
        this.totalTicks = 0;
        this.elapsedTicks = 0;
        this.completionEmitted = false;
    }

    public tick(): void {
        if (!this.running || this.paused) return;

        this.elapsedTicks++;
        if (this.elapsedTicks < this.totalTicks) {
            this.emit('tick');
            return;
        }

        this.elapsedTicks = this.totalTicks;
        this.running = false;
        this.scheduler.stop();
        this.emit('tick');

        if (!this.completionEmitted) {
            this.completionEmitted = true;
            logger.info('CountdownEngine: Session completed');
            this.emit('completed');
        }
    }

    public getSession(): Session {
        return {
            totalDuration: this.totalHours,
            remainingDuration: this.getRemainingHours(),
            isRunning: this.running,
            isPaused: this.paused
        };
    }

    public getRemainingHours(): number {
        if (this.elapsedTicks >= this.totalTicks) return 0;
        const elapsedHours = this.elapsedTicks * this.scheduler.getTickRateMs() / MS_PER_HOUR;
        return Math.max(0, this.totalHours - elapsedHours);
    }

    public getRemainingSeconds(): number {
        return (this.totalTicks - this.elapsedTicks) * this.scheduler.getTickRateMs() / 1000;
    }

    /** Remaining share of the session in [0, 1]; 0 for an empty session. */
    public getProgressRatio(): number {
        if (this.totalHours <= 0) return 0;
        return Math.min(1, this.getRemainingHours() / this.totalHours);
    }

    public getElapsedTicks(): number {
        return this.elapsedTicks;
    }

    public isRunning(): boolean {
        return this.running;
    }

    public isPaused(): boolean {
        return this.paused;
    }
}
