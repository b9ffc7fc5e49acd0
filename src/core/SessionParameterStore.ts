import { logger } from '../utils/logger';

export interface DurationBounds {
    minDurationHours: number;
    maxDurationHours: number;
}

const SLIDER_MAX = 100;

/**
 * Holds the focus duration picked on the navigation page. Values outside the
 * configured bounds are clamped rather than rejected.
 */
export class SessionParameterStore {
    private value: number;

    constructor(private bounds: DurationBounds, initialHours: number = 1) {
        this.value = this.clamp(Number.isFinite(initialHours) ? initialHours : bounds.minDurationHours);
    }

    public get(): number {
        return this.value;
    }

    /**
     * Stores `hours` clamped to the bounds and returns the stored value.
     * Non-numeric input leaves the current value untouched.
     */
    public set(hours: number): number {
        if (!Number.isFinite(hours)) {
            logger.warn(`SessionParameterStore: Ignoring non-finite duration ${hours}`);
            return this.value;
        }
        const clamped = this.clamp(hours);
        if (clamped !== hours) {
            logger.debug(`SessionParameterStore: Clamped ${hours}h to ${clamped}h`);
        }
        this.value = clamped;
        return this.value;
    }

    /** Maps a 0-100 slider position onto the duration bounds. */
    public setFromSlider(sliderValue: number): number {
        if (!Number.isFinite(sliderValue)) {
            logger.warn(`SessionParameterStore: Ignoring non-finite slider value ${sliderValue}`);
            return this.value;
        }
        const position = Math.min(SLIDER_MAX, Math.max(0, sliderValue));
        const { minDurationHours: min, maxDurationHours: max } = this.bounds;
        return this.set(min + (position / SLIDER_MAX) * (max - min));
    }

    public toSlider(): number {
        const span = this.bounds.maxDurationHours - this.bounds.minDurationHours;
        if (span <= 0) return 0;
        const position = ((this.value - this.bounds.minDurationHours) / span) * SLIDER_MAX;
        // 29 -> 0.58h -> 28.999999999999996 without the rounding step
        return Math.trunc(Math.round(position * 1e6) / 1e6);
    }

    /** Position of the current value within the bounds, in [0, 1]. */
    public getRatio(): number {
        const span = this.bounds.maxDurationHours - this.bounds.minDurationHours;
        if (span <= 0) return 0;
        return (this.value - this.bounds.minDurationHours) / span;
    }

    public getBounds(): DurationBounds {
        return { ...this.bounds };
    }

    private clamp(hours: number): number {
        return Math.min(this.bounds.maxDurationHours, Math.max(this.bounds.minDurationHours, hours));
    }
}
