/**
 * Display formatting shared by the pages. All conversions truncate.
 */

const pad = (value: number): string => String(value).padStart(2, '0');

/** `HH:MM:SS` for a whole number of seconds. */
export function formatClock(totalSeconds: number): string {
    const seconds = Math.max(0, Math.trunc(totalSeconds));
    const hours = Math.trunc(seconds / 3600);
    const minutes = Math.trunc((seconds % 3600) / 60);
    return `${pad(hours)}:${pad(minutes)}:${pad(seconds % 60)}`;
}

/** Whole minutes in a duration given in hours, as sent to the companion. */
export function toWholeMinutes(hours: number): number {
    if (!Number.isFinite(hours)) return 0;
    return Math.max(0, Math.trunc(Math.round(hours * 60 * 1000) / 1000));
}

/** `1h 30min`, `2h` or `45min` for a duration in hours. */
export function formatDurationLabel(hours: number): string {
    const totalMinutes = toWholeMinutes(hours);
    const wholeHours = Math.trunc(totalMinutes / 60);
    const minutes = totalMinutes % 60;

    if (wholeHours > 0) {
        return minutes > 0 ? `${wholeHours}h ${minutes}min` : `${wholeHours}h`;
    }
    return `${minutes}min`;
}

export interface Rgb {
    r: number;
    g: number;
    b: number;
}

const GRADIENT_FROM: Rgb = { r: 216, g: 226, b: 236 };
const GRADIENT_TO: Rgb = { r: 252, g: 224, b: 231 };

/**
 * Background colour for a duration ratio in [0, 1], blending from a cool
 * grey-blue at 0 to a pale pink at 1.
 */
export function durationGradient(ratio: number): Rgb {
    const t = Math.min(1, Math.max(0, Number.isFinite(ratio) ? ratio : 0));
    const blend = (from: number, to: number) => from + Math.trunc((to - from) * t);
    return {
        r: blend(GRADIENT_FROM.r, GRADIENT_TO.r),
        g: blend(GRADIENT_FROM.g, GRADIENT_TO.g),
        b: blend(GRADIENT_FROM.b, GRADIENT_TO.b)
    };
}

export function toHexColor({ r, g, b }: Rgb): string {
    return '#' + [r, g, b].map(c => c.toString(16).padStart(2, '0')).join('').toUpperCase();
}
