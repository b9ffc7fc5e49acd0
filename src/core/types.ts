export enum PageState {
    WAKEUP = 'wakeup',
    NAVIGATION = 'navigation',
    FOCUS = 'focus'
}

export const PAGE_STATES: readonly PageState[] = [PageState.WAKEUP, PageState.NAVIGATION, PageState.FOCUS];

export function isPageState(value: unknown): value is PageState {
    return typeof value === 'string' && PAGE_STATES.some(page => page === value);
}

/**
 * One focus interval. Durations are fractional hours.
 */
export interface Session {
    totalDuration: number;
    remainingDuration: number;
    isRunning: boolean;
    isPaused: boolean;
}

/** Touch targets the view layer reports presses on. */
export type Control = 'wakeup' | 'start' | 'duration' | 'stop' | 'finish' | 'companion';

export type ButtonId = 'start' | 'stop' | 'finish' | 'companion';

export type NetworkStatus = 'online' | 'offline';

export interface PageHandle {
    show(): void;
    hide(): void;
}

/**
 * What the core drives on screen. Rendering is entirely up to the implementation.
 */
export interface DisplaySurface {
    pages: Partial<Record<PageState, PageHandle>>;
    setTimeText(text: string): void;
    setProgressRatio(ratio: number): void;
    setStatusText(text: string): void;
    setButtonLabel(button: ButtonId, label: string): void;
    setDurationText(text: string): void;
    setBackgroundColor(hex: string): void;
    setNetworkStatus(status: NetworkStatus): void;
}

/**
 * Callbacks the view layer invokes. Releases that end outside the control
 * (press lost) are handled exactly like a normal release.
 */
export interface InputHandler {
    onPress(control: Control): void;
    onRelease(control: Control): void;
    onPressLost(control: Control): void;
    onSlide(sliderValue: number): void;
    onTick(): void;
}
