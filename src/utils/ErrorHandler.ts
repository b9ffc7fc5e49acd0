import { logger } from './logger';

export interface WaitOptions {
    intervalMs?: number;
    maxAttempts?: number;
}

export class ErrorHandler {
    /**
     * Extracts a printable message from anything that was thrown.
     */
    public static describe(error: unknown): string {
        if (error instanceof Error) return error.message;
        if (typeof error === 'string') return error;
        if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
            return error.message;
        }
        return String(error);
    }

    /**
     * Runs `fn` and resolves to its result, or to `fallback` when it throws.
     * The failure is logged as a warning and never reaches the caller.
     */
    public static async bestEffort<T>(
        label: string,
        fn: () => Promise<T>,
        fallback: T
    ): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            logger.warn(`ErrorHandler: ${label} failed (${this.describe(error)})`);
            return fallback;
        }
    }

    /**
     * Polls `check` every `intervalMs` until it returns true or `maxAttempts`
     * checks have been made. Resolves to whether the condition was met.
     */
    public static async waitFor(
        check: () => boolean,
        options: WaitOptions = {}
    ): Promise<boolean> {
        const { intervalMs = 100, maxAttempts = 50 } = options;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            if (check()) return true;
            await new Promise(resolve => setTimeout(resolve, intervalMs));
        }

        return check();
    }
}
