import { ErrorHandler } from '../utils/ErrorHandler';

export enum ErrorType {
    PORT_NOT_FOUND = 'port_not_found',
    PORT_BUSY = 'port_busy',
    PERMISSION_DENIED = 'permission_denied',
    TIMEOUT = 'timeout',
    NETWORK_ERROR = 'network_error',
    NOT_CONNECTED = 'not_connected',
    UNKNOWN = 'unknown'
}

export interface ClassifiedError {
    type: ErrorType;
    message: string;
    retryable: boolean;
    originalError?: unknown;
}

/**
 * Classifies serial and broker transport failures so they can be logged
 * with a stable reason. Nothing here decides to retry; dispatch stays single-shot.
 */
export class ErrorClassifier {
    public static classify(error: unknown): ClassifiedError {
        const errorMsg = ErrorHandler.describe(error ?? '').toLowerCase();

        if (this.isPortNotFound(errorMsg)) {
            return {
                type: ErrorType.PORT_NOT_FOUND,
                message: 'Serial port not found',
                retryable: false,
                originalError: error
            };
        }

        if (this.isPortBusy(errorMsg)) {
            return {
                type: ErrorType.PORT_BUSY,
                message: 'Serial port is in use by another process',
                retryable: true,
                originalError: error
            };
        }

        if (this.isPermissionDenied(errorMsg)) {
            return {
                type: ErrorType.PERMISSION_DENIED,
                message: 'Permission denied',
                retryable: false,
                originalError: error
            };
        }

        // After the open failures above, which end in "cannot open <path>"
        if (this.isNotConnected(errorMsg)) {
            return {
                type: ErrorType.NOT_CONNECTED,
                message: 'Transport is not connected',
                retryable: true,
                originalError: error
            };
        }

        if (this.isTimeout(errorMsg)) {
            return {
                type: ErrorType.TIMEOUT,
                message: 'Transport timed out',
                retryable: true,
                originalError: error
            };
        }

        if (this.isNetworkError(errorMsg)) {
            return {
                type: ErrorType.NETWORK_ERROR,
                message: 'Broker unreachable',
                retryable: true,
                originalError: error
            };
        }

        return {
            type: ErrorType.UNKNOWN,
            message: errorMsg || 'Unknown error occurred',
            retryable: false,
            originalError: error
        };
    }

    private static isNotConnected(msg: string): boolean {
        const patterns = [
            'not open',
            'not connected',
            'port is closed',
            'client disconnecting'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isPortNotFound(msg: string): boolean {
        const patterns = [
            'no such file',
            'enoent',
            'file not found',
            'cannot find'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isPortBusy(msg: string): boolean {
        const patterns = [
            'resource busy',
            'ebusy',
            'access denied',
            'cannot lock port'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isPermissionDenied(msg: string): boolean {
        return msg.includes('permission denied') || msg.includes('eacces');
    }

    private static isTimeout(msg: string): boolean {
        const patterns = [
            'timeout',
            'timed out',
            'etimedout'
        ];
        return patterns.some(p => msg.includes(p));
    }

    private static isNetworkError(msg: string): boolean {
        const patterns = [
            'econnrefused',
            'enotfound',
            'ehostunreach',
            'econnreset',
            'network',
            'connection refused'
        ];
        return patterns.some(p => msg.includes(p));
    }
}
