import { EventEmitter } from 'events';
import { PageState, Session } from './types';
import type { OutboundSignal } from '../channels/ISignalChannel';
import type { ClassifiedError } from './ErrorClassifier';
import type { FocusPodConfig } from '../config/ConfigManager';
import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';

export interface BusEvents {
    'page:changed': { from: PageState; to: PageState };
    'session:started': Session;
    'session:paused': Session;
    'session:resumed': Session;
    'session:completed': Session;
    'session:finished': Session;
    'signal:sent': { signal: OutboundSignal };
    'signal:failed': { signal: OutboundSignal; error: ClassifiedError };
    'broker:connected': { host: string; port: number };
    'broker:disconnected': { host: string; port: number };
    'config:changed': { oldConfig: FocusPodConfig; newConfig: FocusPodConfig };
}

export type BusEventName = keyof BusEvents;

/**
 * Typed wrapper over a Node EventEmitter. One instance is created per
 * device and handed to every component that publishes or listens.
 */
export class EventBus {
    private emitter = new EventEmitter();

    public on<K extends BusEventName>(event: K, listener: (payload: BusEvents[K]) => void): this {
        this.emitter.on(event, listener);
        return this;
    }

    public once<K extends BusEventName>(event: K, listener: (payload: BusEvents[K]) => void): this {
        this.emitter.once(event, listener);
        return this;
    }

    public off<K extends BusEventName>(event: K, listener: (payload: BusEvents[K]) => void): this {
        this.emitter.off(event, listener);
        return this;
    }

    /**
     * A listener that throws is logged and the remaining listeners still run;
     * the publisher never sees the error.
     */
    public emit<K extends BusEventName>(event: K, payload: BusEvents[K]): boolean {
        // Raw listeners, so once-wrappers still remove themselves when called
        const listeners = this.emitter.rawListeners(event);
        for (const listener of listeners) {
            try {
                listener.call(this.emitter, payload);
            } catch (error) {
                logger.error(`EventBus: Listener for ${event} threw: ${ErrorHandler.describe(error)}`);
            }
        }
        return listeners.length > 0;
    }

    public removeAllListeners(event?: BusEventName): this {
        if (event) {
            this.emitter.removeAllListeners(event);
        } else {
            this.emitter.removeAllListeners();
        }
        return this;
    }

    public listenerCount(event: BusEventName): number {
        return this.emitter.listenerCount(event);
    }
}
