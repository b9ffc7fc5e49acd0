import { ChannelRegistry } from './ChannelRegistry';
import { OutboundSignal, SignalChannelKind } from './ISignalChannel';
import { EventBus } from '../core/EventBus';
import { ErrorClassifier } from '../core/ErrorClassifier';
import { logger } from '../utils/logger';

export interface DispatchStats {
    attempted: number;
    sent: number;
    failed: number;
    skipped: number;
}

/**
 * Fire-and-forget delivery of outbound signals.
 *
 * `send` returns immediately. The transport work is chained per channel, so
 * signals on one channel go out in the order they were dispatched and a slow
 * broker connect never holds up the caller or the serial line.
 */
export class SignalDispatcher {
    private queues: Map<SignalChannelKind, Promise<void>> = new Map();
    private stats: DispatchStats = { attempted: 0, sent: 0, failed: 0, skipped: 0 };

    constructor(private registry: ChannelRegistry, private events: EventBus) { }

    public send(channel: SignalChannelKind, payload: string, topic?: string): void {
        const signal: OutboundSignal = topic === undefined ? { channel, payload } : { channel, payload, topic };
        const target = this.registry.get(channel);

        if (!target) {
            this.stats.skipped++;
            logger.debug(`SignalDispatcher: No ${channel} channel registered, dropping ${JSON.stringify(payload)}`);
            return;
        }

        this.stats.attempted++;
        const previous = this.queues.get(channel) ?? Promise.resolve();
        const next = previous.then(async () => {
            try {
                await target.send(signal.payload, signal.topic);
                this.stats.sent++;
                this.events.emit('signal:sent', { signal });
            } catch (error) {
                const classified = ErrorClassifier.classify(error);
                this.stats.failed++;
                const hint = classified.retryable ? 'may succeed on a later dispatch' : 'will keep failing until fixed';
                logger.warn(`SignalDispatcher: ${channel} signal ${JSON.stringify(payload)} not delivered: ${classified.message} [${classified.type}, ${hint}]`);
                this.events.emit('signal:failed', { signal, error: classified });
            }
        });

        this.queues.set(channel, next);
        void next.finally(() => {
            if (this.queues.get(channel) === next) {
                this.queues.delete(channel);
            }
        });
    }

    /**
     * Resolves once every signal dispatched so far has settled.
     */
    public async flush(): Promise<void> {
        while (this.queues.size > 0) {
            await Promise.all(Array.from(this.queues.values()));
        }
    }

    public getStats(): DispatchStats {
        return { ...this.stats };
    }
}
