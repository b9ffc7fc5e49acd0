import { connect, MqttClient } from 'mqtt';
import { ISignalChannel } from './ISignalChannel';
import { EventBus } from '../core/EventBus';
import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';

export interface BrokerChannelOptions {
    host: string;
    port: number;
    topic: string;
    clientId: string;
    connectTimeoutMs: number;
    pollIntervalMs: number;
}

/**
 * BrokerChannel - publishes session notifications to a single MQTT topic.
 *
 * The connection is made lazily on the first publish. Each send makes at
 * most one connect attempt, bounded by `connectTimeoutMs`, and the client
 * never reconnects on its own.
 */
export class BrokerChannel implements ISignalChannel {
    public readonly name: string = 'Broker';
    public readonly kind = 'broker' as const;
    private client: MqttClient | null = null;

    constructor(private options: BrokerChannelOptions, private events?: EventBus) { }

    public async start(): Promise<void> {
        logger.info(`BrokerChannel: Ready for ${this.url()} (topic ${this.options.topic}), connecting on first publish`);
    }

    public async stop(): Promise<void> {
        const client = this.client;
        this.client = null;
        if (!client) return;
        await client.endAsync();
        logger.info('BrokerChannel: Disconnected');
    }

    public isConnected(): boolean {
        return this.client?.connected ?? false;
    }

    public async send(payload: string, topic?: string): Promise<boolean> {
        const client = this.client?.connected ? this.client : await this.connect();
        const target = topic || this.options.topic;

        await new Promise<void>((resolve, reject) => {
            client.publish(target, payload, { qos: 0, retain: false }, (error) => (error ? reject(error) : resolve()));
        });

        logger.info(`BrokerChannel: Published to ${target}: ${payload}`);
        return true;
    }

    private url(): string {
        return `mqtt://${this.options.host}:${this.options.port}`;
    }

    private async connect(): Promise<MqttClient> {
        if (this.client) {
            this.client.end(true);
            this.client = null;
        }

        logger.info(`BrokerChannel: Connecting to ${this.url()}`);
        // Written by the listeners below while the wait is in progress
        const attempt: { error: Error | null; closed: boolean } = { error: null, closed: false };

        const client = connect(this.url(), {
            clientId: this.options.clientId,
            keepalive: 60,
            connectTimeout: this.options.connectTimeoutMs,
            reconnectPeriod: 0,
            clean: true
        });

        client.on('connect', () => {
            logger.info(`BrokerChannel: Connected to ${this.url()}`);
            this.events?.emit('broker:connected', { host: this.options.host, port: this.options.port });
        });
        client.on('error', (error: Error) => {
            attempt.error = error;
            logger.error(`BrokerChannel: Client error: ${error.message}`);
        });
        client.on('close', () => {
            const wasCurrent = this.client === client;
            attempt.closed = true;
            if (wasCurrent) {
                this.client = null;
                logger.warn(`BrokerChannel: Connection to ${this.url()} closed`);
                this.events?.emit('broker:disconnected', { host: this.options.host, port: this.options.port });
            }
        });

        const maxAttempts = Math.max(1, Math.ceil(this.options.connectTimeoutMs / this.options.pollIntervalMs));
        const connected = await ErrorHandler.waitFor(
            () => client.connected || attempt.closed,
            { intervalMs: this.options.pollIntervalMs, maxAttempts }
        );

        if (!connected || !client.connected) {
            client.end(true);
            const reason = attempt.error
                ? attempt.error.message
                : `Broker connection timeout after ${this.options.connectTimeoutMs}ms`;
            throw new Error(reason);
        }

        this.client = client;
        return client;
    }
}
