import { logger } from '../utils/logger';
import { FocusPodConfig } from '../config/ConfigManager';
import { ChannelRegistry } from '../channels/ChannelRegistry';
import { SerialChannel } from '../channels/SerialChannel';
import { BrokerChannel } from '../channels/BrokerChannel';
import { SignalDispatcher } from '../channels/SignalDispatcher';
import { EventBus } from './EventBus';
import { Scheduler } from './Scheduler';
import { CountdownEngine } from './CountdownEngine';
import { SessionParameterStore } from './SessionParameterStore';
import { PageManager } from './PageManager';
import { DisplaySurface, InputHandler } from './types';

export interface FocusDeviceOptions {
    config: FocusPodConfig;
    display: DisplaySurface;
    // Built from `config` when omitted
    registry?: ChannelRegistry;
    events?: EventBus;
}

/**
 * The application core: one of each component, wired together once.
 * The view layer talks to it through `input` and receives updates through
 * the display surface it supplied.
 */
export class FocusDevice {
    public readonly config: FocusPodConfig;
    public readonly events: EventBus;
    public readonly store: SessionParameterStore;
    public readonly scheduler: Scheduler;
    public readonly engine: CountdownEngine;
    public readonly registry: ChannelRegistry;
    public readonly dispatcher: SignalDispatcher;
    public readonly pages: PageManager;
    private display: DisplaySurface;
    private running = false;

    constructor(options: FocusDeviceOptions) {
        this.config = options.config;
        this.display = options.display;
        this.events = options.events ?? new EventBus();
        this.registry = options.registry ?? FocusDevice.createChannels(this.config, this.events);

        this.store = new SessionParameterStore(
            { minDurationHours: this.config.minDurationHours, maxDurationHours: this.config.maxDurationHours },
            this.config.defaultDurationHours
        );
        this.scheduler = new Scheduler(this.config.tickPeriodMs);
        this.engine = new CountdownEngine(this.scheduler);
        this.dispatcher = new SignalDispatcher(this.registry, this.events);
        this.pages = new PageManager({
            display: this.display,
            engine: this.engine,
            store: this.store,
            dispatcher: this.dispatcher,
            events: this.events
        });

        this.events.on('broker:connected', () => this.display.setNetworkStatus('online'));
        this.events.on('broker:disconnected', () => this.display.setNetworkStatus('offline'));
    }

    /**
     * Registers the channels the configuration enables.
     */
    public static createChannels(config: FocusPodConfig, events: EventBus): ChannelRegistry {
        const registry = new ChannelRegistry();

        if (config.serialEnabled) {
            registry.register(new SerialChannel({
                path: config.serialPortPath,
                baudRate: config.serialBaudRate
            }));
        }

        if (config.brokerEnabled) {
            registry.register(new BrokerChannel({
                host: config.brokerHost,
                port: config.brokerPort,
                topic: config.brokerTopic,
                clientId: config.brokerClientId,
                connectTimeoutMs: config.brokerConnectTimeoutMs,
                pollIntervalMs: config.brokerPollIntervalMs
            }, events));
        }

        return registry;
    }

    public get input(): InputHandler {
        return this.pages;
    }

    public async start(): Promise<void> {
        if (this.running) return;
        this.running = true;

        await this.registry.startAll();
        this.display.setNetworkStatus(this.registry.list().some(kind => this.registry.get(kind)?.isConnected()) ? 'online' : 'offline');
        this.pages.init();
        logger.info(`FocusDevice: Started with channels [${this.registry.list().join(', ')}]`);
    }

    public async stop(): Promise<void> {
        if (!this.running) return;
        this.running = false;

        this.engine.reset();
        await this.dispatcher.flush();
        await this.registry.stopAll();
        logger.info('FocusDevice: Stopped');
    }
}
