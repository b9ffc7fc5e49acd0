import { ISignalChannel, SignalChannelKind } from './ISignalChannel';
import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';

/**
 * ChannelRegistry - owns the signal channel instances and their lifecycle.
 * At most one channel per kind.
 */
export class ChannelRegistry {
    private channels: Map<SignalChannelKind, ISignalChannel> = new Map();

    /**
     * Register a channel instance, replacing any previous one of the same kind.
     */
    public register(channel: ISignalChannel): void {
        if (this.channels.has(channel.kind)) {
            logger.warn(`ChannelRegistry: Replacing existing ${channel.kind} channel`);
        }
        this.channels.set(channel.kind, channel);
        logger.info(`ChannelRegistry: Registered ${channel.name}`);
    }

    public get(kind: SignalChannelKind): ISignalChannel | undefined {
        return this.channels.get(kind);
    }

    public list(): SignalChannelKind[] {
        return Array.from(this.channels.keys());
    }

    /**
     * Start every channel. A channel that fails to start stays registered;
     * its sends will fail and be logged.
     */
    public async startAll(): Promise<void> {
        for (const [kind, channel] of this.channels.entries()) {
            try {
                await channel.start();
            } catch (e) {
                logger.error(`ChannelRegistry: Error starting ${kind}: ${ErrorHandler.describe(e)}`);
            }
        }
    }

    public async stopAll(): Promise<void> {
        for (const [kind, channel] of this.channels.entries()) {
            try {
                await channel.stop();
                logger.info(`ChannelRegistry: Stopped ${kind}`);
            } catch (e) {
                logger.error(`ChannelRegistry: Error stopping ${kind}: ${ErrorHandler.describe(e)}`);
            }
        }
    }

    public async remove(kind: SignalChannelKind): Promise<boolean> {
        const channel = this.channels.get(kind);
        if (!channel) return false;

        this.channels.delete(kind);
        try {
            await channel.stop();
        } catch (e) {
            logger.error(`ChannelRegistry: Error removing ${kind}: ${ErrorHandler.describe(e)}`);
        }
        logger.info(`ChannelRegistry: Removed ${kind}`);
        return true;
    }
}
