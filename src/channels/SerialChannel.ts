import { SerialPort } from 'serialport';
import { ISignalChannel } from './ISignalChannel';
import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';

export interface SerialChannelOptions {
    path: string;
    baudRate: number;
}

/**
 * SerialChannel - newline-terminated ASCII commands to the companion host.
 *
 * The port is opened once at start. Writes are fire-and-forget: nothing is
 * read back, and a write to a closed port fails without reopening it.
 */
export class SerialChannel implements ISignalChannel {
    public readonly name: string = 'Serial';
    public readonly kind = 'serial' as const;
    private port: SerialPort | null = null;

    constructor(private options: SerialChannelOptions) { }

    public async start(): Promise<void> {
        if (this.port?.isOpen) return;

        const port = new SerialPort({
            path: this.options.path,
            baudRate: this.options.baudRate,
            autoOpen: false
        });

        port.on('error', (error: Error) => {
            logger.error(`SerialChannel: Port error on ${this.options.path}: ${error.message}`);
        });
        port.on('close', () => {
            logger.warn(`SerialChannel: ${this.options.path} closed`);
        });

        try {
            await new Promise<void>((resolve, reject) => {
                port.open((error) => (error ? reject(error) : resolve()));
            });
            this.port = port;
            logger.info(`SerialChannel: Opened ${this.options.path} at ${this.options.baudRate} baud`);
        } catch (error) {
            this.port = null;
            logger.warn(`SerialChannel: Could not open ${this.options.path}: ${ErrorHandler.describe(error)}`);
        }
    }

    public async stop(): Promise<void> {
        const port = this.port;
        this.port = null;
        if (!port || !port.isOpen) return;

        await new Promise<void>((resolve, reject) => {
            port.close((error) => (error ? reject(error) : resolve()));
        });
        logger.info(`SerialChannel: Closed ${this.options.path}`);
    }

    public isConnected(): boolean {
        return this.port?.isOpen ?? false;
    }

    public async send(payload: string): Promise<boolean> {
        const port = this.port;
        if (!port || !port.isOpen) {
            throw new Error(`Port ${this.options.path} is not open`);
        }

        const line = payload.endsWith('\n') ? payload : `${payload}\n`;
        await new Promise<void>((resolve, reject) => {
            port.write(line, 'ascii', (error) => (error ? reject(error) : resolve()));
        });
        await new Promise<void>((resolve, reject) => {
            port.drain((error) => (error ? reject(error) : resolve()));
        });

        logger.info(`SerialChannel: Sent ${JSON.stringify(line)}`);
        return true;
    }
}
