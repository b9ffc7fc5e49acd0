#!/usr/bin/env node
import { Command } from 'commander';
import { SerialPort, ReadlineParser } from 'serialport';
import yaml from 'yaml';
import dotenv from 'dotenv';
import path from 'path';
import os from 'os';
import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';
import { ConfigManager, FocusPodConfig, isConfigKey, parseScalar, CONFIG_KEYS } from '../config/ConfigManager';
import { FocusDevice } from '../core/FocusDevice';
import { EventBus } from '../core/EventBus';
import { SignalChannelKind } from '../channels/ISignalChannel';
import { describeCompanionLine } from '../channels/CompanionProtocol';
import { TerminalDisplay } from '../display/TerminalDisplay';
import { KeyboardInput } from '../display/KeyboardInput';

dotenv.config(); // Local .env
dotenv.config({ path: path.join(os.homedir(), '.focuspod', '.env') }); // Global .env

process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise rejection (non-fatal): ${reason}`);
});

process.on('uncaughtException', (err) => {
    logger.error(`Uncaught exception (non-fatal): ${err?.stack || err}`);
});

interface RunOptions {
    config?: string;
    serial: boolean;
    broker?: boolean;
}

interface SendOptions {
    config?: string;
    broker?: boolean;
    topic?: string;
}

interface MonitorOptions {
    baud: string;
}

const program = new Command();

program
    .name('focuspod')
    .description('Focus session controller with serial and MQTT companion signalling')
    .version('1.0.0');

program
    .command('run')
    .description('Run the focus device on this terminal')
    .option('-c, --config <path>', 'Path to a focuspod.config.yaml')
    .option('--no-serial', 'Disable the serial channel')
    .option('--broker', 'Enable the MQTT broker channel')
    .action(async (options: RunOptions) => {
        const events = new EventBus();
        const config: FocusPodConfig = {
            ...new ConfigManager(options.config, events).getAll()
        };
        config.serialEnabled = config.serialEnabled && options.serial;
        if (options.broker) config.brokerEnabled = true;

        const display = new TerminalDisplay();
        const device = new FocusDevice({ config, display, events });

        let stopping = false;
        const shutdown = async () => {
            if (stopping) return;
            stopping = true;
            keyboard.detach();
            process.stdout.write('\n');
            await ErrorHandler.bestEffort('shutdown', () => device.stop(), undefined);
            process.exit(0);
        };

        const keyboard = new KeyboardInput(device.input, {
            getSliderValue: () => device.store.toSlider(),
            onQuit: () => void shutdown()
        });

        process.on('SIGINT', () => void shutdown());
        process.on('SIGTERM', () => void shutdown());

        await device.start();
        keyboard.attach();
        console.log('\nfocuspod running. Press q to quit.');
    });

program
    .command('ports')
    .description('List serial ports visible to this machine')
    .action(async () => {
        const ports = await SerialPort.list();
        if (ports.length === 0) {
            console.log('No serial ports found.');
            return;
        }
        for (const port of ports) {
            const details = [port.manufacturer, port.serialNumber].filter(Boolean).join(', ');
            console.log(`${port.path}${details ? `  (${details})` : ''}`);
        }
    });

program
    .command('monitor')
    .description('Print the lines a companion host receives on a serial port')
    .argument('<path>', 'Serial port path, e.g. /dev/ttyUSB0')
    .option('-b, --baud <rate>', 'Baud rate', '115200')
    .action((portPath: string, options: MonitorOptions) => {
        const baudRate = Number(options.baud);
        const port = new SerialPort({ path: portPath, baudRate });
        const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));

        port.on('open', () => console.log(`Listening on ${portPath} at ${baudRate} baud (Ctrl+C to stop)`));
        port.on('error', (error: Error) => {
            logger.error(`monitor: ${error.message}`);
            process.exitCode = 1;
        });
        parser.on('data', (line: string) => {
            const time = new Date().toTimeString().slice(0, 8);
            console.log(`[${time}] ${line.trim()}  -> ${describeCompanionLine(line)}`);
        });
    });

program
    .command('send')
    .description('Dispatch one signal to the companion and exit')
    .argument('<payload>', 'Payload, e.g. reset, move or a number of minutes')
    .option('-c, --config <path>', 'Path to a focuspod.config.yaml')
    .option('--broker', 'Publish on the MQTT topic instead of writing to serial')
    .option('-t, --topic <topic>', 'Override the MQTT topic')
    .action(async (payload: string, options: SendOptions) => {
        const events = new EventBus();
        const channel: SignalChannelKind = options.broker ? 'broker' : 'serial';
        const config: FocusPodConfig = {
            ...new ConfigManager(options.config, events).getAll(),
            serialEnabled: channel === 'serial',
            brokerEnabled: channel === 'broker'
        };

        const device = new FocusDevice({ config, display: new TerminalDisplay({ write: () => true }), events });
        await device.registry.startAll();
        device.dispatcher.send(channel, payload, options.topic);
        await device.dispatcher.flush();
        await device.registry.stopAll();

        const stats = device.dispatcher.getStats();
        console.log(stats.sent > 0 ? `Sent ${JSON.stringify(payload)} over ${channel}` : `Could not send over ${channel}`);
        process.exitCode = stats.sent > 0 ? 0 : 1;
    });

const configCommand = program
    .command('config')
    .description('Inspect or change configuration');

configCommand
    .command('show')
    .description('Print the effective configuration')
    .option('-c, --config <path>', 'Path to a focuspod.config.yaml')
    .action((options: { config?: string }) => {
        const manager = new ConfigManager(options.config);
        console.log(`# ${manager.getConfigPath()}`);
        console.log(yaml.stringify(manager.getAll()).trimEnd());
    });

configCommand
    .command('set')
    .description('Set one option and save it')
    .argument('<key>', `One of: ${CONFIG_KEYS.join(', ')}`)
    .argument('<value>', 'New value')
    .option('-c, --config <path>', 'Path to a focuspod.config.yaml')
    .action((key: string, value: string, options: { config?: string }) => {
        if (!isConfigKey(key)) {
            console.error(`Unknown option ${key}. Known options: ${CONFIG_KEYS.join(', ')}`);
            process.exitCode = 1;
            return;
        }
        const manager = new ConfigManager(options.config);
        process.exitCode = manager.set(key, parseScalar(value)) ? 0 : 1;
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(`focuspod: ${ErrorHandler.describe(error)}`);
    process.exitCode = 1;
});
