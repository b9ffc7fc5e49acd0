import { describe, it, expect, beforeEach, vi } from 'vitest';

interface FakePortRecord {
    options: { path: string; baudRate: number; autoOpen?: boolean };
    isOpen: boolean;
    written: Array<{ data: string; encoding: string }>;
    drained: number;
}

const serialState = vi.hoisted(() => {
    const state: {
        ports: FakePortRecord[];
        openError: Error | null;
        writeError: Error | null;
    } = { ports: [], openError: null, writeError: null };
    return state;
});

vi.mock('serialport', () => {
    class SerialPort implements FakePortRecord {
        public isOpen = false;
        public written: Array<{ data: string; encoding: string }> = [];
        public drained = 0;

        constructor(public options: { path: string; baudRate: number; autoOpen?: boolean }) {
            serialState.ports.push(this);
        }

        on(): this {
            return this;
        }

        open(cb: (error: Error | null) => void): void {
            if (serialState.openError) {
                cb(serialState.openError);
                return;
            }
            this.isOpen = true;
            cb(null);
        }

        write(data: string, encoding: string, cb: (error: Error | null) => void): boolean {
            this.written.push({ data, encoding });
            cb(serialState.writeError);
            return true;
        }

        drain(cb: (error: Error | null) => void): void {
            this.drained++;
            cb(null);
        }

        close(cb: (error: Error | null) => void): void {
            this.isOpen = false;
            cb(null);
        }
    }
    return { SerialPort };
});

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

import { SerialChannel } from '../src/channels/SerialChannel';

describe('SerialChannel', () => {
    let channel: SerialChannel;

    beforeEach(() => {
        serialState.ports = [];
        serialState.openError = null;
        serialState.writeError = null;
        channel = new SerialChannel({ path: '/dev/ttyUSB0', baudRate: 115200 });
    });

    it('should open the configured port on start', async () => {
        await channel.start();

        expect(serialState.ports).toHaveLength(1);
        expect(serialState.ports[0].options).toEqual({ path: '/dev/ttyUSB0', baudRate: 115200, autoOpen: false });
        expect(channel.isConnected()).toBe(true);
    });

    it('should not open a second port when already started', async () => {
        await channel.start();
        await channel.start();
        expect(serialState.ports).toHaveLength(1);
    });

    it('should write a newline-terminated ASCII line and drain', async () => {
        await channel.start();

        await expect(channel.send('90')).resolves.toBe(true);
        await channel.send('reset\n');

        const port = serialState.ports[0];
        expect(port.written).toEqual([
            { data: '90\n', encoding: 'ascii' },
            { data: 'reset\n', encoding: 'ascii' }
        ]);
        expect(port.drained).toBe(2);
    });

    it('should stay disconnected when the port cannot be opened', async () => {
        serialState.openError = new Error('Error: No such file or directory, cannot open /dev/ttyUSB0');

        await expect(channel.start()).resolves.toBeUndefined();
        expect(channel.isConnected()).toBe(false);
    });

    it('should reject sends while the port is not open', async () => {
        await expect(channel.send('move')).rejects.toThrow('Port /dev/ttyUSB0 is not open');
    });

    it('should surface write errors', async () => {
        await channel.start();
        serialState.writeError = new Error('write EIO');

        await expect(channel.send('move')).rejects.toThrow('write EIO');
    });

    it('should close the port on stop', async () => {
        await channel.start();
        await channel.stop();
        await channel.stop();

        expect(serialState.ports[0].isOpen).toBe(false);
        expect(channel.isConnected()).toBe(false);
        await expect(channel.send('reset')).rejects.toThrow('is not open');
    });
});
