import { ButtonId, DisplaySurface, NetworkStatus, PAGE_STATES, PageHandle, PageState } from '../src/core/types';
import { ISignalChannel, SignalChannelKind } from '../src/channels/ISignalChannel';
import { DEFAULT_CONFIG, FocusPodConfig } from '../src/config/ConfigManager';

export class FakeDisplay implements DisplaySurface {
    public pages: Partial<Record<PageState, PageHandle>> = {};
    public visible = new Set<PageState>();
    public timeText = '';
    public progress = -1;
    public status = '';
    public labels: Partial<Record<ButtonId, string>> = {};
    public durationText = '';
    public background = '';
    public network: NetworkStatus | null = null;

    constructor(available: readonly PageState[] = PAGE_STATES) {
        for (const page of available) {
            this.pages[page] = {
                show: () => { this.visible.add(page); },
                hide: () => { this.visible.delete(page); }
            };
        }
    }

    setTimeText(text: string): void { this.timeText = text; }
    setProgressRatio(ratio: number): void { this.progress = ratio; }
    setStatusText(text: string): void { this.status = text; }
    setButtonLabel(button: ButtonId, label: string): void { this.labels[button] = label; }
    setDurationText(text: string): void { this.durationText = text; }
    setBackgroundColor(hex: string): void { this.background = hex; }
    setNetworkStatus(status: NetworkStatus): void { this.network = status; }
}

export class FakeChannel implements ISignalChannel {
    public readonly name: string;
    public attempts: Array<{ payload: string; topic?: string }> = [];
    public failWith: string | null = null;
    public started = false;

    constructor(public readonly kind: SignalChannelKind) {
        this.name = `Fake${kind}`;
    }

    async start(): Promise<void> { this.started = true; }
    async stop(): Promise<void> { this.started = false; }
    isConnected(): boolean { return this.started && this.failWith === null; }

    async send(payload: string, topic?: string): Promise<boolean> {
        this.attempts.push(topic === undefined ? { payload } : { payload, topic });
        if (this.failWith !== null) throw new Error(this.failWith);
        return true;
    }

    payloads(): string[] {
        return this.attempts.map(a => a.payload);
    }
}

export function testConfig(overrides: Partial<FocusPodConfig> = {}): FocusPodConfig {
    return { ...DEFAULT_CONFIG, serialEnabled: false, brokerEnabled: false, ...overrides };
}
