import { ButtonId, DisplaySurface, NetworkStatus, PageHandle, PageState } from '../core/types';

const BAR_WIDTH = 20;

interface ScreenState {
    visible: PageState | null;
    timeText: string;
    progress: number;
    status: string;
    durationText: string;
    background: string;
    network: NetworkStatus;
    buttons: Record<ButtonId, string>;
}

export interface TextSink {
    write(chunk: string): unknown;
}

/**
 * Draws the visible page as a single refreshed line of text.
 */
export class TerminalDisplay implements DisplaySurface {
    public readonly pages: Record<PageState, PageHandle>;
    private state: ScreenState = {
        visible: null,
        timeText: '00:00:00',
        progress: 0,
        status: '',
        durationText: '',
        background: '',
        network: 'offline',
        buttons: { start: 'Start', stop: 'Stop', finish: 'Finish', companion: 'echo' }
    };

    constructor(private out: TextSink = process.stdout) {
        const handle = (page: PageState): PageHandle => ({
            show: () => {
                this.state.visible = page;
                this.draw();
            },
            hide: () => {
                if (this.state.visible === page) this.state.visible = null;
            }
        });

        this.pages = {
            [PageState.WAKEUP]: handle(PageState.WAKEUP),
            [PageState.NAVIGATION]: handle(PageState.NAVIGATION),
            [PageState.FOCUS]: handle(PageState.FOCUS)
        };
    }

    public setTimeText(text: string): void {
        this.state.timeText = text;
        this.draw();
    }

    public setProgressRatio(ratio: number): void {
        this.state.progress = Math.min(1, Math.max(0, ratio));
        this.draw();
    }

    public setStatusText(text: string): void {
        this.state.status = text;
        this.draw();
    }

    public setButtonLabel(button: ButtonId, label: string): void {
        this.state.buttons[button] = label;
        this.draw();
    }

    public setDurationText(text: string): void {
        this.state.durationText = text;
        this.draw();
    }

    public setBackgroundColor(hex: string): void {
        this.state.background = hex;
    }

    public setNetworkStatus(status: NetworkStatus): void {
        this.state.network = status;
        this.draw();
    }

    /** The line currently on screen, without terminal control codes. */
    public renderLine(): string {
        const s = this.state;
        const net = s.network === 'online' ? '[net]' : '[ - ]';

        switch (s.visible) {
            case PageState.WAKEUP:
                return `${net} Tap to wake  (w)`;
            case PageState.NAVIGATION:
                return `${net} Focus for ${s.durationText}  (<-/-> adjust, enter ${s.buttons.start})`;
            case PageState.FOCUS: {
                const filled = Math.round(s.progress * BAR_WIDTH);
                const bar = '#'.repeat(filled) + '.'.repeat(BAR_WIDTH - filled);
                const status = s.status ? `  ${s.status}` : '';
                return `${net} ${s.timeText} [${bar}]  (p ${s.buttons.stop}, f ${s.buttons.finish}, m ${s.buttons.companion})${status}`;
            }
            default:
                return net;
        }
    }

    private draw(): void {
        if (!this.state.visible) return;
        this.out.write(`\r\x1b[2K${this.renderLine()}`);
    }
}
