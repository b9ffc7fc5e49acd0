import readline from 'readline';
import { Control, InputHandler } from '../core/types';

export interface KeyboardInputOptions {
    input?: NodeJS.ReadStream;
    sliderStep?: number;
    // Current slider position, so arrow keys move relative to it
    getSliderValue: () => number;
    onQuit: () => void;
}

interface KeypressInfo {
    name?: string;
    ctrl?: boolean;
}

const KEY_CONTROLS: Record<string, Control> = {
    w: 'wakeup',
    space: 'wakeup',
    return: 'start',
    enter: 'start',
    p: 'stop',
    f: 'finish',
    m: 'companion'
};

/**
 * Turns keypresses on a TTY into press/release pairs on the input handler.
 */
export class KeyboardInput {
    private input: NodeJS.ReadStream;
    private sliderStep: number;
    private listener = (_str: string | undefined, key: KeypressInfo | undefined) => this.handleKey(key);

    constructor(private handler: InputHandler, private options: KeyboardInputOptions) {
        this.input = options.input ?? process.stdin;
        this.sliderStep = options.sliderStep ?? 5;
    }

    public attach(): void {
        readline.emitKeypressEvents(this.input);
        if (this.input.isTTY) this.input.setRawMode(true);
        this.input.on('keypress', this.listener);
        this.input.resume();
    }

    public detach(): void {
        this.input.off('keypress', this.listener);
        if (this.input.isTTY) this.input.setRawMode(false);
        this.input.pause();
    }

    public handleKey(key: KeypressInfo | undefined): void {
        if (!key?.name) return;

        if (key.name === 'q' || (key.ctrl && key.name === 'c')) {
            this.options.onQuit();
            return;
        }

        if (key.name === 'left' || key.name === 'right') {
            const delta = key.name === 'left' ? -this.sliderStep : this.sliderStep;
            this.handler.onSlide(this.options.getSliderValue() + delta);
            return;
        }

        const control = KEY_CONTROLS[key.name];
        if (!control) return;
        this.handler.onPress(control);
        this.handler.onRelease(control);
    }
}
