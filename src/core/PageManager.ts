import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';
import { formatClock, formatDurationLabel, durationGradient, toHexColor, toWholeMinutes } from '../utils/format';
import { CountdownEngine } from './CountdownEngine';
import { SessionParameterStore } from './SessionParameterStore';
import { SignalDispatcher } from '../channels/SignalDispatcher';
import { BrokerPayload, SerialCommand, encodeSessionStart } from '../channels/CompanionProtocol';
import { EventBus } from './EventBus';
import { Control, DisplaySurface, InputHandler, PAGE_STATES, PageState, isPageState } from './types';

export interface PageManagerDeps {
    display: DisplaySurface;
    engine: CountdownEngine;
    store: SessionParameterStore;
    dispatcher: SignalDispatcher;
    events: EventBus;
}

export const StatusText = {
    NONE: '',
    TIMES_UP: "Time's Up!",
    FINISHED: 'Finished'
} as const;

export const ButtonLabel = {
    STOP: 'Stop',
    CONTINUE: 'Continue',
    FINISH: 'Finish',
    DONE: 'Done'
} as const;

/**
 * PageManager - the wakeup / navigation / focus state machine.
 *
 * Controls act on release; a press only gets logged. A release that ends
 * outside the control (press lost) goes through the same path. Any control
 * that has no meaning on the current page is ignored and the page stays put.
 */
export class PageManager implements InputHandler {
    private current: PageState = PageState.WAKEUP;
    private display: DisplaySurface;
    private engine: CountdownEngine;
    private store: SessionParameterStore;
    private dispatcher: SignalDispatcher;
    private events: EventBus;

    constructor(deps: PageManagerDeps) {
        this.display = deps.display;
        this.engine = deps.engine;
        this.store = deps.store;
        this.dispatcher = deps.dispatcher;
        this.events = deps.events;

        this.engine.on('tick', () => {
            if (this.current === PageState.FOCUS) this.renderCountdown();
        });
        this.engine.on('completed', () => this.handleCompleted());
    }

    /**
     * Hides every page, then shows the wakeup page. Pages the display did not
     * supply are reported; switching to them later is refused.
     */
    public init(): void {
        for (const page of PAGE_STATES) {
            const handle = this.display.pages[page];
            if (!handle) {
                logger.error(`PageManager: Page ${page} not initialized`);
                continue;
            }
            this.render(`hide ${page}`, () => handle.hide());
        }

        this.current = PageState.WAKEUP;
        this.render('show wakeup', () => this.display.pages[PageState.WAKEUP]?.show());
        this.renderDuration();
        logger.info('PageManager: Initialized on wakeup page');
    }

    public getCurrentPage(): PageState {
        return this.current;
    }

    public isPageVisible(page: PageState): boolean {
        return this.current === page;
    }

    /**
     * Hides the current page and shows `target`. Unknown or uninitialized
     * targets are logged and leave the current page as it is.
     */
    public switchPage(target: string): boolean {
        if (!isPageState(target)) {
            logger.error(`PageManager: Invalid page: ${target}`);
            return false;
        }

        const next = this.display.pages[target];
        if (!next) {
            logger.error(`PageManager: Page ${target} not initialized`);
            return false;
        }

        const from = this.current;
        const previous = this.display.pages[from];
        if (previous) this.render(`hide ${from}`, () => previous.hide());

        if (from === PageState.FOCUS && target !== PageState.FOCUS) {
            this.engine.reset();
        }

        this.render(`show ${target}`, () => next.show());
        this.current = target;

        if (target === PageState.NAVIGATION) this.renderDuration();

        logger.info(`PageManager: Switched to page: ${target}`);
        this.events.emit('page:changed', { from, to: target });
        return true;
    }

    public onPress(control: Control): void {
        logger.debug(`PageManager: ${control} pressed on ${this.current}`);
    }

    public onRelease(control: Control): void {
        logger.debug(`PageManager: ${control} released on ${this.current}`);
        this.activate(control);
    }

    public onPressLost(control: Control): void {
        logger.debug(`PageManager: ${control} press lost on ${this.current}`);
        this.activate(control);
    }

    /** Duration slider moved (0-100). */
    public onSlide(sliderValue: number): void {
        if (this.current !== PageState.NAVIGATION) {
            this.ignore('duration');
            return;
        }
        this.store.setFromSlider(sliderValue);
        this.renderDuration();
        logger.info(`PageManager: Time slider changed: ${formatDurationLabel(this.store.get())}`);
    }

    /** Duration set directly in hours, clamped to the configured range. */
    public adjustDuration(hours: number): void {
        if (this.current !== PageState.NAVIGATION) {
            this.ignore('duration');
            return;
        }
        this.store.set(hours);
        this.renderDuration();
        logger.info(`PageManager: Duration set to ${formatDurationLabel(this.store.get())}`);
    }

    public onTick(): void {
        this.engine.tick();
    }

    private activate(control: Control): void {
        switch (this.current) {
            case PageState.WAKEUP:
                if (control === 'wakeup') {
                    this.switchPage(PageState.NAVIGATION);
                    return;
                }
                break;
            case PageState.NAVIGATION:
                if (control === 'start') {
                    this.startSession();
                    return;
                }
                break;
            case PageState.FOCUS:
                if (control === 'stop') {
                    this.toggleSession();
                    return;
                }
                if (control === 'finish') {
                    this.finishSession();
                    return;
                }
                if (control === 'companion') {
                    logger.info('PageManager: Companion move requested');
                    this.dispatcher.send('serial', SerialCommand.MOVE);
                    return;
                }
                break;
        }
        this.ignore(control);
    }

    private ignore(control: Control): void {
        logger.debug(`PageManager: Ignoring ${control} on ${this.current}`);
    }

    private startSession(): void {
        if (!this.display.pages[PageState.FOCUS]) {
            logger.error(`PageManager: Page ${PageState.FOCUS} not initialized`);
            return;
        }

        const hours = this.store.get();
        logger.info(`PageManager: Starting focus session of ${formatDurationLabel(hours)}`);

        this.engine.start(hours);
        this.dispatcher.send('serial', encodeSessionStart(toWholeMinutes(hours)));
        this.dispatcher.send('broker', BrokerPayload.SESSION_STARTED);

        this.switchPage(PageState.FOCUS);
        this.render('reset focus labels', () => {
            this.display.setStatusText(StatusText.NONE);
            this.display.setButtonLabel('stop', ButtonLabel.STOP);
            this.display.setButtonLabel('finish', ButtonLabel.FINISH);
        });
        this.renderCountdown();
        this.events.emit('session:started', this.engine.getSession());
    }

    private toggleSession(): void {
        if (this.engine.isPaused()) {
            this.engine.resume();
            this.render('resume labels', () => {
                this.display.setButtonLabel('stop', ButtonLabel.STOP);
                this.display.setStatusText(StatusText.NONE);
            });
            this.events.emit('session:resumed', this.engine.getSession());
            return;
        }

        if (this.engine.isRunning()) {
            this.engine.pause();
            this.render('pause labels', () => {
                this.display.setButtonLabel('stop', ButtonLabel.CONTINUE);
                this.display.setStatusText(StatusText.NONE);
            });
            this.events.emit('session:paused', this.engine.getSession());
            return;
        }

        logger.info('PageManager: Session already over, returning to navigation');
        this.switchPage(PageState.NAVIGATION);
    }

    private finishSession(): void {
        this.engine.stop();
        const session = this.engine.getSession();

        this.render('finish labels', () => {
            this.display.setStatusText(StatusText.FINISHED);
            this.display.setButtonLabel('stop', ButtonLabel.DONE);
        });

        this.dispatcher.send('serial', SerialCommand.RESET);
        this.dispatcher.send('broker', BrokerPayload.SESSION_ENDED);
        logger.info('PageManager: Focus session finished by user');
        this.events.emit('session:finished', session);

        this.switchPage(PageState.NAVIGATION);
    }

    private handleCompleted(): void {
        const session = this.engine.getSession();
        this.render('completion labels', () => {
            this.display.setStatusText(StatusText.TIMES_UP);
            this.display.setButtonLabel('stop', ButtonLabel.DONE);
            this.display.setButtonLabel('finish', ButtonLabel.DONE);
        });
        this.events.emit('session:completed', session);

        if (this.current === PageState.FOCUS) {
            this.switchPage(PageState.NAVIGATION);
        }
    }

    private renderCountdown(): void {
        this.render('countdown', () => {
            this.display.setTimeText(formatClock(this.engine.getRemainingSeconds()));
            this.display.setProgressRatio(this.engine.getProgressRatio());
        });
    }

    private renderDuration(): void {
        this.render('duration', () => {
            this.display.setDurationText(formatDurationLabel(this.store.get()));
            this.display.setBackgroundColor(toHexColor(durationGradient(this.store.getRatio())));
        });
    }

    /** Display errors are logged and do not interrupt the transition. */
    private render(label: string, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            logger.error(`PageManager: Display update (${label}) failed: ${ErrorHandler.describe(error)}`);
        }
    }
}
