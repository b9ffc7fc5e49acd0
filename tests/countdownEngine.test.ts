import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

import { CountdownEngine } from '../src/core/CountdownEngine';
import { Scheduler } from '../src/core/Scheduler';

describe('CountdownEngine', () => {
    let scheduler: Scheduler;
    let engine: CountdownEngine;

    beforeEach(() => {
        vi.useFakeTimers();
        scheduler = new Scheduler(1000);
        engine = new CountdownEngine(scheduler);
    });

    afterEach(() => {
        engine.reset();
        vi.useRealTimers();
    });

    it('should start a session with the full duration remaining', () => {
        engine.start(1.5);

        expect(engine.getSession()).toEqual({
            totalDuration: 1.5,
            remainingDuration: 1.5,
            isRunning: true,
            isPaused: false
        });
        expect(engine.getRemainingSeconds()).toBe(5400);
        expect(engine.getProgressRatio()).toBe(1);
        expect(scheduler.isActive()).toBe(true);
    });

    it('should take exactly one tick period off per tick', () => {
        engine.start(1);
        let previous = engine.getSession().remainingDuration;

        for (let i = 0; i < 10; i++) {
            vi.advanceTimersByTime(1000);
            const remaining = engine.getSession().remainingDuration;
            expect(previous - remaining).toBeCloseTo(1 / 3600, 12);
            expect(remaining).toBeLessThan(previous);
            previous = remaining;
        }

        expect(engine.getElapsedTicks()).toBe(10);
        expect(engine.getRemainingSeconds()).toBe(3590);
    });

    it('should complete exactly once after five ticks for 0.0014 hours', () => {
        const completed = vi.fn();
        const ticked = vi.fn();
        engine.on('completed', completed);
        engine.on('tick', ticked);

        engine.start(0.0014);
        vi.advanceTimersByTime(4000);
        expect(completed).not.toHaveBeenCalled();
        expect(engine.isRunning()).toBe(true);

        vi.advanceTimersByTime(1000);
        expect(completed).toHaveBeenCalledOnce();
        expect(ticked).toHaveBeenCalledTimes(5);
        expect(engine.getSession()).toEqual({
            totalDuration: 0.0014,
            remainingDuration: 0,
            isRunning: false,
            isPaused: false
        });
        expect(scheduler.isActive()).toBe(false);

        vi.advanceTimersByTime(10_000);
        engine.tick();
        expect(completed).toHaveBeenCalledOnce();
        expect(ticked).toHaveBeenCalledTimes(5);
    });

    it('should round a duration that is not a whole number of ticks to the nearest tick', () => {
        const completed = vi.fn();
        engine.on('completed', completed);

        // 0.00145 h is 5.22 s: the fifth tick takes the last 1.22 s
        engine.start(0.00145);
        vi.advanceTimersByTime(4000);
        expect(engine.getRemainingSeconds()).toBe(1);
        vi.advanceTimersByTime(1000);
        expect(completed).toHaveBeenCalledOnce();
        expect(engine.getSession().remainingDuration).toBe(0);

        // 0.00155 h is 5.58 s: a sixth tick is needed
        engine.start(0.00155);
        vi.advanceTimersByTime(5000);
        expect(completed).toHaveBeenCalledOnce();
        expect(engine.getRemainingSeconds()).toBe(1);
        vi.advanceTimersByTime(1000);
        expect(completed).toHaveBeenCalledTimes(2);
    });

    it('should clamp the remaining time at zero', () => {
        engine.start(2 / 3600);
        vi.advanceTimersByTime(2000);

        expect(engine.getSession().remainingDuration).toBe(0);
        expect(engine.getRemainingSeconds()).toBe(0);
        expect(engine.getProgressRatio()).toBe(0);
    });

    it.each([0, -1, Number.NaN])('should complete on the first tick for a duration of %s', (hours) => {
        const completed = vi.fn();
        engine.on('completed', completed);

        engine.start(hours);
        expect(engine.getSession().totalDuration).toBe(0);

        vi.advanceTimersByTime(1000);
        expect(completed).toHaveBeenCalledOnce();
        expect(engine.isRunning()).toBe(false);
    });

    it('should hold the remaining time while paused', () => {
        engine.start(1);
        vi.advanceTimersByTime(3000);

        engine.pause();
        const snapshot = engine.getSession();
        engine.pause();
        expect(engine.getSession()).toEqual(snapshot);
        expect(snapshot.isPaused).toBe(true);
        expect(snapshot.isRunning).toBe(false);

        vi.advanceTimersByTime(10_000);
        engine.tick();
        expect(engine.getSession()).toEqual(snapshot);
        expect(engine.getElapsedTicks()).toBe(3);
    });

    it('should continue from where it paused on resume', () => {
        engine.start(1);
        vi.advanceTimersByTime(3000);
        engine.pause();

        engine.resume();
        engine.resume();
        expect(engine.isRunning()).toBe(true);
        expect(engine.isPaused()).toBe(false);

        vi.advanceTimersByTime(1000);
        expect(engine.getElapsedTicks()).toBe(4);
    });

    it('should ignore pause and resume without a session', () => {
        const state = vi.fn();
        engine.on('state', state);

        engine.pause();
        engine.resume();

        expect(state).not.toHaveBeenCalled();
        expect(engine.isRunning()).toBe(false);
        expect(engine.isPaused()).toBe(false);
    });

    it('should keep the remaining time when stopped', () => {
        engine.start(1);
        vi.advanceTimersByTime(60_000);

        engine.stop();
        engine.stop();

        expect(engine.isRunning()).toBe(false);
        expect(engine.getRemainingSeconds()).toBe(3540);

        vi.advanceTimersByTime(5000);
        expect(engine.getElapsedTicks()).toBe(60);
    });

    it('should clear the session on reset', () => {
        engine.start(1);
        vi.advanceTimersByTime(5000);

        engine.reset();

        expect(engine.getSession()).toEqual({
            totalDuration: 0,
            remainingDuration: 0,
            isRunning: false,
            isPaused: false
        });
        expect(engine.getElapsedTicks()).toBe(0);
    });

    it('should allow a new session after completion', () => {
        const completed = vi.fn();
        engine.on('completed', completed);

        engine.start(1 / 3600);
        vi.advanceTimersByTime(1000);
        engine.start(1 / 3600);
        vi.advanceTimersByTime(1000);

        expect(completed).toHaveBeenCalledTimes(2);
    });

    it('should restart the count when started while running', () => {
        engine.start(1);
        vi.advanceTimersByTime(5000);

        engine.start(0.5);
        vi.advanceTimersByTime(1000);

        expect(engine.getElapsedTicks()).toBe(1);
        expect(engine.getRemainingSeconds()).toBe(1799);
    });

    it('should keep ticking when a listener throws', () => {
        engine.on('tick', () => { throw new Error('listener failure'); });
        engine.start(1);

        vi.advanceTimersByTime(3000);
        expect(engine.getElapsedTicks()).toBe(3);
    });

    it('should stop notifying a listener after off', () => {
        const ticked = vi.fn();
        engine.on('tick', ticked);
        engine.start(1);
        vi.advanceTimersByTime(1000);

        engine.off('tick', ticked);
        vi.advanceTimersByTime(1000);
        expect(ticked).toHaveBeenCalledOnce();
    });
});
