import type { PlaybackState, PlaybackStatus, Step, Trace } from '../types';
import { InvalidInputError } from './errors';

export type PlaybackListener = (state: PlaybackState) => void;

export interface PlaybackView {
    state: PlaybackState;
    step: Step | undefined;
}

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

/**
 * Cursor over a loaded trace.
 *
 * idle -> ready on `load`; ready/paused -> playing on `play`; playing -> paused on `pause`.
 * Stepping and seeking leave the controller paused, or finished when the cursor lands on the last step.
 * While playing, the host calls `tick(now)` from its redraw cycle; the cursor advances one step
 * each time `delayMs` has elapsed since the previous advance.
 */
export class PlaybackController {
    private trace: Trace | null = null;
    private status: PlaybackStatus = 'idle';
    private cursor = 0;
    private delayMs: number;
    private lastAdvanceAt: number | null = null;
    private snapshot: PlaybackState;
    private readonly listeners = new Set<PlaybackListener>();

    constructor(delayMs = 0) {
        this.delayMs = PlaybackController.checkDelay(delayMs);
        this.snapshot = this.buildState();
    }

    private static checkDelay(ms: number) {
        if (!Number.isFinite(ms) || ms < 0) {
            throw new InvalidInputError(`Delay must be a non-negative number of milliseconds, got ${ms}.`);
        }
        return ms;
    }

    getState(): PlaybackState {
        return this.snapshot;
    }

    getTrace(): Trace | null {
        return this.trace;
    }

    currentStep(): Step | undefined {
        return this.trace?.steps[this.cursor];
    }

    /**
     * State and step to show for `trace`. For a trace other than the loaded one, this is what `load`
     * (or `unload`, for null) would produce, without changing anything.
     */
    viewOf(trace: Trace | null): PlaybackView {
        if (trace === this.trace) {
            return { state: this.snapshot, step: this.currentStep() };
        }
        const status: PlaybackStatus = trace ? 'ready' : 'idle';
        const state: PlaybackState = Object.freeze({
            status,
            cursor: 0,
            length: trace ? trace.steps.length : 0,
            delayMs: this.delayMs,
        });
        return { state, step: trace?.steps[0] };
    }

    subscribe(listener: PlaybackListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    load(trace: Trace): void {
        this.trace = trace;
        this.cursor = 0;
        this.lastAdvanceAt = null;
        this.status = 'ready';
        this.emit(true);
    }

    unload(): void {
        this.trace = null;
        this.cursor = 0;
        this.lastAdvanceAt = null;
        this.status = 'idle';
        this.emit();
    }

    play(): void {
        if (this.status !== 'ready' && this.status !== 'paused') return;
        this.lastAdvanceAt = null;
        this.status = this.atEnd() ? 'finished' : 'playing';
        this.emit();
    }

    pause(): void {
        if (this.status !== 'playing') return;
        this.lastAdvanceAt = null;
        this.status = 'paused';
        this.emit();
    }

    restart(): void {
        if (!this.trace) return;
        this.load(this.trace);
    }

    stepForward(): void {
        this.seek(this.cursor + 1);
    }

    stepBackward(): void {
        this.seek(this.cursor - 1);
    }

    seek(index: number): void {
        if (!this.trace || Number.isNaN(index)) return;
        this.lastAdvanceAt = null;
        this.cursor = clamp(Math.trunc(index), 0, this.lastIndex());
        this.status = this.atEnd() ? 'finished' : 'paused';
        this.emit();
    }

    setDelay(ms: number): void {
        this.delayMs = PlaybackController.checkDelay(ms);
        this.emit();
    }

    /**
     * Advances at most one step. Returns whether the cursor moved.
     */
    tick(now: number): boolean {
        if (this.status !== 'playing') return false;
        if (this.lastAdvanceAt === null) {
            this.lastAdvanceAt = now;
            return false;
        }
        if (now - this.lastAdvanceAt < this.delayMs) return false;

        this.lastAdvanceAt = now;
        this.cursor = Math.min(this.cursor + 1, this.lastIndex());
        if (this.atEnd()) {
            this.status = 'finished';
            this.lastAdvanceAt = null;
        }
        this.emit();
        return true;
    }

    private lastIndex() {
        return this.trace ? Math.max(0, this.trace.steps.length - 1) : 0;
    }

    private atEnd() {
        return this.cursor >= this.lastIndex();
    }

    private buildState(): PlaybackState {
        return Object.freeze({
            status: this.status,
            cursor: this.cursor,
            length: this.trace ? this.trace.steps.length : 0,
            delayMs: this.delayMs,
        });
    }

    // A reload always notifies, even when the new trace has the same length.
    private emit(force = false) {
        const next = this.buildState();
        const prev = this.snapshot;
        if (!force && next.status === prev.status && next.cursor === prev.cursor && next.length === prev.length && next.delayMs === prev.delayMs) {
            return;
        }
        this.snapshot = next;
        this.listeners.forEach(listener => listener(next));
    }
}
