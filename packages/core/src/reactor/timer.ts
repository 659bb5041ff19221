import type { Continuation } from "./continuation.js";

/** The part of the Reactor a Timer needs. */
export interface TimerHost {
    now(): number;
    addTimer(timer: Timer): void;
    removeTimer(timer: Timer): void;
}

export interface TimerOptions {
    repeat?: boolean;
}

/**
 * A deadline with an owner. When the deadline passes the Reactor calls
 * execute(), which resumes the owner. One-shot timers leave the Reactor when
 * they fire; repeating timers re-arm themselves for the next interval.
 */
export class Timer {
    private due = 0;
    private armed = false;
    private interval: number;
    private readonly repeat: boolean;

    constructor(
        private readonly host: TimerHost,
        private readonly owner: Continuation,
        delayMs: number,
        options: TimerOptions = {},
    ) {
        this.repeat = options.repeat ?? false;
        this.interval = delayMs;
        this.restart(delayMs);
    }

    active(): boolean {
        return this.armed;
    }

    deadline(): number {
        return this.due;
    }

    repeating(): boolean {
        return this.repeat;
    }

    execute(): void {
        if (!this.armed) return;
        if (this.repeat) {
            this.due = this.host.now() + this.interval;
        } else {
            this.armed = false;
            this.host.removeTimer(this);
        }
        this.owner.resume();
    }

    stop(): void {
        this.armed = false;
        this.host.removeTimer(this);
    }

    restart(delayMs: number = this.interval): void {
        this.interval = delayMs;
        this.due = this.host.now() + delayMs;
        this.armed = true;
        this.host.addTimer(this);
    }
}
