import { Logger } from "../logger.js";
import { Timer } from "../reactor/timer.js";
import type { TimerHost } from "../reactor/timer.js";
import type { Continuation } from "../reactor/continuation.js";

export interface GaugeSink {
    push(values: Record<string, number>, at: Date): void;
}

/** Named numeric values, the latest one wins. */
export class GaugeRegistry {
    private values = new Map<string, number>();

    set(name: string, value: number): void {
        this.values.set(name, value);
    }

    value(name: string): number | undefined {
        return this.values.get(name);
    }

    snapshot(): Record<string, number> {
        return Object.fromEntries([...this.values.entries()].sort(([a], [b]) => a.localeCompare(b)));
    }
}

export const logGaugeSink: GaugeSink = {
    push(values) {
        Logger.debug("gauges", { facility: "gauges", ...values });
    },
};

/** Pushes every gauge to a sink at a fixed interval, driven by the Reactor. */
export class GaugePusher implements Continuation {
    private readonly timer: Timer;

    constructor(
        host: TimerHost,
        private readonly registry: GaugeRegistry,
        private readonly sink: GaugeSink,
        intervalMs: number,
    ) {
        this.timer = new Timer(host, this, intervalMs, { repeat: true });
    }

    resume(): void {
        this.sink.push(this.registry.snapshot(), new Date());
    }

    stop(): void {
        this.timer.stop();
    }
}
