import type { ReclamationConfig } from "../config.js";

/**
 * Decides when the Reactor should give the runtime a chance to reclaim
 * memory. usage is whatever the Reactor's memory probe reports (heap bytes
 * in use by default).
 */
export interface ReclamationPolicy {
    /** Called before waiting; true asks for a shortened wait. */
    beforeWait(now: number, usage: number): boolean;
    /** Called after dispatching; true means reclaim() should run now. */
    afterIteration(now: number, usage: number): boolean;
    reclaim(now: number, usage: number): void;
}

const SHORTEN_AFTER_BYTES = 16 * 1024;

export function runtimeCollector(): void {
    const gc: unknown = Reflect.get(globalThis, "gc");
    if (typeof gc === "function") {
        gc();
    }
}

/**
 * Reclaims when allocation has just stopped, when usage grew by both the
 * configured byte count and ratio since the last pass, or when the idle
 * interval elapsed with some growth.
 */
export class DefaultReclamationPolicy implements ReclamationPolicy {
    private baseline: number | undefined;
    private lastPass: number;
    private growthBeforeWait = 0;

    constructor(
        private readonly config: ReclamationConfig,
        private readonly collector: () => void = runtimeCollector,
        start: number = Date.now(),
    ) {
        this.lastPass = start;
    }

    beforeWait(_now: number, usage: number): boolean {
        if (this.baseline === undefined) this.baseline = usage;
        this.growthBeforeWait = Math.max(0, usage - this.baseline);
        return this.growthBeforeWait > SHORTEN_AFTER_BYTES;
    }

    afterIteration(now: number, usage: number): boolean {
        const baseline = this.baseline ?? usage;
        const growth = Math.max(0, usage - baseline);
        const settled = this.growthBeforeWait >= this.config.reclaimMinBytes && growth <= this.growthBeforeWait;
        const large = growth > this.config.reclaimGrowthBytes && growth > baseline * this.config.reclaimGrowthRatio;
        const idle = now - this.lastPass > this.config.reclaimIdleMs && growth >= this.config.reclaimMinBytes;
        return settled || large || idle;
    }

    reclaim(now: number, _usage: number): void {
        this.collector();
        this.lastPass = now;
        // the next beforeWait() measures the post-collection baseline
        this.baseline = undefined;
        this.growthBeforeWait = 0;
    }
}
