import { ReactorConfigSchema, ReclamationConfigSchema } from "../config.js";
import type { ReactorConfig } from "../config.js";
import { ReactorError, WaitError } from "../errors.js";
import { Logger, describeError } from "../logger.js";
import { GaugeRegistry } from "../monitor/gauges.js";
import type { Connection, ConnectionRole } from "./connection.js";
import { emptyReadySet } from "./poller.js";
import type { Interest, ReadinessPoller, ReadySet } from "./poller.js";
import { DefaultReclamationPolicy } from "./reclamation.js";
import type { ReclamationPolicy } from "./reclamation.js";
import type { Timer, TimerHost } from "./timer.js";

export interface ReactorOptions {
    poller: ReadinessPoller;
    clock?: () => number;
    config?: Partial<ReactorConfig>;
    reclamation?: ReclamationPolicy;
    gauges?: GaugeRegistry;
    memoryUsage?: () => number;
}

const COUNTED_ROLES: Array<[ConnectionRole, string]> = [
    ["imap", "imap-connections"],
    ["pop3", "pop3-connections"],
    ["smtp", "smtp-connections"],
    ["http", "http-connections"],
    ["database", "db-connections"],
    ["internal", "internal-connections"],
    ["other", "other-connections"],
];

/**
 * The readiness-driven dispatcher. It owns every Connection and Timer added
 * to it and runs on a single logical thread: each iteration waits for
 * readiness, fires due timers, then dispatches to every connection once.
 * Nothing it calls may block; a continuation that has to wait returns and
 * is resumed later.
 */
export class Reactor implements TimerHost {
    private readonly poller: ReadinessPoller;
    private readonly clock: () => number;
    private readonly config: ReactorConfig;
    private readonly reclamation: ReclamationPolicy;
    private readonly memoryUsage: () => number;
    readonly gauges: GaugeRegistry;

    private list: Connection[] = [];
    private timers: Timer[] = [];
    private stopping = false;
    private startup = false;
    private running = false;

    constructor(options: ReactorOptions) {
        this.poller = options.poller;
        this.clock = options.clock ?? Date.now;
        this.config = ReactorConfigSchema.parse(options.config ?? {});
        this.reclamation = options.reclamation ??
            new DefaultReclamationPolicy(ReclamationConfigSchema.parse({}), undefined, this.clock());
        this.gauges = options.gauges ?? new GaugeRegistry();
        this.memoryUsage = options.memoryUsage ?? (() => process.memoryUsage().heapUsed);
    }

    now(): number {
        return this.clock();
    }

    /**
     * Adds c to the connections this Reactor serves. During shutdown new
     * connections are refused so the shutdown can complete.
     */
    addConnection(c: Connection): void {
        if (this.stopping) {
            Logger.error("Cannot add new connections during shutdown", {
                facility: "reactor",
                connection: c.description(),
            });
            return;
        }
        if (this.list.includes(c)) return;
        this.list.push(c);
        c.setWaker(() => this.wake());
        if (c.role !== "internal") {
            Logger.debug(`Added ${c.description()}`, { facility: "reactor" });
        }
        this.setConnectionCounts();
        this.wake();
    }

    removeConnection(c: Connection): void {
        const index = this.list.indexOf(c);
        if (index < 0) return;
        this.list.splice(index, 1);
        c.setWaker(undefined);
        if (c.role !== "internal") {
            Logger.debug(`Removed ${c.description()}`, { facility: "reactor" });
        }
        this.setConnectionCounts();
    }

    connections(): readonly Connection[] {
        return this.list;
    }

    /** Also called when a timer is re-armed, since its deadline may be nearer. */
    addTimer(timer: Timer): void {
        if (!this.timers.includes(timer)) this.timers.push(timer);
        this.wake();
    }

    removeTimer(timer: Timer): void {
        const index = this.timers.indexOf(timer);
        if (index >= 0) this.timers.splice(index, 1);
    }

    activeTimers(): readonly Timer[] {
        return this.timers;
    }

    /** Runs until stop() is called, then shuts every connection down. */
    async start(): Promise<void> {
        if (this.running) {
            throw new ReactorError("Reactor is already running");
        }
        this.running = true;
        Logger.debug("Starting reactor", { facility: "reactor" });
        try {
            while (!this.stopping) {
                await this.runOnce();
            }
            this.shutdown();
        } finally {
            this.running = false;
        }
        Logger.debug("Reactor stopped", { facility: "reactor" });
    }

    stop(): void {
        this.stopping = true;
        this.wake();
    }

    /**
     * Ends the current wait so the next iteration sees new connections,
     * timers and output queued from outside the Reactor's own dispatch.
     */
    wake(): void {
        this.poller.wake();
    }

    inShutdown(): boolean {
        return this.stopping;
    }

    /** While true, listeners are left alone so startup chores finish first. */
    setStartup(startup: boolean): void {
        this.startup = startup;
    }

    inStartup(): boolean {
        return this.startup;
    }

    /** One iteration: wait, fire timers, dispatch, maybe reclaim. */
    async runOnce(): Promise<void> {
        const before = this.clock();
        const interest: Interest[] = [];
        let deadline = Number.POSITIVE_INFINITY;

        for (const c of this.list) {
            if (!c.active() || (this.startup && c.role === "listener")) continue;
            const state = c.state();
            interest.push({
                fd: c.fd,
                stream: c.stream,
                read: c.canRead() && state !== "closing",
                write: c.canWrite() || state === "connecting" || state === "closing",
            });
            const t = c.timeout();
            if (t > 0 && t < deadline) deadline = t;
        }
        for (const timer of this.timers) {
            if (timer.active() && timer.deadline() < deadline) deadline = timer.deadline();
        }

        let timeoutMs = this.config.waitCeilingMs;
        if (deadline !== Number.POSITIVE_INFINITY) {
            timeoutMs = Math.min(Math.max(deadline - before, 0), this.config.waitCeilingMs);
        }
        if (this.reclamation.beforeWait(before, this.memoryUsage()) && timeoutMs > this.config.shortenedWaitMs) {
            timeoutMs = this.config.shortenedWaitMs;
        }

        let ready: ReadySet = emptyReadySet();
        try {
            ready = await this.poller.wait(interest, timeoutMs);
        } catch (error) {
            if (error instanceof WaitError && error.waitCode === "EINTR") {
                // an interrupted wait is simply retried next iteration
            } else if (error instanceof WaitError && error.waitCode === "EBADF") {
                this.removeBadConnections();
            } else {
                Logger.disaster(`Waiting for readiness failed: ${describeError(error)}`, { facility: "reactor" });
                this.stopping = true;
                throw error instanceof WaitError
                    ? error
                    : new WaitError(`Waiting for readiness failed: ${describeError(error)}`, "WAIT_FAILED", error);
            }
        }

        const now = this.clock();
        this.gauges.set("memory-used", this.memoryUsage());

        this.fireTimers(now);

        for (const c of [...this.list]) {
            if (!this.list.includes(c)) continue;
            if (c.valid()) {
                this.dispatch(c, ready.readable.has(c.fd), ready.writable.has(c.fd), now);
            } else {
                this.removeConnection(c);
            }
        }

        const usage = this.memoryUsage();
        if (!this.stopping && this.reclamation.afterIteration(now, usage)) {
            this.reclamation.reclaim(now, usage);
        }
        this.gauges.set("memory-used", this.memoryUsage());
    }

    private fireTimers(now: number): void {
        const due = this.timers
            .filter(t => t.active() && t.deadline() <= now)
            .sort((a, b) => a.deadline() - b.deadline());
        for (const timer of due) {
            if (!this.timers.includes(timer)) continue;
            try {
                timer.execute();
            } catch (error) {
                Logger.error(`Timer failed: ${describeError(error)}`, { facility: "reactor" });
            }
        }
    }

    /**
     * Delivers what the wait reported to c: r means readable, w writable.
     * Whatever c throws is contained here and costs c its life, nothing more.
     */
    dispatch(c: Connection, r: boolean, w: boolean, now: number): void {
        try {
            if (c.timeout() !== 0 && now >= c.timeout()) {
                c.setTimeoutAt(0);
                c.react("timeout");
                w = true;
            }

            if (c.state() === "connecting") {
                let connected = false;
                let failed = false;
                if ((w && !r) || c.stream.isPending("connect")) {
                    connected = true;
                } else if (c.stream.isPending("error")) {
                    failed = true;
                } else if (w && r) {
                    connected = true;
                }

                if (connected) {
                    c.setState("connected");
                    c.react("connect");
                    w = true;
                } else if (failed) {
                    c.react("error");
                    c.setState("closing");
                    w = r = false;
                }
            }

            if (r && c.state() === "connected") {
                c.read();
                c.react("read");
                if (!c.canRead()) {
                    c.setState("closing");
                    c.react("close");
                }
                w = true;
            }

            const state = c.state();
            if ((w || c.canWrite()) && (state === "connected" || state === "closing")) {
                c.write();
                if (c.writeError() && c.setState("closing")) {
                    c.react("close");
                }
            }
        } catch (error) {
            Logger.error(`${describeError(error)} while processing ${c.description()}`, { facility: "reactor" });
            c.close();
        }

        if (c.state() === "closing" && !c.canWrite()) {
            c.close();
        }
        if (!c.valid()) {
            this.removeConnection(c);
        }
    }

    private removeBadConnections(): void {
        for (const c of [...this.list]) {
            if (c.stream.valid()) continue;
            if (c.state() !== "closing") {
                Logger.error(`Descriptor ${c.fd} was unexpectedly closed, removing ${c.description()}`, {
                    facility: "reactor",
                });
            }
            this.removeConnection(c);
        }
    }

    private shutdown(): void {
        Logger.debug("Shutting down reactor", { facility: "reactor" });
        for (const c of [...this.list]) {
            try {
                if (c.state() === "connected") c.react("shutdown");
                if (c.state() === "connected" || c.state() === "closing") c.write();
            } catch (error) {
                Logger.error(`${describeError(error)} while shutting down ${c.description()}`, {
                    facility: "reactor",
                });
            }
        }
        for (const c of [...this.list]) {
            try {
                c.close();
            } catch (error) {
                Logger.error(`${describeError(error)} while closing ${c.description()}`, { facility: "reactor" });
            }
            this.list.splice(this.list.indexOf(c), 1);
            c.setWaker(undefined);
        }
        this.setConnectionCounts();
    }

    /** Closes every connection except a and b. */
    closeAllExcept(a?: Connection, b?: Connection): void {
        for (const c of [...this.list]) {
            if (c === a || c === b) continue;
            this.removeConnection(c);
            c.close();
        }
    }

    closeAllExceptListeners(): void {
        for (const c of [...this.list]) {
            if (c.role === "listener") continue;
            this.removeConnection(c);
            c.close();
        }
    }

    flushAll(): void {
        for (const c of this.list) {
            c.write();
        }
    }

    private setConnectionCounts(): void {
        if (!this.list.some(c => c.role === "listener")) return;
        for (const [role, gauge] of COUNTED_ROLES) {
            this.gauges.set(gauge, this.list.filter(c => c.role === role).length);
        }
    }
}
