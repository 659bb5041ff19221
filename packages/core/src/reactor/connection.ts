import type { Stream } from "./stream.js";
import { Logger, describeError } from "../logger.js";

export type ConnectionState = "connecting" | "connected" | "closing" | "detached";

export type ConnectionEvent = "connect" | "read" | "timeout" | "shutdown" | "close" | "error";

export type ConnectionRole =
    | "listener"
    | "imap"
    | "pop3"
    | "smtp"
    | "http"
    | "database"
    | "internal"
    | "other";

const ORDER: Record<ConnectionState, number> = {
    connecting: 0,
    connected: 1,
    closing: 2,
    detached: 3,
};

export interface ConnectionOptions {
    role: ConnectionRole;
    state?: "connecting" | "connected";
    clock?: () => number;
    description?: string;
}

/**
 * A participant in the Reactor. Subclasses implement react(); the Reactor
 * decides when to read, write and which event to deliver.
 *
 * The state only moves forward: connecting, connected, closing, detached.
 * Steps may be skipped (a failed connect goes straight to closing) but a
 * state is never re-entered.
 */
export abstract class Connection {
    readonly role: ConnectionRole;
    private current: ConnectionState;
    private readonly history: ConnectionState[];
    private readonly clock: () => number;
    private readonly label: string;
    private readChunks: Buffer[] = [];
    private pendingWrite: Buffer = Buffer.alloc(0);
    private writeFailure: Error | undefined;
    private deadline = 0;
    private waker: (() => void) | undefined;

    constructor(readonly stream: Stream, options: ConnectionOptions) {
        this.role = options.role;
        this.current = options.state ?? "connected";
        this.history = [this.current];
        this.clock = options.clock ?? Date.now;
        this.label = options.description ?? `${options.role} connection on fd ${stream.fd}`;
    }

    abstract react(event: ConnectionEvent): void;

    get fd(): number {
        return this.stream.fd;
    }

    state(): ConnectionState {
        return this.current;
    }

    stateHistory(): readonly ConnectionState[] {
        return this.history;
    }

    /** Returns false (and changes nothing) for a backward or repeated move. */
    setState(next: ConnectionState): boolean {
        if (ORDER[next] <= ORDER[this.current]) return false;
        this.current = next;
        this.history.push(next);
        return true;
    }

    description(): string {
        return this.label;
    }

    active(): boolean {
        return this.current !== "detached" && this.stream.valid();
    }

    valid(): boolean {
        return this.current !== "detached";
    }

    canRead(): boolean {
        return this.stream.canRead();
    }

    canWrite(): boolean {
        return this.pendingWrite.length > 0;
    }

    /** Moves everything the stream has into the read buffer. */
    read(): void {
        const data = this.stream.read();
        if (data && data.length > 0) {
            this.readChunks.push(data);
        }
    }

    /** Returns and clears the bytes read so far. */
    takeInput(): Buffer {
        const input = Buffer.concat(this.readChunks);
        this.readChunks = [];
        return input;
    }

    readBufferSize(): number {
        return this.readChunks.reduce((sum, chunk) => sum + chunk.length, 0);
    }

    enqueue(data: Buffer | string): void {
        const bytes = typeof data === "string" ? Buffer.from(data) : data;
        this.pendingWrite = Buffer.concat([this.pendingWrite, bytes]);
        if (this.waker) this.waker();
    }

    /** Set by the Reactor serving this connection, so that enqueue() ends its wait. */
    setWaker(waker: (() => void) | undefined): void {
        this.waker = waker;
    }

    write(): void {
        if (this.pendingWrite.length === 0 || this.writeFailure) return;
        try {
            const written = this.stream.write(this.pendingWrite);
            this.pendingWrite = this.pendingWrite.subarray(written);
        } catch (error) {
            this.writeFailure = error instanceof Error ? error : new Error(describeError(error));
            this.pendingWrite = Buffer.alloc(0);
            Logger.debug(`Write failed on ${this.label}`, {
                facility: "connection",
                error: this.writeFailure.message,
            });
        }
    }

    writeError(): Error | undefined {
        return this.writeFailure;
    }

    /** The absolute deadline in milliseconds, or 0 when there is none. */
    timeout(): number {
        return this.deadline;
    }

    setTimeoutAt(deadline: number): void {
        this.deadline = deadline;
    }

    setTimeoutAfter(delayMs: number): void {
        this.deadline = this.clock() + delayMs;
    }

    close(): void {
        if (this.current === "detached") return;
        try {
            this.stream.close();
        } finally {
            this.setState("detached");
        }
    }
}
