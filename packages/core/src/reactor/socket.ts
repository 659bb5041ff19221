import net from "node:net";
import { ConnectionError } from "../errors.js";
import { nextDescriptor } from "./stream.js";
import type { PendingEvent, Readiness, Stream } from "./stream.js";

/** Wake-up bookkeeping shared by the socket-backed streams. */
class Waiters {
    private listeners = new Set<() => void>();

    subscribe(wake: () => void): () => void {
        this.listeners.add(wake);
        return () => this.listeners.delete(wake);
    }

    wake(): void {
        for (const listener of [...this.listeners]) listener();
    }
}

/** A net.Socket seen through the Stream boundary. */
export class SocketStream implements Stream {
    readonly fd = nextDescriptor();
    private chunks: Buffer[] = [];
    private ended = false;
    private connected: boolean;
    private closedByUs = false;
    private failure: Error | undefined;
    private readonly waiters = new Waiters();

    constructor(private readonly socket: net.Socket, options: { connected: boolean }) {
        this.connected = options.connected;
        socket.on("data", (chunk: Buffer) => {
            this.chunks.push(chunk);
            this.waiters.wake();
        });
        socket.on("end", () => {
            this.ended = true;
            this.waiters.wake();
        });
        socket.on("connect", () => {
            this.connected = true;
            this.waiters.wake();
        });
        socket.on("error", (error: Error) => {
            this.failure = error;
            this.ended = true;
            this.waiters.wake();
        });
        socket.on("drain", () => this.waiters.wake());
        socket.on("close", () => {
            this.ended = true;
            this.waiters.wake();
        });
    }

    canRead(): boolean {
        return !this.ended || this.chunks.length > 0;
    }

    canWrite(): boolean {
        return this.connected && !this.socket.destroyed && this.socket.writable;
    }

    read(): Buffer | undefined {
        if (this.chunks.length === 0) return undefined;
        const data = Buffer.concat(this.chunks);
        this.chunks = [];
        return data;
    }

    /**
     * The socket buffers whatever the kernel does not take at once, so a
     * write is either accepted whole or, while that buffer waits for drain,
     * not at all.
     */
    write(data: Buffer): number {
        if (!this.canWrite()) {
            throw new ConnectionError(`Cannot write to fd ${this.fd}`, this.failure);
        }
        if (this.socket.writableNeedDrain) return 0;
        this.socket.write(data);
        return data.length;
    }

    close(): void {
        this.closedByUs = true;
        this.socket.end();
        this.socket.destroySoon();
    }

    isPending(event: PendingEvent): boolean {
        if (event === "connect") return this.connected;
        return this.failure !== undefined;
    }

    valid(): boolean {
        // A destroyed socket is still valid while its end or error has not
        // been seen by the Reactor yet.
        return !this.socket.destroyed || this.closedByUs || this.ended || this.failure !== undefined;
    }

    readiness(): Readiness {
        return {
            readable: this.chunks.length > 0 || this.ended,
            writable: this.canWrite() && !this.socket.writableNeedDrain,
        };
    }

    subscribe(wake: () => void): () => void {
        return this.waiters.subscribe(wake);
    }

    remoteAddress(): string {
        return `${this.socket.remoteAddress ?? "unknown"}:${this.socket.remotePort ?? 0}`;
    }
}

/** A listening net.Server; readable whenever accepted sockets are queued. */
export class ListenerStream implements Stream {
    readonly fd = nextDescriptor();
    private accepted: net.Socket[] = [];
    private open = true;
    private failure: Error | undefined;
    private readonly waiters = new Waiters();

    constructor(private readonly server: net.Server) {
        server.on("connection", (socket: net.Socket) => {
            this.accepted.push(socket);
            this.waiters.wake();
        });
        server.on("error", (error: Error) => {
            this.failure = error;
            this.waiters.wake();
        });
    }

    canRead(): boolean {
        return this.open;
    }

    canWrite(): boolean {
        return false;
    }

    read(): Buffer | undefined {
        return undefined;
    }

    write(_data: Buffer): number {
        throw new ConnectionError(`Listener on fd ${this.fd} cannot be written to`);
    }

    /** Returns and forgets the sockets accepted since the last call. */
    accept(): net.Socket[] {
        const sockets = this.accepted;
        this.accepted = [];
        return sockets;
    }

    close(): void {
        if (!this.open) return;
        this.open = false;
        this.server.close();
    }

    isPending(event: PendingEvent): boolean {
        return event === "error" && this.failure !== undefined;
    }

    valid(): boolean {
        return true;
    }

    readiness(): Readiness {
        return { readable: this.accepted.length > 0, writable: false };
    }

    subscribe(wake: () => void): () => void {
        return this.waiters.subscribe(wake);
    }

    address(): net.AddressInfo | undefined {
        const address = this.server.address();
        return address !== null && typeof address === "object" ? address : undefined;
    }
}

export function listenOn(port: number, host = "127.0.0.1"): Promise<ListenerStream> {
    return new Promise((resolve, reject) => {
        const server = net.createServer();
        const stream = new ListenerStream(server);
        server.once("error", reject);
        server.listen(port, host, () => {
            server.off("error", reject);
            resolve(stream);
        });
    });
}

/** Starts connecting; the returned stream belongs in a connecting Connection. */
export function connectTo(host: string, port: number): SocketStream {
    const socket = net.connect({ host, port });
    return new SocketStream(socket, { connected: false });
}
