export type PendingEvent = "connect" | "error";

export interface Readiness {
    readable: boolean;
    writable: boolean;
}

/**
 * A duplex byte stream as the Reactor sees it. read() and write() never
 * block: read() returns whatever arrived since the last call, and write()
 * accepts bytes for sending or throws.
 */
export interface Stream {
    readonly fd: number;
    /** False once the peer has finished sending and everything was read. */
    canRead(): boolean;
    canWrite(): boolean;
    read(): Buffer | undefined;
    write(data: Buffer): number;
    close(): void;
    isPending(event: PendingEvent): boolean;
    /** False when the underlying handle vanished without an event. */
    valid(): boolean;
    readiness(): Readiness;
    /** Registers a wake-up callback; returns the function that removes it. */
    subscribe(wake: () => void): () => void;
}

let descriptors = 0;

export function nextDescriptor(): number {
    descriptors += 1;
    return descriptors;
}
