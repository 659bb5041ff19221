import { WaitError } from "../errors.js";
import type { Stream } from "./stream.js";

export interface Interest {
    fd: number;
    stream: Stream;
    read: boolean;
    write: boolean;
}

export interface ReadySet {
    readable: Set<number>;
    writable: Set<number>;
}

export function emptyReadySet(): ReadySet {
    return { readable: new Set(), writable: new Set() };
}

/**
 * The readiness primitive. wait() settles when at least one interest is
 * ready or the timeout passes, whichever comes first. It rejects with a
 * WaitError: EINTR when the wait was interrupted, EBADF when one of the
 * streams is no longer valid, anything else when waiting is impossible.
 */
export interface ReadinessPoller {
    wait(interest: Interest[], timeoutMs: number): Promise<ReadySet>;
    /** Ends the wait in progress early, if there is one. */
    wake(): void;
}

function collect(interest: Interest[]): ReadySet {
    const ready = emptyReadySet();
    for (const i of interest) {
        const r = i.stream.readiness();
        if (i.read && r.readable) ready.readable.add(i.fd);
        if (i.write && r.writable) ready.writable.add(i.fd);
    }
    return ready;
}

function isEmpty(ready: ReadySet): boolean {
    return ready.readable.size === 0 && ready.writable.size === 0;
}

/**
 * Waits on Node's own event loop. Streams report readiness through their
 * subscribe() callbacks; the poller always yields once with setImmediate so
 * that pending socket I/O is taken in before it reports.
 */
export class NodeReadinessPoller implements ReadinessPoller {
    private interrupt: (() => void) | undefined;

    wake(): void {
        if (this.interrupt) this.interrupt();
    }

    wait(interest: Interest[], timeoutMs: number): Promise<ReadySet> {
        const bad = interest.find(i => !i.stream.valid());
        if (bad) {
            return Promise.reject(new WaitError(`Descriptor ${bad.fd} is no longer valid`, "EBADF"));
        }

        return new Promise<ReadySet>((resolve) => {
            const unsubscribe: Array<() => void> = [];
            let settled = false;
            let timer: NodeJS.Timeout | undefined;
            let immediate: NodeJS.Immediate | undefined;

            const finish = () => {
                if (settled) return;
                settled = true;
                if (this.interrupt === finish) this.interrupt = undefined;
                if (timer) clearTimeout(timer);
                if (immediate) clearImmediate(immediate);
                for (const off of unsubscribe) off();
                resolve(collect(interest));
            };
            const check = () => {
                if (!isEmpty(collect(interest))) finish();
            };

            for (const i of interest) {
                unsubscribe.push(i.stream.subscribe(check));
            }
            this.interrupt = finish;
            timer = setTimeout(finish, Math.max(0, timeoutMs));
            immediate = setImmediate(check);
        });
    }
}
