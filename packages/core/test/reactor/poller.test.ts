import { describe, expect, it } from "vitest";
import { WaitError } from "../../src/errors.js";
import { NodeReadinessPoller } from "../../src/reactor/poller.js";
import type { Interest } from "../../src/reactor/poller.js";
import { FakeStream } from "../helpers/fake-stream.js";

function interest(stream: FakeStream, read = true, write = false): Interest {
    return { fd: stream.fd, stream, read, write };
}

describe("NodeReadinessPoller", () => {
    it("should report streams that are already ready", async () => {
        const readable = new FakeStream();
        readable.push("x");
        const idle = new FakeStream();
        const poller = new NodeReadinessPoller();

        const ready = await poller.wait([interest(readable), interest(idle, true, true)], 1000);

        expect([...ready.readable]).toEqual([readable.fd]);
        expect([...ready.writable]).toEqual([idle.fd]);
    });

    it("should wake up when a stream becomes readable", async () => {
        const stream = new FakeStream();
        const poller = new NodeReadinessPoller();

        const waiting = poller.wait([interest(stream)], 10_000);
        setTimeout(() => stream.push("late"), 5);
        const ready = await waiting;

        expect([...ready.readable]).toEqual([stream.fd]);
    });

    it("should settle empty when the timeout passes", async () => {
        const poller = new NodeReadinessPoller();

        const ready = await poller.wait([interest(new FakeStream())], 5);

        expect(ready.readable.size).toBe(0);
        expect(ready.writable.size).toBe(0);
    });

    it("should reject with EBADF for a stream that is no longer valid", async () => {
        const stream = new FakeStream();
        stream.broken = true;
        const poller = new NodeReadinessPoller();

        const failure = await poller.wait([interest(stream)], 1000).catch((error: unknown) => error);

        expect(failure).toBeInstanceOf(WaitError);
        expect(failure instanceof WaitError ? failure.waitCode : undefined).toBe("EBADF");
    });
});
