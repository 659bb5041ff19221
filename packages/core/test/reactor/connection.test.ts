import { describe, expect, it, vi } from "vitest";
import { ManualClock } from "../helpers/fake-poller.js";
import { FakeStream } from "../helpers/fake-stream.js";
import { RecordingConnection } from "../helpers/recording-connection.js";

describe("Connection", () => {
    describe("state machine", () => {
        it("should start connected unless told otherwise", () => {
            const c = new RecordingConnection(new FakeStream());
            const pending = new RecordingConnection(new FakeStream(), { state: "connecting" });

            expect(c.state()).toBe("connected");
            expect(pending.state()).toBe("connecting");
        });

        it("should only move forward", () => {
            const c = new RecordingConnection(new FakeStream(), { state: "connecting" });

            expect(c.setState("closing")).toBe(true);
            expect(c.setState("connected")).toBe(false);
            expect(c.setState("closing")).toBe(false);
            expect(c.state()).toBe("closing");
            expect(c.stateHistory()).toEqual(["connecting", "closing"]);
        });

        it("should close the stream once and end detached", () => {
            const stream = new FakeStream();
            const close = vi.spyOn(stream, "close");
            const c = new RecordingConnection(stream);

            c.close();
            c.close();

            expect(close).toHaveBeenCalledTimes(1);
            expect(c.state()).toBe("detached");
            expect(c.valid()).toBe(false);
        });

        it("should be inactive but still valid when its stream vanished", () => {
            const stream = new FakeStream();
            const c = new RecordingConnection(stream);
            stream.broken = true;

            expect(c.active()).toBe(false);
            expect(c.valid()).toBe(true);
        });
    });

    describe("buffers", () => {
        it("should accumulate reads until the input is taken", () => {
            const stream = new FakeStream();
            const c = new RecordingConnection(stream);

            stream.push("ab");
            c.read();
            stream.push("cd");
            c.read();

            expect(c.readBufferSize()).toBe(4);
            expect(c.takeInput().toString()).toBe("abcd");
            expect(c.readBufferSize()).toBe(0);
        });

        it("should keep what a partial write left behind", () => {
            const stream = new FakeStream();
            stream.writeLimit = 2;
            const c = new RecordingConnection(stream);

            c.enqueue("hello");
            c.write();
            expect(stream.output()).toBe("he");
            expect(c.canWrite()).toBe(true);

            c.write();
            c.write();
            expect(stream.output()).toBe("hello");
            expect(c.canWrite()).toBe(false);
        });

        it("should drop pending output and stop writing after a failed write", () => {
            const stream = new FakeStream();
            stream.failWrites = true;
            const c = new RecordingConnection(stream);

            c.enqueue("* OK\r\n");
            c.write();
            stream.failWrites = false;
            c.enqueue("more");
            c.write();

            expect(c.writeError()?.message).toBe("write EPIPE");
            expect(stream.written).toEqual([]);
        });
    });

    describe("timeouts", () => {
        it("should compute deadlines from its clock", () => {
            const clock = new ManualClock(1000);
            const c = new RecordingConnection(new FakeStream(), { clock: clock.now });

            expect(c.timeout()).toBe(0);
            c.setTimeoutAfter(500);
            expect(c.timeout()).toBe(1500);
            c.setTimeoutAt(0);
            expect(c.timeout()).toBe(0);
        });
    });

    it("should describe itself by role and descriptor", () => {
        const stream = new FakeStream();
        const c = new RecordingConnection(stream, { role: "pop3" });

        expect(c.description()).toBe(`pop3 connection on fd ${stream.fd}`);
        expect(c.fd).toBe(stream.fd);
    });
});
