import net from "node:net";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "../../src/logger.js";
import { Connection } from "../../src/reactor/connection.js";
import type { ConnectionEvent } from "../../src/reactor/connection.js";
import { continuation } from "../../src/reactor/continuation.js";
import { Listener } from "../../src/reactor/listener.js";
import { NodeReadinessPoller } from "../../src/reactor/poller.js";
import { Reactor } from "../../src/reactor/reactor.js";
import { SocketStream, connectTo, listenOn } from "../../src/reactor/socket.js";
import { Timer } from "../../src/reactor/timer.js";
import { FakeStream } from "../helpers/fake-stream.js";
import { captureLogs } from "../helpers/log-capture.js";
import { RecordingConnection } from "../helpers/recording-connection.js";

const pause = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Answers every line it reads with the same line, prefixed. */
class EchoConnection extends Connection {
    react(event: ConnectionEvent): void {
        if (event !== "read") return;
        const input = this.takeInput().toString();
        if (input.length > 0) this.enqueue(`echo ${input}`);
    }
}

/** Says hello once connected and keeps what comes back. */
class GreetingConnection extends Connection {
    received = "";

    react(event: ConnectionEvent): void {
        if (event === "connect") this.enqueue("hello\r\n");
        if (event === "read") this.received += this.takeInput().toString();
    }
}

describe("Reactor on Node's event loop", () => {
    let reactor: Reactor;

    beforeEach(() => {
        captureLogs();
        reactor = new Reactor({ poller: new NodeReadinessPoller(), memoryUsage: () => 0 });
    });

    afterEach(() => {
        Logger.setSink(undefined);
    });

    it("should send output queued during a wait without sitting out the wait", async () => {
        const c = new RecordingConnection(new FakeStream());
        reactor.addConnection(c);
        const running = reactor.start();
        await pause(10);

        c.enqueue("* OK done\r\n");
        await vi.waitFor(() => expect(c.fake.output()).toBe("* OK done\r\n"), { timeout: 1000 });

        reactor.stop();
        await running;
        expect(c.fake.closed).toBe(true);
    });

    it("should stop promptly while waiting", async () => {
        reactor.addConnection(new RecordingConnection(new FakeStream()));
        const running = reactor.start();
        await pause(10);

        const asked = Date.now();
        reactor.stop();
        await running;

        expect(Date.now() - asked).toBeLessThan(1000);
    });

    it("should fire a timer armed during a wait", async () => {
        const fired: string[] = [];
        const running = reactor.start();
        await pause(10);

        new Timer(reactor, continuation(() => {
            fired.push("tick");
            reactor.stop();
        }), 20);
        await running;

        expect(fired).toEqual(["tick"]);
    });

    it("should accept, read, answer and close a loopback connection", async () => {
        const listening = await listenOn(0);
        const port = listening.address()?.port ?? 0;
        const served: EchoConnection[] = [];
        const listener = new Listener(reactor, listening, (stream) => {
            const c = new EchoConnection(stream, { role: "imap" });
            served.push(c);
            return c;
        });
        const peer = new GreetingConnection(connectTo("127.0.0.1", port), { role: "other", state: "connecting" });
        reactor.addConnection(listener);
        reactor.addConnection(peer);
        const running = reactor.start();

        await vi.waitFor(() => expect(peer.received).toBe("echo hello\r\n"), { timeout: 2000 });
        reactor.stop();
        await running;

        expect(listener.acceptedCount()).toBe(1);
        expect(served).toHaveLength(1);
        expect(served[0]?.state()).toBe("detached");
        expect(peer.stateHistory()).toEqual(["connecting", "connected", "detached"]);
        expect(reactor.connections()).toEqual([]);
    });
});

describe("SocketStream", () => {
    it("should take nothing while the socket waits for drain", () => {
        const socket = new net.Socket();
        Object.defineProperty(socket, "writable", { value: true });
        Object.defineProperty(socket, "writableNeedDrain", { value: true });
        const stream = new SocketStream(socket, { connected: true });

        expect(stream.write(Buffer.from("* OK\r\n"))).toBe(0);
        expect(stream.readiness().writable).toBe(false);
    });
});
