import { Connection } from "./connection.js";
import type { ConnectionEvent } from "./connection.js";
import { SocketStream } from "./socket.js";
import type { ListenerStream } from "./socket.js";
import type { Reactor } from "./reactor.js";

export type ConnectionFactory = (stream: SocketStream) => Connection;

/**
 * Accepts connections and hands each accepted socket to a factory that
 * builds the protocol Connection, which then joins the same Reactor.
 */
export class Listener extends Connection {
    private accepted = 0;

    constructor(
        private readonly reactor: Reactor,
        private readonly listening: ListenerStream,
        private readonly factory: ConnectionFactory,
        description?: string,
    ) {
        super(listening, {
            role: "listener",
            state: "connected",
            description: description ?? `listener on fd ${listening.fd}`,
        });
    }

    override read(): void {
        for (const socket of this.listening.accept()) {
            this.accepted += 1;
            this.reactor.addConnection(this.factory(new SocketStream(socket, { connected: true })));
        }
    }

    react(event: ConnectionEvent): void {
        if (event === "shutdown") {
            this.listening.close();
        }
    }

    acceptedCount(): number {
        return this.accepted;
    }
}
