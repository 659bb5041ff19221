import type { QueryExecutor } from "@mailstore/shared/executor/interface.js";
import { Logger, describeError } from "../logger.js";
import type { Query } from "./query.js";

/**
 * Entry point to the storage backend. Standalone queries run on the pool;
 * Transactions ask for a dedicated session. Every promise started on the
 * backend's behalf is tracked so idle() can tell when all work settled.
 */
export class Database {
    private inFlight = new Set<Promise<void>>();

    constructor(readonly executor: QueryExecutor) { }

    execute(query: Query): void {
        this.track(query.submit(this.executor));
    }

    track(work: Promise<void>): void {
        const tracked = work.then(
            () => { this.inFlight.delete(tracked); },
            (error: unknown) => {
                this.inFlight.delete(tracked);
                Logger.error(`Database work failed: ${describeError(error)}`, { facility: "database" });
            },
        );
        this.inFlight.add(tracked);
    }

    pending(): number {
        return this.inFlight.size;
    }

    /** Resolves once nothing started through this Database is outstanding. */
    async idle(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all([...this.inFlight]);
        }
    }

    async disconnect(): Promise<void> {
        await this.idle();
        await this.executor.disconnect();
    }
}
