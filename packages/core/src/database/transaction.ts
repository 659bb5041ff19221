import type { QueryExecutor } from "@mailstore/shared/executor/interface.js";
import { sanitizeIdentifier } from "@mailstore/shared/security/identifiers.js";
import { TransactionError } from "../errors.js";
import { Logger, describeError } from "../logger.js";
import type { Continuation } from "../reactor/continuation.js";
import type { Database } from "./database.js";
import { Query } from "./query.js";

function savepointName(name: string): string {
    try {
        return sanitizeIdentifier(name);
    } catch (error) {
        throw new TransactionError(`Cannot use savepoint ${JSON.stringify(name)}: ${describeError(error)}`, error);
    }
}

export type TransactionState = "inactive" | "executing" | "failed" | "completed" | "rolledBack";

type EntryKind = "plain" | "restore" | "finish";

interface Entry {
    query: Query;
    seq: number;
    kind: EntryKind;
    savepoint?: string;
}

interface Failure {
    query: Query | undefined;
    message: string;
    seq: number;
}

/**
 * An ordered group of queries committed or rolled back together on one
 * dedicated session. Queries are pipelined: execute() sends everything
 * enqueued so far without waiting for earlier results, and each query
 * resumes its own owner as soon as it finishes.
 *
 * Once a query fails (and was not allowed to), later queries are failed
 * without being sent, unless a rollback to a savepoint was queued ahead of
 * them. If that rollback succeeds and the failure happened after the
 * savepoint was taken, the transaction is healthy again.
 */
export class Transaction {
    private queue: Entry[] = [];
    private session: QueryExecutor | undefined;
    private opening = false;
    private unusable = false;
    private status: TransactionState = "inactive";
    private failure: Failure | undefined;
    private finished = false;
    private finishing = false;
    private recovering = false;
    private counter = 0;
    private savepoints = new Map<string, number>();

    constructor(private readonly db: Database, private owner?: Continuation) { }

    setOwner(owner: Continuation | undefined): void {
        this.owner = owner;
    }

    state(): TransactionState {
        return this.status;
    }

    done(): boolean {
        return this.finished;
    }

    failed(): boolean {
        return this.failure !== undefined;
    }

    error(): string {
        return this.failure?.message ?? "";
    }

    failedQuery(): Query | undefined {
        return this.failure?.query;
    }

    /** Adds a query (or a statement without parameters) to the end of the queue. */
    enqueue(query: Query | string): Query {
        const q = typeof query === "string" ? new Query(query) : query;
        this.push(q, "plain");
        return q;
    }

    savepoint(name: string): Query {
        const safe = savepointName(name);
        const entry = this.push(new Query(`savepoint ${safe}`), "plain");
        this.savepoints.set(safe, entry.seq);
        return entry.query;
    }

    rollbackTo(name: string): Query {
        const safe = savepointName(name);
        const entry = this.push(new Query(`rollback to savepoint ${safe}`), "restore");
        entry.savepoint = safe;
        return entry.query;
    }

    release(name: string): Query {
        const safe = savepointName(name);
        this.savepoints.delete(safe);
        return this.push(new Query(`release savepoint ${safe}`), "plain").query;
    }

    /** Sends everything enqueued so far. */
    execute(): void {
        if (this.session) {
            this.pump();
            return;
        }
        if (this.opening || this.finished) return;
        this.opening = true;
        this.status = "executing";
        this.db.track(this.open());
    }

    commit(): void {
        this.finish("commit");
    }

    rollback(): void {
        this.finish("rollback");
    }

    /** Resumes the owner, for helpers that share this transaction with it. */
    notify(): void {
        if (!this.owner) return;
        try {
            this.owner.resume();
        } catch (error) {
            Logger.error(`Transaction owner failed: ${describeError(error)}`, { facility: "database" });
        }
    }

    private finish(how: "commit" | "rollback"): void {
        if (this.finishing) return;
        this.finishing = true;
        this.push(new Query(how), "finish");
        this.execute();
    }

    private push(query: Query, kind: EntryKind): Entry {
        this.counter += 1;
        const entry: Entry = { query, seq: this.counter, kind };
        if (this.finished) {
            this.rejectLater(entry, "Transaction has already finished");
            return entry;
        }
        if (this.unusable) {
            this.rejectLater(entry, `Transaction failed: ${this.error()}`);
            return entry;
        }
        this.queue.push(entry);
        return entry;
    }

    private async open(): Promise<void> {
        let session: QueryExecutor;
        try {
            session = await this.db.executor.createSession();
        } catch (error) {
            this.failure = { query: undefined, message: describeError(error), seq: 0 };
            this.status = "failed";
            this.unusable = true;
            Logger.error(`Could not start transaction: ${this.failure.message}`, { facility: "database" });
            for (const entry of this.queue.splice(0)) {
                this.rejectLater(entry, `Transaction failed: ${this.failure.message}`);
            }
            return;
        }
        this.session = session;
        this.queue.unshift({ query: new Query("begin"), seq: 0, kind: "plain" });
        this.pump();
    }

    private pump(): void {
        const session = this.session;
        if (!session) return;
        let entry = this.queue.shift();
        while (entry) {
            if (entry.kind === "restore") {
                this.recovering = true;
            } else if (entry.kind === "finish") {
                if (this.failure && !this.recovering) entry.query.setString("rollback");
            } else if (this.failure && !this.recovering) {
                this.rejectLater(entry, `Transaction failed: ${this.failure.message}`);
                entry = this.queue.shift();
                continue;
            }
            const current = entry;
            this.db.track(current.query.submit(session, () => this.observe(current)));
            entry = this.queue.shift();
        }
    }

    private rejectLater(entry: Entry, message: string): void {
        this.db.track(Promise.resolve().then(() => {
            entry.query.reject(message, () => this.observe(entry));
        }));
    }

    private observe(entry: Entry): void {
        if (this.finished) return;
        const q = entry.query;
        if (entry.kind === "restore") {
            this.recovering = false;
            const taken = entry.savepoint === undefined ? undefined : this.savepoints.get(entry.savepoint);
            if (!q.failed() && this.failure && taken !== undefined && this.failure.seq > taken) {
                Logger.debug(`Rolled back to savepoint ${entry.savepoint}`, { facility: "database" });
                this.failure = undefined;
                if (this.status === "failed") this.status = "executing";
            }
            return;
        }

        if (entry.kind === "finish") {
            if (q.failed() && !this.failure) {
                this.failure = { query: q, message: q.error(), seq: entry.seq };
            }
            if (this.failure) {
                this.status = "failed";
            } else {
                this.status = q.string() === "rollback" ? "rolledBack" : "completed";
            }
            this.finished = true;
            this.releaseSession();
            this.notify();
            return;
        }

        if (q.failed() && !q.allowsFailure() && !this.failure) {
            this.failure = { query: q, message: q.error(), seq: entry.seq };
            this.status = "failed";
        }
    }

    private releaseSession(): void {
        const session = this.session;
        this.session = undefined;
        if (!session) return;
        const destroy = this.status === "failed";
        this.db.track(session.disconnect(destroy).catch((error: unknown) => {
            Logger.error(`Could not release session: ${describeError(error)}`, { facility: "database" });
        }));
    }
}
