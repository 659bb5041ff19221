import type { QueryExecutor, QueryResult, Row } from "@mailstore/shared/executor/interface.js";
import { QueryError } from "../errors.js";
import { Logger, describeError } from "../logger.js";
import type { Continuation } from "../reactor/continuation.js";

export type QueryState = "inactive" | "submitted" | "completed" | "failed";

export type QueryObserver = (query: Query) => void;

/**
 * One parameterized statement. Running a Query never throws at its caller:
 * it ends up completed or failed, and its owner is resumed exactly once when that
 * happens. Rows are consumed with hasResults()/nextRow().
 */
export class Query {
    private text: string;
    private params: unknown[] = [];
    private status: QueryState = "inactive";
    private result: Row[] = [];
    private cursor = 0;
    private affected = 0;
    private failure = "";
    private canFail = false;
    private notified = false;

    constructor(text: string, private owner?: Continuation) {
        this.text = text;
    }

    string(): string {
        return this.text;
    }

    setString(text: string): void {
        this.text = text;
    }

    /** Binds value to the placeholder $n. */
    bind(n: number, value: unknown): this {
        if (!Number.isInteger(n) || n < 1) {
            throw new QueryError(`Placeholder index must be a positive integer, got ${n}`);
        }
        while (this.params.length < n) this.params.push(null);
        this.params[n - 1] = value;
        return this;
    }

    parameters(): readonly unknown[] {
        return this.params;
    }

    setOwner(owner: Continuation | undefined): void {
        this.owner = owner;
    }

    /** A failure of this query does not fail the Transaction it runs in. */
    allowFailure(): this {
        this.canFail = true;
        return this;
    }

    allowsFailure(): boolean {
        return this.canFail;
    }

    state(): QueryState {
        return this.status;
    }

    done(): boolean {
        return this.status === "completed" || this.status === "failed";
    }

    failed(): boolean {
        return this.status === "failed";
    }

    error(): string {
        return this.failure;
    }

    hasResults(): boolean {
        return this.cursor < this.result.length;
    }

    nextRow(): Row | undefined {
        if (this.cursor >= this.result.length) return undefined;
        const row = this.result[this.cursor];
        this.cursor += 1;
        return row;
    }

    /** Every row returned, consumed or not. */
    rows(): readonly Row[] {
        return this.result;
    }

    rowCount(): number {
        return this.affected;
    }

    /**
     * Sends the statement. The observer, if any, sees the finished query
     * before its owner is resumed. The returned promise never rejects.
     */
    submit(executor: QueryExecutor, observer?: QueryObserver): Promise<void> {
        if (this.status !== "inactive") return Promise.resolve();
        this.status = "submitted";
        return executor.execute(this.text, this.params).then(
            (result) => this.finish(observer, result),
            (error: unknown) => this.finish(observer, undefined, describeError(error)),
        );
    }

    /** Fails the query without sending it. */
    reject(message: string, observer?: QueryObserver): void {
        if (this.done()) return;
        this.finish(observer, undefined, message);
    }

    private finish(observer: QueryObserver | undefined, result?: QueryResult, error?: string): void {
        if (result) {
            this.result = result.rows;
            this.affected = result.rowCount ?? result.rows.length;
            this.status = "completed";
        } else {
            this.failure = error ?? "Unknown error";
            this.status = "failed";
            const context = { facility: "database", query: this.text };
            if (this.canFail) {
                Logger.debug(`Query failed: ${this.failure}`, context);
            } else {
                Logger.error(`Query failed: ${this.failure}`, context);
            }
        }
        if (observer) {
            try {
                observer(this);
            } catch (caught) {
                Logger.error(`Query observer failed: ${describeError(caught)}`, { facility: "database" });
            }
        }
        this.notify();
    }

    private notify(): void {
        if (this.notified || !this.owner) return;
        this.notified = true;
        try {
            this.owner.resume();
        } catch (error) {
            Logger.error(`Query owner failed: ${describeError(error)}`, {
                facility: "database",
                query: this.text,
            });
        }
    }
}
