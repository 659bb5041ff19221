export type Row = Record<string, unknown>;

export interface QueryResult {
    rows: Row[];
    rowCount?: number;
    fields?: { name: string; dataTypeID: number }[];
}

/**
 * The storage boundary. Statement text is opaque here; callers bind
 * parameters positionally ($1, $2, ...).
 *
 * A session returned by createSession() is bound to one backend connection
 * and runs statements in the order they were submitted, even when the caller
 * submits the next one before the previous promise settles. Transactions
 * rely on that ordering to pipeline their queries.
 */
export interface QueryExecutor {
    execute(sql: string, params?: unknown[]): Promise<QueryResult>;
    disconnect(destroy?: boolean): Promise<void>;

    /**
     * Returns an executor bound to a single dedicated connection. A session
     * calling createSession() returns itself.
     */
    createSession(): Promise<QueryExecutor>;
}
