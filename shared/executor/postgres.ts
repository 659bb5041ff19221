import pg from "pg";
import type { QueryExecutor, QueryResult } from "./interface.js";

function toQueryResult(result: pg.QueryResult<Record<string, unknown>>): QueryResult {
    const queryResult: QueryResult = {
        rows: result.rows,
        fields: result.fields.map(f => ({ name: f.name, dataTypeID: f.dataTypeID })),
    };
    if (result.rowCount !== null && result.rowCount !== undefined) {
        queryResult.rowCount = result.rowCount;
    }
    return queryResult;
}

export class PostgresSessionExecutor implements QueryExecutor {
    constructor(private client: pg.PoolClient) { }

    /**
     * pg queues statements per client and sends them one after another, so
     * several calls made without awaiting still run in submission order.
     */
    async execute(sql: string, params?: unknown[]): Promise<QueryResult> {
        const result = await this.client.query<Record<string, unknown>>({
            text: sql,
            values: params ?? [],
        });
        return toQueryResult(result);
    }

    async disconnect(destroy = false): Promise<void> {
        // destroy removes the client from the pool instead of returning it
        // with an aborted transaction still open on it.
        this.client.release(destroy);
    }

    async createSession(): Promise<QueryExecutor> {
        return this;
    }
}

export class PostgresExecutor implements QueryExecutor {
    private pool: pg.Pool;

    constructor(config: pg.PoolConfig) {
        this.pool = new pg.Pool(config);
    }

    async execute(sql: string, params?: unknown[]): Promise<QueryResult> {
        const client = await this.pool.connect();
        const session = new PostgresSessionExecutor(client);
        try {
            return await session.execute(sql, params);
        } finally {
            await session.disconnect();
        }
    }

    async disconnect(_destroy?: boolean): Promise<void> {
        await this.pool.end();
    }

    async createSession(): Promise<QueryExecutor> {
        const client = await this.pool.connect();
        return new PostgresSessionExecutor(client);
    }
}
