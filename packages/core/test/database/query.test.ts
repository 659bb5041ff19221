import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Database } from "../../src/database/database.js";
import { Query } from "../../src/database/query.js";
import { QueryError } from "../../src/errors.js";
import { Logger } from "../../src/logger.js";
import type { LogEntry } from "../../src/logger.js";
import { continuation } from "../../src/reactor/continuation.js";
import { captureLogs } from "../helpers/log-capture.js";
import { MemoryExecutor } from "../helpers/memory-executor.js";

describe("Query", () => {
    let executor: MemoryExecutor;
    let entries: LogEntry[];

    beforeEach(() => {
        executor = new MemoryExecutor();
        entries = captureLogs();
    });

    afterEach(() => {
        Logger.setSink(undefined);
    });

    it("should bind parameters by placeholder number", () => {
        const q = new Query("select $1, $3");
        q.bind(3, "c").bind(1, 7);

        expect(q.parameters()).toEqual([7, null, "c"]);
        expect(() => q.bind(0, "x")).toThrow(QueryError);
    });

    it("should complete, hand out rows in order and resume its owner once", async () => {
        executor.on("from flag_names", [{ id: 1, name: "\\Seen" }, { id: 2, name: "\\Deleted" }]);
        let resumed = 0;
        const q = new Query("select id, name from flag_names", continuation(() => { resumed += 1; }));

        await q.submit(executor);
        await q.submit(executor);

        expect(q.state()).toBe("completed");
        expect(q.rowCount()).toBe(2);
        expect(q.nextRow()).toEqual({ id: 1, name: "\\Seen" });
        expect(q.hasResults()).toBe(true);
        expect(q.nextRow()).toEqual({ id: 2, name: "\\Deleted" });
        expect(q.nextRow()).toBeUndefined();
        expect(q.rows()).toHaveLength(2);
        expect(resumed).toBe(1);
        expect(executor.statements()).toEqual(["select id, name from flag_names"]);
    });

    it("should fail without rejecting and keep the error text", async () => {
        executor.on("bogus", new Error("syntax error at or near \"bogus\""));
        let resumed = 0;
        const q = new Query("bogus", continuation(() => { resumed += 1; }));

        await q.submit(executor);

        expect(q.failed()).toBe(true);
        expect(q.error()).toBe("syntax error at or near \"bogus\"");
        expect(resumed).toBe(1);
        expect(entries.map(e => e.message)).toEqual(["Query failed: syntax error at or near \"bogus\""]);
    });

    it("should log an allowed failure below error level", async () => {
        executor.on("lock", new Error("could not obtain lock"));
        const q = new Query("lock table mailboxes nowait").allowFailure();

        await q.submit(executor);

        expect(q.failed()).toBe(true);
        expect(entries).toEqual([]);
    });

    it("should contain an owner that throws", async () => {
        const q = new Query("select 1", continuation(() => { throw new Error("owner broke"); }));

        await q.submit(executor);

        expect(q.state()).toBe("completed");
        expect(entries.map(e => e.message)).toEqual(["Query owner failed: owner broke"]);
    });

    it("should fail without sending when rejected", () => {
        let seen = "";
        const q = new Query("select 1");

        q.reject("Transaction failed: boom", (query) => { seen = query.error(); });

        expect(q.failed()).toBe(true);
        expect(seen).toBe("Transaction failed: boom");
        expect(executor.log).toEqual([]);
    });
});

describe("Database", () => {
    it("should track queries until they settle", async () => {
        const executor = new MemoryExecutor();
        const db = new Database(executor);
        const q = new Query("select 1");

        db.execute(q);
        expect(db.pending()).toBe(1);
        await db.idle();

        expect(db.pending()).toBe(0);
        expect(q.done()).toBe(true);
    });

    it("should wait for outstanding work before disconnecting", async () => {
        const executor = new MemoryExecutor();
        const db = new Database(executor);
        const q = new Query("select 1");

        db.execute(q);
        await db.disconnect();

        expect(q.done()).toBe(true);
        expect(executor.disconnected).toBe(true);
    });
});
