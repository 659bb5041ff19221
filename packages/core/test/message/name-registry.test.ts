import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Database } from "../../src/database/database.js";
import { Logger } from "../../src/logger.js";
import type { LogEntry } from "../../src/logger.js";
import { NameRegistry, createNameRegistries } from "../../src/message/name-registry.js";
import { continuation } from "../../src/reactor/continuation.js";
import { captureLogs } from "../helpers/log-capture.js";
import { MemoryExecutor } from "../helpers/memory-executor.js";

describe("NameRegistry", () => {
    let entries: LogEntry[];

    beforeEach(() => {
        entries = captureLogs();
    });

    afterEach(() => {
        Logger.setSink(undefined);
    });

    it("should map names and ids both ways", () => {
        const registry = new NameRegistry("field_names");
        registry.add("Subject", 3);
        registry.add("From", 1);

        expect(registry.id("Subject")).toBe(3);
        expect(registry.id("subject")).toBe(0);
        expect(registry.name(1)).toBe("From");
        expect(registry.find(3)).toEqual({ id: 3, name: "Subject" });
        expect(registry.find(4)).toBeUndefined();
        expect(registry.largestId()).toBe(3);
        expect(registry.size()).toBe(2);
    });

    it("should fold case for flags", () => {
        const { flags } = createNameRegistries();
        flags.add("\\Seen", 1);

        expect(flags.id("\\SEEN")).toBe(1);
        expect(flags.name(1)).toBe("\\Seen");
    });

    it("should skip malformed rows", () => {
        const registry = new NameRegistry("annotation_names");

        expect(registry.addRow({ id: "12", name: "/comment" })).toBe(true);
        expect(registry.addRow({ id: -1, name: "/bad" })).toBe(false);
        expect(registry.id("/comment")).toBe(12);
        expect(entries.map(e => e.message)).toEqual(["Ignoring malformed annotation_names row"]);
    });

    it("should refuse a table name that is not an identifier", () => {
        expect(() => new NameRegistry("flag_names; drop table x")).toThrow("Invalid identifier");
    });

    it("should load rows added since the last load and then resume its owner", async () => {
        const executor = new MemoryExecutor();
        const db = new Database(executor);
        const registry = new NameRegistry("flag_names", true);
        executor.on("from flag_names", [{ id: 1, name: "\\Seen" }, { id: 2, name: "\\Flagged" }]);
        let resumed = 0;

        const q = registry.reload(db, continuation(() => { resumed += 1; }));
        await db.idle();
        registry.reload(db);
        await db.idle();

        expect(q.string()).toBe("select id, name from flag_names where id >= $1 order by id");
        expect(executor.log.map(s => s.params)).toEqual([[0], [2]]);
        expect(registry.id("\\flagged")).toBe(2);
        expect(resumed).toBe(1);
    });
});
