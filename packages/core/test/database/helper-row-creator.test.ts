import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Row } from "@mailstore/shared/executor/interface.js";
import { Database } from "../../src/database/database.js";
import { AnnotationNameCreator, FieldNameCreator, FlagCreator } from "../../src/database/helper-row-creator.js";
import type { HelperRowCreator } from "../../src/database/helper-row-creator.js";
import { Transaction } from "../../src/database/transaction.js";
import { Logger } from "../../src/logger.js";
import type { LogEntry } from "../../src/logger.js";
import { NameRegistry } from "../../src/message/name-registry.js";
import { continuation } from "../../src/reactor/continuation.js";
import { captureLogs } from "../helpers/log-capture.js";
import { MemoryExecutor } from "../helpers/memory-executor.js";

const SELECT_FOLDED = "select id, name from flag_names where lower(name)=any($1::text[])";
const INSERT = "insert into flag_names (name) select unnest($1::text[])";
const UNIQUE_VIOLATION = "duplicate key value violates unique constraint \"fn_uname\"";

function names(params: readonly unknown[]): string[] {
    const first = params[0];
    return Array.isArray(first) ? first.filter((n): n is string => typeof n === "string") : [];
}

/** Commits the transaction once the creator is done with it. */
function commitWhenDone(t: Transaction, creator: () => HelperRowCreator | undefined): void {
    let committed = false;
    t.setOwner(continuation(() => {
        const c = creator();
        if (!c || !c.done() || committed) return;
        committed = true;
        t.commit();
    }));
}

describe("HelperRowCreator", () => {
    let executor: MemoryExecutor;
    let db: Database;
    let table: Array<{ id: number; name: string }>;
    let entries: LogEntry[];

    beforeEach(() => {
        entries = captureLogs();
        executor = new MemoryExecutor();
        db = new Database(executor);
        table = [];
        executor.on("from flag_names", (_sql, params): Row[] => {
            const wanted = names(params);
            return table.filter(r => wanted.includes(r.name.toLowerCase()));
        });
    });

    afterEach(() => {
        Logger.setSink(undefined);
    });

    it("should retry once after losing an insert race and settle on the winner's id", async () => {
        executor.on("insert into flag_names", (): Row[] => {
            // another transaction committed the same name first
            table.push({ id: 7, name: "\\Seen" });
            throw new Error(UNIQUE_VIOLATION);
        });
        const registry = new NameRegistry("flag_names", true);
        const t = new Transaction(db);
        const creator = new FlagCreator(registry, ["\\Seen"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(executor.statements(1)).toEqual([
            "begin",
            SELECT_FOLDED,
            "savepoint flag_names_creator",
            INSERT,
            "rollback to savepoint flag_names_creator",
            SELECT_FOLDED,
            "release savepoint flag_names_creator",
            "notify flag_names_extended",
            "commit",
        ]);
        expect(registry.id("\\seen")).toBe(7);
        expect(t.state()).toBe("completed");

        const other = new NameRegistry("flag_names", true);
        const t2 = new Transaction(db);
        const second = new FlagCreator(other, ["\\SEEN"], t2);
        commitWhenDone(t2, () => second);
        second.execute();
        await db.idle();

        expect(executor.statements(2)).toEqual(["begin", SELECT_FOLDED, "commit"]);
        expect(other.id("\\Seen")).toBe(7);
    });

    it("should give up when the insert loses the race twice", async () => {
        let inserts = 0;
        executor.on("insert into flag_names", (): Row[] => {
            inserts += 1;
            throw new Error(UNIQUE_VIOLATION);
        });
        const t = new Transaction(db);
        const creator = new FlagCreator(new NameRegistry("flag_names", true), ["$Junk"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(inserts).toBe(2);
        expect(creator.done()).toBe(true);
        expect(executor.statements(1)).toEqual([
            "begin",
            SELECT_FOLDED,
            "savepoint flag_names_creator",
            INSERT,
            "rollback to savepoint flag_names_creator",
            SELECT_FOLDED,
            INSERT,
            "rollback",
        ]);
        expect(t.state()).toBe("failed");
        expect(creator.failed()).toBe(true);
        expect(creator.error()).toBe(UNIQUE_VIOLATION);
        expect(entries.some(e => e.message === `Could not add rows to flag_names: ${UNIQUE_VIOLATION}`)).toBe(true);
    });

    it("should not retry other insert failures", async () => {
        executor.on("insert into flag_names", new Error("permission denied for table flag_names"));
        const t = new Transaction(db);
        const creator = new FlagCreator(new NameRegistry("flag_names", true), ["$Junk"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(executor.statements(1)).toEqual([
            "begin",
            SELECT_FOLDED,
            "savepoint flag_names_creator",
            INSERT,
            "rollback",
        ]);
        expect(t.error()).toBe("permission denied for table flag_names");
    });

    it("should give up when inserted rows cannot be selected again", async () => {
        executor.on("insert into flag_names", []);
        const t = new Transaction(db);
        const creator = new FlagCreator(new NameRegistry("flag_names", true), ["$Junk"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(executor.statements(1)).toEqual([
            "begin",
            SELECT_FOLDED,
            "savepoint flag_names_creator",
            INSERT,
            SELECT_FOLDED,
            "commit",
        ]);
        expect(creator.failed()).toBe(true);
        expect(creator.error()).toBe("inserted rows are not visible");
        expect(t.state()).toBe("completed");
    });

    it("should stop when the select fails", async () => {
        executor.on("from flag_names", new Error("relation \"flag_names\" does not exist"));
        const t = new Transaction(db);
        const creator = new FlagCreator(new NameRegistry("flag_names", true), ["$Junk"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(creator.done()).toBe(true);
        expect(executor.statements(1)).toEqual(["begin", SELECT_FOLDED, "rollback"]);
        expect(t.state()).toBe("failed");
    });

    it("should insert each missing name once and learn the new ids", async () => {
        let nextId = 10;
        executor.on("insert into flag_names", (_sql, params): Row[] => {
            for (const name of names(params)) {
                table.push({ id: nextId, name });
                nextId += 1;
            }
            return [];
        });
        const registry = new NameRegistry("flag_names", true);
        const t = new Transaction(db);
        const creator = new FlagCreator(registry, ["\\Seen", "\\SEEN", "$Junk"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(executor.log[1]?.params).toEqual([["\\seen", "$junk"]]);
        expect(executor.log[3]?.params).toEqual([["\\Seen", "$Junk"]]);
        expect(registry.id("\\seen")).toBe(10);
        expect(registry.id("$junk")).toBe(11);
        expect(executor.statements(1)).toEqual([
            "begin",
            SELECT_FOLDED,
            "savepoint flag_names_creator",
            INSERT,
            SELECT_FOLDED,
            "release savepoint flag_names_creator",
            "notify flag_names_extended",
            "commit",
        ]);
    });

    it("should do nothing when every name is already known", () => {
        const registry = new NameRegistry("field_names");
        registry.add("Subject", 3);
        let notified = 0;
        const t = new Transaction(db, continuation(() => { notified += 1; }));
        const creator = new FieldNameCreator(registry, ["Subject"], t);

        creator.execute();

        expect(creator.done()).toBe(true);
        expect(notified).toBe(1);
        expect(executor.log).toEqual([]);
    });

    it("should recover from a lost race on annotation names", async () => {
        const annotations: Array<{ id: number; name: string }> = [];
        executor.on("from annotation_names", (_sql, params): Row[] => {
            const wanted = names(params);
            return annotations.filter(r => wanted.includes(r.name));
        });
        executor.on("insert into annotation_names", (): Row[] => {
            annotations.push({ id: 3, name: "/comment" });
            throw new Error("duplicate key value violates unique constraint \"annotation_names_name_key\"");
        });
        const registry = new NameRegistry("annotation_names");
        const t = new Transaction(db);
        const creator = new AnnotationNameCreator(registry, ["/comment"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(executor.statements(1)).toEqual([
            "begin",
            "select id, name from annotation_names where name=any($1::text[])",
            "savepoint annotation_names_creator",
            "insert into annotation_names (name) select unnest($1::text[])",
            "rollback to savepoint annotation_names_creator",
            "select id, name from annotation_names where name=any($1::text[])",
            "release savepoint annotation_names_creator",
            "notify annotation_names_extended",
            "commit",
        ]);
        expect(registry.id("/comment")).toBe(3);
        expect(creator.failed()).toBe(false);
        expect(t.state()).toBe("completed");
    });

    it("should match names exactly in case-sensitive tables", async () => {
        const fields: Row[] = [];
        executor.on("from field_names", () => fields);
        executor.on("insert into field_names", (_sql, params): Row[] => {
            for (const name of names(params)) fields.push({ id: 4, name });
            return [];
        });
        const registry = new NameRegistry("field_names");
        const t = new Transaction(db);
        const creator = new FieldNameCreator(registry, ["X-Spam-Score"], t);
        commitWhenDone(t, () => creator);

        creator.execute();
        await db.idle();

        expect(executor.statements(1)[1]).toBe("select id, name from field_names where name=any($1::text[])");
        expect(executor.log[1]?.params).toEqual([["X-Spam-Score"]]);
        expect(registry.id("X-Spam-Score")).toBe(4);
        expect(registry.id("x-spam-score")).toBe(0);
    });
});
