import { z } from "zod";
import { sanitizeIdentifier } from "@mailstore/shared/security/identifiers.js";
import type { Database } from "../database/database.js";
import { Query } from "../database/query.js";
import { Logger } from "../logger.js";
import type { Continuation } from "../reactor/continuation.js";

const NameRowSchema = z.object({
    id: z.coerce.number().int().positive(),
    name: z.string(),
});

export interface NamedRow {
    id: number;
    name: string;
}

/**
 * An in-memory copy of one of the small name tables (flag_names,
 * field_names, annotation_names). Ids are assigned by the database and
 * never reused, so the cache only ever grows.
 */
export class NameRegistry {
    private ids = new Map<string, number>();
    private names = new Map<number, string>();
    private largest = 0;

    constructor(readonly table: string, private readonly caseInsensitive = false) {
        sanitizeIdentifier(table);
    }

    private key(name: string): string {
        return this.caseInsensitive ? name.toLowerCase() : name;
    }

    add(name: string, id: number): void {
        this.ids.set(this.key(name), id);
        this.names.set(id, name);
        if (id > this.largest) this.largest = id;
    }

    /** Returns the id of name, or 0 if it is not known yet. */
    id(name: string): number {
        return this.ids.get(this.key(name)) ?? 0;
    }

    name(id: number): string | undefined {
        return this.names.get(id);
    }

    find(id: number): NamedRow | undefined {
        const name = this.names.get(id);
        return name === undefined ? undefined : { id, name };
    }

    largestId(): number {
        return this.largest;
    }

    size(): number {
        return this.names.size;
    }

    /** Adds a row returned by "select id, name from ...". Returns false for a malformed row. */
    addRow(row: unknown): boolean {
        const parsed = NameRowSchema.safeParse(row);
        if (!parsed.success) {
            Logger.warn(`Ignoring malformed ${this.table} row`, { facility: "registry" });
            return false;
        }
        this.add(parsed.data.name, parsed.data.id);
        return true;
    }

    /**
     * Fetches the rows added since the last load and resumes owner when
     * they are in the cache.
     */
    reload(db: Database, owner?: Continuation): Query {
        const loader = new NameLoader(this, owner);
        const q = new Query(`select id, name from ${this.table} where id >= $1 order by id`, loader);
        q.bind(1, this.largest);
        loader.query = q;
        db.execute(q);
        return q;
    }
}

class NameLoader implements Continuation {
    query: Query | undefined;

    constructor(private readonly registry: NameRegistry, private readonly owner?: Continuation) { }

    resume(): void {
        const q = this.query;
        if (!q || !q.done()) return;
        let row = q.nextRow();
        while (row) {
            this.registry.addRow(row);
            row = q.nextRow();
        }
        this.owner?.resume();
    }
}

export interface NameRegistries {
    flags: NameRegistry;
    fieldNames: NameRegistry;
    annotationNames: NameRegistry;
}

export function createNameRegistries(): NameRegistries {
    return {
        flags: new NameRegistry("flag_names", true),
        fieldNames: new NameRegistry("field_names"),
        annotationNames: new NameRegistry("annotation_names"),
    };
}
