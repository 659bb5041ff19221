import { Logger } from "../logger.js";
import type { NameRegistry } from "../message/name-registry.js";
import type { Continuation } from "../reactor/continuation.js";
import { Query } from "./query.js";
import type { Transaction } from "./transaction.js";

/**
 * Adds rows to one of the small helper tables inside a caller's
 * Transaction, tolerating a concurrent writer adding the same rows.
 *
 * Each pass selects the rows already present, then inserts the missing
 * ones under a savepoint. If the insert loses a race (its error names the
 * table's unique constraint), the creator rolls back to the savepoint and
 * selects again, which picks up the other writer's rows. That happens at
 * most once; any other failure leaves the Transaction failed. Either way
 * the Transaction's owner is notified when the creator is done.
 */
export abstract class HelperRowCreator implements Continuation {
    private select: Query | undefined;
    private insert: Query | undefined;
    private savepointTaken = false;
    private retried = false;
    private inserted = false;
    private finished = false;
    private failure: string | undefined;
    private readonly savepointName: string;

    protected constructor(
        readonly table: string,
        protected readonly transaction: Transaction,
        private readonly constraint: string,
    ) {
        this.savepointName = `${table}_creator`;
    }

    /** True once the creator will send no more queries. */
    done(): boolean {
        return this.finished;
    }

    /**
     * True when the creator gave up. A failed query has failed the
     * Transaction too; rows that were inserted but could not be selected
     * again leave it healthy, so the owner has to look here.
     */
    failed(): boolean {
        return this.failure !== undefined;
    }

    error(): string {
        return this.failure ?? "";
    }

    resume(): void {
        this.execute();
    }

    execute(): void {
        if (this.finished) return;
        while (!this.finished) {
            if (this.select && !this.select.done()) return;
            if (this.insert && !this.insert.done()) return;

            if (!this.select && !this.insert) {
                this.select = this.makeSelect();
                if (!this.select) {
                    this.finished = true;
                    break;
                }
                this.transaction.enqueue(this.select);
                this.transaction.execute();
                continue;
            }

            if (this.select) {
                const select = this.select;
                this.select = undefined;
                if (select.failed()) {
                    this.giveUp(select.error());
                    break;
                }
                this.processSelect(select);
                this.insert = this.makeInsert();
                if (!this.insert) {
                    this.finished = true;
                    break;
                }
                if (this.inserted) {
                    this.giveUp("inserted rows are not visible");
                    break;
                }
                if (!this.savepointTaken) {
                    this.transaction.savepoint(this.savepointName);
                    this.savepointTaken = true;
                }
                this.transaction.enqueue(this.insert);
                this.transaction.execute();
                continue;
            }

            if (this.insert) {
                const insert = this.insert;
                this.insert = undefined;
                if (!insert.failed()) {
                    this.inserted = true;
                    continue;
                }
                if (!this.retried && insert.error().includes(this.constraint)) {
                    Logger.debug(`Lost insert race on ${this.table}, retrying`, { facility: "database" });
                    this.retried = true;
                    this.transaction.rollbackTo(this.savepointName);
                    continue;
                }
                this.giveUp(insert.error());
            }
        }

        if (this.savepointTaken) {
            this.transaction.release(this.savepointName);
            this.transaction.enqueue(`notify ${this.table}_extended`);
        }
        this.transaction.notify();
    }

    private giveUp(message: string): void {
        Logger.error(`Could not add rows to ${this.table}: ${message}`, { facility: "database" });
        this.failure = message;
        this.finished = true;
        this.savepointTaken = false;
    }

    /** A query returning the ids of rows already present, or undefined if nothing is needed. */
    protected abstract makeSelect(): Query | undefined;

    protected abstract processSelect(q: Query): void;

    /** A query inserting the missing rows, or undefined if none are missing. */
    protected abstract makeInsert(): Query | undefined;
}

/** Inserts-if-absent a list of names into a name table backed by a NameRegistry. */
export class NameRowCreator extends HelperRowCreator {
    constructor(
        private readonly registry: NameRegistry,
        private readonly names: readonly string[],
        transaction: Transaction,
        constraint: string,
        private readonly foldCase = false,
    ) {
        super(registry.table, transaction, constraint);
    }

    private missing(): string[] {
        const seen = new Set<string>();
        const result: string[] = [];
        for (const name of this.names) {
            const key = this.foldCase ? name.toLowerCase() : name;
            if (this.registry.id(name) !== 0 || seen.has(key)) continue;
            seen.add(key);
            result.push(name);
        }
        return result;
    }

    protected makeSelect(): Query | undefined {
        const missing = this.missing();
        if (missing.length === 0) return undefined;
        const text = this.foldCase
            ? `select id, name from ${this.table} where lower(name)=any($1::text[])`
            : `select id, name from ${this.table} where name=any($1::text[])`;
        const q = new Query(text, this);
        q.bind(1, this.foldCase ? missing.map(name => name.toLowerCase()) : missing);
        return q;
    }

    protected processSelect(q: Query): void {
        let row = q.nextRow();
        while (row) {
            this.registry.addRow(row);
            row = q.nextRow();
        }
    }

    protected makeInsert(): Query | undefined {
        const missing = this.missing();
        if (missing.length === 0) return undefined;
        const q = new Query(`insert into ${this.table} (name) select unnest($1::text[])`, this);
        q.bind(1, missing);
        return q;
    }
}

export class FlagCreator extends NameRowCreator {
    constructor(flags: NameRegistry, names: readonly string[], transaction: Transaction) {
        super(flags, names, transaction, "fn_uname", true);
    }
}

export class FieldNameCreator extends NameRowCreator {
    constructor(fieldNames: NameRegistry, names: readonly string[], transaction: Transaction) {
        super(fieldNames, names, transaction, "field_names_name_key");
    }
}

export class AnnotationNameCreator extends NameRowCreator {
    constructor(annotationNames: NameRegistry, names: readonly string[], transaction: Transaction) {
        super(annotationNames, names, transaction, "annotation_names_name_key");
    }
}
