import { Query } from "../database/query.js";
import type { Continuation } from "../reactor/continuation.js";
import { MessageSet } from "./message-set.js";

export interface SelectorOptions {
    /** Only messages whose modseq is at least this. */
    changedSince?: bigint;
}

/**
 * Selects messages in one mailbox. The statement it builds always has the
 * shape "select distinct mm.<columns> from mailbox_messages mm where ...",
 * which the Fetcher relies on when it splices in joins and columns.
 */
export class Selector {
    constructor(private readonly set: MessageSet, private readonly options: SelectorOptions = {}) { }

    field(): "uid" | "modseq" {
        return this.options.changedSince === undefined ? "uid" : "modseq";
    }

    messageSet(): MessageSet {
        return this.set;
    }

    query(mailboxId: number, wanted: readonly string[], owner?: Continuation, order = false): Query {
        const columns = wanted.map(column => `mm.${column}`).join(", ");
        let text = `select distinct ${columns} from mailbox_messages mm ` +
            `where mm.mailbox=$1 and ${this.set.where("mm.uid")}`;
        if (this.options.changedSince !== undefined) {
            text += " and mm.modseq>=$2";
        }
        if (order) {
            text += " order by mm.uid";
        }
        const q = new Query(text, owner);
        q.bind(1, mailboxId);
        if (this.options.changedSince !== undefined) {
            q.bind(2, this.options.changedSince.toString());
        }
        return q;
    }
}
