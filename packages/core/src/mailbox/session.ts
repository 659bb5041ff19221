import type { MailboxView } from "../fetch/fetcher.js";
import { MessageSet } from "../message/message-set.js";
import type { Mailbox } from "./mailbox.js";

/**
 * One client's view of a mailbox: the uids it has been told about and the
 * modseq it will report next. A Fetcher uses the freshest view to find
 * uid gaps that hold no messages.
 */
export class MailboxSession implements MailboxView {
    private uids = new MessageSet();
    private modSeq: bigint;

    constructor(readonly mailbox: Mailbox, nextModSeq = 1n) {
        this.modSeq = nextModSeq;
        mailbox.addSession(this);
    }

    messages(): MessageSet {
        return this.uids;
    }

    nextModSeq(): bigint {
        return this.modSeq;
    }

    setNextModSeq(modSeq: bigint): void {
        if (modSeq > this.modSeq) this.modSeq = modSeq;
    }

    addUids(uids: Iterable<number>): void {
        for (const uid of uids) this.uids.add(uid);
    }

    end(): void {
        this.mailbox.removeSession(this);
    }
}
