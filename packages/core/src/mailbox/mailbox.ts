import { Fetcher, type FetchContext, type FetchSource } from "../fetch/fetcher.js";
import type { FetchKind } from "../fetch/decoders.js";
import { Logger, describeError } from "../logger.js";
import { Message } from "../message/message.js";
import type { Continuation } from "../reactor/continuation.js";
import type { MailboxSession } from "./session.js";

export type FetchGroup = "flags" | "annotations" | "headers" | "bodies" | "trivia";

const GROUP_KINDS: Record<FetchGroup, FetchKind[]> = {
    flags: ["flags"],
    annotations: ["annotations"],
    headers: ["addresses", "otherheader"],
    bodies: ["body"],
    trivia: ["trivia"],
};

/**
 * A mailbox and the messages loaded from it. Each group of data has at
 * most one canonical Fetcher at a time; callers asking for the same group
 * while it runs join it, and the Fetcher asks to be forgotten when done.
 */
export class Mailbox implements FetchSource {
    private cache = new Map<number, Message>();
    private views: MailboxSession[] = [];
    private fetchers = new Map<FetchGroup, Fetcher>();
    private watchers: Continuation[] = [];

    constructor(private readonly ctx: FetchContext, readonly id: number, readonly name: string) { }

    message(uid: number, create: true): Message;
    message(uid: number, create?: boolean): Message | undefined;
    message(uid: number, create = false): Message | undefined {
        let m = this.cache.get(uid);
        if (!m && create) {
            m = new Message({ uid });
            this.cache.set(uid, m);
        }
        return m;
    }

    /** Drops every cached Message. */
    clear(): void {
        this.cache.clear();
    }

    sessions(): readonly MailboxSession[] {
        return this.views;
    }

    addSession(session: MailboxSession): void {
        if (!this.views.includes(session)) this.views.push(session);
    }

    removeSession(session: MailboxSession): void {
        this.views = this.views.filter(s => s !== session);
    }

    fetchFlags(messages: Iterable<Message>, owner?: Continuation): Fetcher {
        return this.fetchGroup("flags", messages, owner);
    }

    fetchAnnotations(messages: Iterable<Message>, owner?: Continuation): Fetcher {
        return this.fetchGroup("annotations", messages, owner);
    }

    fetchHeaders(messages: Iterable<Message>, owner?: Continuation): Fetcher {
        return this.fetchGroup("headers", messages, owner);
    }

    fetchBodies(messages: Iterable<Message>, owner?: Continuation): Fetcher {
        return this.fetchGroup("bodies", messages, owner);
    }

    fetchTrivia(messages: Iterable<Message>, owner?: Continuation): Fetcher {
        return this.fetchGroup("trivia", messages, owner);
    }

    /** The canonical Fetcher for group, if one is running. */
    fetcher(group: FetchGroup): Fetcher | undefined {
        return this.fetchers.get(group);
    }

    forget(fetcher: Fetcher): void {
        for (const [group, f] of this.fetchers) {
            if (f === fetcher) {
                this.fetchers.delete(group);
                return;
            }
        }
    }

    private fetchGroup(group: FetchGroup, messages: Iterable<Message>, owner?: Continuation): Fetcher {
        let fetcher = this.fetchers.get(group);
        if (!fetcher) {
            fetcher = new Fetcher(this.ctx, this);
            for (const kind of GROUP_KINDS[group]) fetcher.fetch(kind);
            this.fetchers.set(group, fetcher);
        }
        fetcher.addMessages(messages);
        if (owner) fetcher.addOwner(owner);
        fetcher.execute();
        return fetcher;
    }

    /** Resumed whenever new messages are injected into this mailbox. */
    addWatcher(watcher: Continuation): void {
        if (!this.watchers.includes(watcher)) this.watchers.push(watcher);
    }

    removeWatcher(watcher: Continuation): void {
        this.watchers = this.watchers.filter(w => w !== watcher);
    }

    notifyWatchers(): void {
        for (const watcher of [...this.watchers]) {
            try {
                watcher.resume();
            } catch (error) {
                Logger.error(`Mailbox watcher failed: ${describeError(error)}`, {
                    facility: "mailbox",
                    mailbox: this.name,
                });
            }
        }
    }
}
