import { z } from "zod";
import type { Row } from "@mailstore/shared/executor/interface.js";
import type { FetcherConfig } from "../config.js";
import type { Database } from "../database/database.js";
import { Query } from "../database/query.js";
import { FetchError } from "../errors.js";
import { Logger, describeError } from "../logger.js";
import type { Message } from "../message/message.js";
import { MessageSet } from "../message/message-set.js";
import type { NameRegistries } from "../message/name-registry.js";
import { Selector } from "../message/selector.js";
import { continuation, type Continuation } from "../reactor/continuation.js";
import { FETCH_KINDS, createDecoder, type Decoder, type FetchKind } from "./decoders.js";

export interface FetchContext {
    db: Database;
    registries: NameRegistries;
    config: FetcherConfig;
    clock?: () => number;
}

/** A live view of a mailbox, as seen by one client session. */
export interface MailboxView {
    nextModSeq(): bigint;
    messages(): MessageSet;
}

/** What a Fetcher needs from the mailbox whose messages it fetches. */
export interface FetchSource {
    readonly id: number;
    sessions(): readonly MailboxView[];
    forget(fetcher: Fetcher): void;
}

export interface FetcherOptions {
    /** Selects the messages instead of a uid set built from them. */
    selector?: Selector;
}

export type FetcherState = "notStarted" | "findingMessages" | "fetching" | "done";

const LocatedRowSchema = z.object({
    message: z.coerce.number().int(),
    uid: z.coerce.number().int(),
    idate: z.coerce.number().int().nullish(),
    modseq: z.coerce.bigint().nullish(),
});

const NumericColumn = z.coerce.number().int();

function numericColumn(row: Row, name: string): number | undefined {
    const value = row[name];
    if (value === undefined || value === null) return undefined;
    const parsed = NumericColumn.safeParse(value);
    return parsed.success ? parsed.data : undefined;
}

/**
 * Fetches data of one or more kinds for a list of messages and resumes its
 * owners once every message has every requested kind.
 *
 * Small jobs are done with one query per kind, built by splicing joins into
 * the Selector's statement. Larger ones first locate the messages (learning
 * their database ids), then fetch in batches sized so a round takes about
 * roundBudgetMs. Rows are routed to messages by database id through a
 * fixed number of hash buckets, or by uid for the per-mailbox kinds.
 */
export class Fetcher implements Continuation {
    private status: FetcherState = "notStarted";
    private messages: Message[] = [];
    private pending: Message[] = [];
    private notifying = false;
    private owners: Continuation[] = [];
    private decoders = new Map<FetchKind, Decoder>();
    private queries = new Map<FetchKind, Query>();
    private selector: Selector | undefined;
    private locate: Query | undefined;
    private failure: string | undefined;

    private batched = false;
    private queue: Message[] = [];
    private cursor = 0;
    private batchSize = 0;
    private batch: Message[] = [];
    private batchIds: number[] = [];
    private buckets: Array<Message[] | undefined> = [];
    private uniqueDatabaseIds = true;
    private byUid = new Map<number, Message[]>();
    private lastBatchStarted: number | undefined;
    private sizes: number[] = [];

    private readonly clock: () => number;
    private readonly customSelector: boolean;

    constructor(
        private readonly ctx: FetchContext,
        private readonly mailbox: FetchSource | undefined,
        messages: Iterable<Message> = [],
        owner?: Continuation,
        options: FetcherOptions = {},
    ) {
        this.clock = ctx.clock ?? Date.now;
        this.selector = options.selector;
        this.customSelector = options.selector !== undefined;
        if (owner) this.owners.push(owner);
        appendDistinct(this.messages, messages);
    }

    /**
     * A Fetcher for one message, looked up by database id rather than uid.
     * It can fetch everything except flags and annotations, which belong to
     * a mailbox.
     */
    static forMessage(ctx: FetchContext, message: Message, owner?: Continuation): Fetcher {
        if (message.databaseId <= 0) {
            throw new FetchError("A message fetched by id needs a database id");
        }
        return new Fetcher(ctx, undefined, [message], owner);
    }

    fetch(kind: FetchKind): this {
        if (!this.mailbox && (kind === "flags" || kind === "annotations")) {
            throw new FetchError(`Cannot fetch ${kind} without a mailbox`);
        }
        if (!this.decoders.has(kind)) {
            this.decoders.set(kind, createDecoder(kind, this.ctx.registries));
        }
        if (kind === "body") this.fetch("partnumbers");
        return this;
    }

    fetching(kind: FetchKind): boolean {
        return this.decoders.has(kind);
    }

    /**
     * Adds messages to the job. Messages added while a run is under way are
     * fetched by another run once it ends, and so are messages added by an
     * owner while it is being told that a run ended. Nothing is sent until
     * execute().
     */
    addMessages(messages: Iterable<Message>): void {
        if (!this.notifying && (this.status === "notStarted" || this.status === "done")) {
            appendDistinct(this.messages, messages);
            this.status = "notStarted";
        } else {
            appendDistinct(this.pending, messages);
        }
    }

    addOwner(owner: Continuation): void {
        if (!this.owners.includes(owner)) this.owners.push(owner);
    }

    state(): FetcherState {
        return this.status;
    }

    done(): boolean {
        return this.status === "done";
    }

    failed(): boolean {
        return this.failure !== undefined;
    }

    error(): string {
        return this.failure ?? "";
    }

    /** The number of distinct database ids in each batch of the last run. */
    batchSizes(): readonly number[] {
        return this.sizes;
    }

    resume(): void {
        this.execute();
    }

    execute(): void {
        let before: FetcherState;
        do {
            before = this.status;
            switch (this.status) {
                case "notStarted":
                    this.start();
                    break;
                case "findingMessages":
                    this.findMessages();
                    break;
                case "fetching":
                    this.waitForEnd();
                    break;
                case "done":
                    break;
            }
        } while (before !== this.status || this.status === "notStarted");
    }

    private kinds(): FetchKind[] {
        return FETCH_KINDS.filter(kind =>
            this.decoders.has(kind) && !(kind === "partnumbers" && this.decoders.has("body")));
    }

    private start(): void {
        this.failure = undefined;
        this.sizes = [];
        this.lastBatchStarted = undefined;
        this.batched = false;

        const kinds = this.kinds();
        if (kinds.length === 0 || this.messages.length === 0) {
            this.finishRun();
            return;
        }
        Logger.debug(`Fetching ${kinds.join(" ")} for ${this.messages.length} messages`, {
            facility: "fetcher",
        });

        const first = this.messages[0];
        if (this.messages.length === 1 && first && first.databaseId > 0) {
            this.startBatches(this.messages, 1);
            return;
        }

        const mailbox = this.mailbox;
        if (!mailbox) {
            const known = this.messages.filter(m => m.databaseId > 0);
            if (known.length < this.messages.length) {
                this.failure = `${this.messages.length - known.length} messages have no database id`;
                Logger.error(this.failure, { facility: "fetcher" });
            }
            this.startBatches(known, this.seedBatchSize());
            return;
        }

        const set = MessageSet.of(this.messages.map(m => m.uid));
        const expected = set.count() * kinds.length;
        const config = this.ctx.config;
        const simple = (set.isRange() && expected < config.rangeThreshold) ||
            expected < config.simpleThreshold;

        if (!set.isRange()) {
            let best: MailboxView | undefined;
            for (const view of mailbox.sessions()) {
                if (!best || best.nextModSeq() < view.nextModSeq()) best = view;
            }
            if (best) set.addGapsFrom(best.messages());
        }
        if (!this.selector) this.selector = new Selector(set);

        if (simple) {
            this.byUid = this.indexByUid(this.messages);
            this.status = "fetching";
            this.makeQueries();
            return;
        }

        this.batchSize = this.seedBatchSize();
        const wanted = ["message", "uid"];
        if (this.decoders.has("trivia")) wanted.push("idate", "modseq");
        const locate = this.selector.query(mailbox.id, wanted, this, true);
        this.locate = locate;
        this.status = "findingMessages";
        this.ctx.db.execute(locate);
    }

    private seedBatchSize(): number {
        let size = this.ctx.config.defaultBatchSize;
        if (this.decoders.has("body")) size = Math.floor(size / 2);
        if (this.decoders.has("otherheader")) size = Math.floor(size * 2 / 3);
        if (this.decoders.has("addresses")) size = Math.floor(size * 3 / 4);
        return size;
    }

    private startBatches(messages: Message[], size: number): void {
        this.batched = true;
        this.queue = messages;
        this.cursor = 0;
        this.batchSize = size;
        this.status = "fetching";
        this.prepareBatch();
        this.makeQueries();
    }

    private findMessages(): void {
        const q = this.locate;
        if (!q || !q.done()) return;
        this.locate = undefined;
        if (q.failed()) {
            this.failure = `Could not locate messages: ${q.error()}`;
            Logger.error(this.failure, { facility: "fetcher" });
            this.finishRun();
            return;
        }

        const byUid = this.indexByUid(this.messages);
        const trivia = this.decoders.has("trivia");
        const located = new Set<Message>();
        const queue: Message[] = [];
        let row = q.nextRow();
        while (row) {
            const parsed = LocatedRowSchema.safeParse(row);
            if (parsed.success) {
                for (const m of byUid.get(parsed.data.uid) ?? []) {
                    m.databaseId = parsed.data.message;
                    if (trivia) {
                        if (parsed.data.modseq !== null && parsed.data.modseq !== undefined) {
                            m.modSeq = parsed.data.modseq;
                        }
                        if (parsed.data.idate !== null && parsed.data.idate !== undefined) {
                            m.internalDate = parsed.data.idate;
                        }
                    }
                    if (!located.has(m)) {
                        located.add(m);
                        queue.push(m);
                    }
                }
            } else {
                Logger.warn("Skipping malformed message row", { facility: "fetcher" });
            }
            row = q.nextRow();
        }

        // Messages the database no longer has: there is nothing to fetch.
        const gone = this.messages.filter(m => !located.has(m));
        if (gone.length > 0) {
            Logger.debug(`${gone.length} messages no longer exist`, { facility: "fetcher" });
            for (const decoder of this.decoders.values()) {
                for (const m of gone) decoder.setDone(m);
            }
        }
        this.startBatches(queue, this.batchSize);
    }

    private indexByUid(messages: readonly Message[]): Map<number, Message[]> {
        const index = new Map<number, Message[]>();
        for (const m of messages) {
            const list = index.get(m.uid);
            if (list) {
                list.push(m);
            } else {
                index.set(m.uid, [m]);
            }
        }
        return index;
    }

    /**
     * Adjusts the batch size so the next round takes about roundBudgetMs,
     * then moves that many distinct database ids from the queue into the
     * batch.
     */
    private prepareBatch(): void {
        const config = this.ctx.config;
        const now = this.clock();
        if (this.lastBatchStarted !== undefined) {
            const previous = this.batchSize;
            let size: number;
            if (now === this.lastBatchStarted) {
                size = previous * 2;
            } else if (now < this.lastBatchStarted) {
                size = config.minBatchSize;
            } else {
                size = Math.floor(previous * config.roundBudgetMs / (now - this.lastBatchStarted));
            }
            size = Math.min(size, Math.floor(previous * config.maxGrowthFactor), previous + config.maxGrowthStep);
            size = Math.max(size, config.minBatchSize);
            size = Math.min(size, config.maxBatchSize);
            Logger.debug(`Batch of ${previous} took ${now - this.lastBatchStarted}ms, next is ${size}`, {
                facility: "fetcher",
            });
            this.batchSize = size;
        }
        this.lastBatchStarted = now;

        const remaining = this.queue.length - this.cursor;
        if (remaining <= this.batchSize * config.absorbRatio) this.batchSize = remaining;

        this.buckets = new Array<Message[] | undefined>(config.bucketCount).fill(undefined);
        this.batch = [];
        this.batchIds = [];
        this.uniqueDatabaseIds = true;
        let n = 0;
        while (this.cursor < this.queue.length && n < this.batchSize) {
            const m = this.queue[this.cursor];
            this.cursor += 1;
            if (!m) continue;
            const id = m.databaseId;
            const b = id % config.bucketCount;
            const bucket = this.buckets[b] ?? [];
            if (bucket.some(o => o.databaseId === id)) {
                this.uniqueDatabaseIds = false;
            } else {
                n += 1;
                this.batchIds.push(id);
            }
            bucket.push(m);
            this.buckets[b] = bucket;
            this.batch.push(m);
        }
        this.byUid = this.indexByUid(this.batch);
        this.sizes.push(n);
    }

    private makeQueries(): void {
        if (this.batched && this.batch.length === 0) return;
        for (const kind of this.kinds()) {
            const decoder = this.decoders.get(kind);
            if (!decoder) continue;
            const q = this.batched ? this.batchQuery(kind) : this.simpleQuery(kind);
            if (!q) continue;
            q.setOwner(continuation(() => this.decodeRows(decoder, q)));
            this.queries.set(kind, q);
            this.ctx.db.execute(q);
        }
    }

    private batchQuery(kind: FetchKind): Query | undefined {
        const mailboxId = this.mailbox?.id;
        const uids = () => [...this.byUid.keys()].sort((a, b) => a - b);
        let q: Query;
        switch (kind) {
            case "flags":
                if (mailboxId === undefined) return undefined;
                q = new Query("select mailbox, uid, flag from flags " +
                    "where mailbox=$1 and uid=any($2::int[]) order by mailbox, uid, flag");
                return q.bind(1, mailboxId).bind(2, uids());
            case "annotations":
                if (mailboxId === undefined) return undefined;
                q = new Query("select a.mailbox, a.uid, a.owner, a.value, an.name, an.id " +
                    "from annotations a join annotation_names an on (a.name=an.id) " +
                    "where a.mailbox=$1 and a.uid=any($2::int[]) order by a.mailbox, a.uid");
                return q.bind(1, mailboxId).bind(2, uids());
            case "partnumbers":
                q = new Query("select message, part, bytes, lines from part_numbers " +
                    "where message=any($1::int[]) order by message, part");
                break;
            case "addresses":
                q = new Query("select af.message, af.part, af.position, af.field, af.number, " +
                    "a.name, a.localpart, a.domain from address_fields af " +
                    "join addresses a on (af.address=a.id) " +
                    "where af.message=any($1::int[]) order by af.message, af.part, af.field, af.number");
                break;
            case "otherheader":
                q = new Query("select hf.message, hf.part, hf.position, fn.name, hf.value " +
                    "from header_fields hf join field_names fn on (hf.field=fn.id) " +
                    "where hf.message=any($1::int[]) order by hf.message, hf.part");
                break;
            case "body":
                q = new Query("select pn.message, pn.part, bp.text, bp.data, " +
                    "bp.bytes as rawbytes, pn.bytes, pn.lines from part_numbers pn " +
                    "left join bodyparts bp on (pn.bodypart=bp.id) " +
                    "where pn.message=any($1::int[]) order by pn.message, pn.part");
                break;
            case "trivia":
                q = new Query("select id as message, rfc822size from messages where id=any($1::int[])");
                break;
        }
        return q.bind(1, this.batchIds);
    }

    /** Splices the kind's joins and columns into the Selector's statement. */
    private simpleQuery(kind: FetchKind): Query | undefined {
        const selector = this.selector;
        const mailbox = this.mailbox;
        if (!selector || !mailbox) return undefined;
        const wanted = ["mailbox", "uid"];

        if ((kind === "flags" || kind === "annotations") && selector.field() === "uid") {
            const set = selector.messageSet();
            const q = kind === "flags"
                ? new Query("select mailbox, uid, flag from flags " +
                    `where mailbox=$1 and ${set.where()} order by mailbox, uid, flag`)
                : new Query("select a.mailbox, a.uid, a.owner, a.value, an.name, an.id " +
                    "from annotations a join annotation_names an on (a.name=an.id) " +
                    `where a.mailbox=$1 and ${set.where("a.uid")} order by a.mailbox, a.uid`);
            return q.bind(1, mailbox.id);
        }

        let joins: string;
        let columns: string;
        let order = "";
        let sorted = false;
        switch (kind) {
            case "flags":
                joins = " left join flags f on (mm.mailbox=f.mailbox and mm.uid=f.uid)";
                columns = "f.flag, ";
                order = " order by mm.mailbox, mm.uid, f.flag";
                break;
            case "annotations":
                joins = " join annotations a on (mm.mailbox=a.mailbox and mm.uid=a.uid)" +
                    " join annotation_names an on (a.name=an.id)";
                columns = "a.owner, a.value, an.name, an.id, ";
                order = " order by mm.mailbox, mm.uid";
                break;
            case "partnumbers":
                joins = " join part_numbers pn on (mm.message=pn.message)";
                columns = "pn.part, pn.bytes, pn.lines, ";
                order = " order by mm.uid, pn.part";
                break;
            case "addresses":
                joins = " join address_fields af on (mm.message=af.message)" +
                    " join addresses a on (af.address=a.id)";
                columns = "af.part, af.position, af.field, af.number, a.name, a.localpart, a.domain, ";
                order = " order by mm.uid, af.part, af.field, af.number";
                break;
            case "otherheader":
                joins = " join header_fields hf on (mm.message=hf.message)" +
                    " join field_names fn on (hf.field=fn.id)";
                columns = "hf.part, hf.position, fn.name, hf.value, ";
                order = " order by mm.uid, hf.part";
                break;
            case "body":
                joins = " join part_numbers pn on (mm.message=pn.message)" +
                    " left join bodyparts bp on (pn.bodypart=bp.id)";
                columns = "pn.part, bp.text, bp.data, bp.bytes as rawbytes, pn.bytes, pn.lines, ";
                order = " order by mm.uid, pn.part";
                break;
            case "trivia":
                wanted.push("idate", "modseq");
                joins = " join messages m on (mm.message=m.id)";
                columns = "m.rfc822size, ";
                sorted = true;
                break;
        }

        const q = selector.query(mailbox.id, wanted, undefined, sorted);
        q.setString(q.string()
            .replace(" where ", `${joins} where `)
            .replace("select distinct mm.", `select distinct ${columns}mm.`) + order);
        return q;
    }

    private decodeRows(decoder: Decoder, q: Query): void {
        try {
            let row = q.nextRow();
            while (row) {
                for (const m of this.route(row)) {
                    if (!decoder.isDone(m)) decoder.decode(m, row);
                }
                row = q.nextRow();
            }
        } catch (error) {
            Logger.error(`Decoding ${decoder.kind} failed: ${describeError(error)}`, { facility: "fetcher" });
            if (!this.failure) this.failure = `${decoder.kind}: ${describeError(error)}`;
        }
        this.execute();
    }

    private route(row: Row): Message[] {
        const id = numericColumn(row, "message");
        if (id !== undefined) {
            const bucket = this.buckets[id % this.ctx.config.bucketCount];
            if (!bucket) return [];
            if (this.uniqueDatabaseIds) {
                const m = bucket.find(o => o.databaseId === id);
                return m ? [m] : [];
            }
            return bucket.filter(o => o.databaseId === id);
        }
        const uid = numericColumn(row, "uid");
        if (uid !== undefined) return this.byUid.get(uid) ?? [];
        return [];
    }

    private waitForEnd(): void {
        for (const q of this.queries.values()) {
            if (!q.done()) return;
        }

        const failedKinds = new Set<FetchKind>();
        for (const [kind, q] of this.queries) {
            if (!q.failed()) continue;
            failedKinds.add(kind);
            if (kind === "body") failedKinds.add("partnumbers");
            Logger.warn(`Could not fetch ${kind}: ${q.error()}`, { facility: "fetcher" });
            if (!this.failure) this.failure = `${kind}: ${q.error()}`;
        }
        this.queries.clear();

        const finished = this.batched ? this.batch : this.messages;
        for (const decoder of this.decoders.values()) {
            if (failedKinds.has(decoder.kind)) continue;
            for (const m of finished) decoder.setDone(m);
        }

        if (this.batched && this.cursor < this.queue.length) {
            this.prepareBatch();
            this.makeQueries();
            return;
        }
        this.finishRun();
    }

    private finishRun(): void {
        this.status = "done";
        this.messages = [];
        this.queue = [];
        this.cursor = 0;
        this.batch = [];
        this.batchIds = [];
        this.buckets = [];
        this.byUid = new Map();
        if (!this.customSelector) this.selector = undefined;

        if (this.pending.length === 0) this.mailbox?.forget(this);
        this.notifying = true;
        try {
            for (const owner of this.owners) {
                try {
                    owner.resume();
                } catch (error) {
                    Logger.error(`Fetcher owner failed: ${describeError(error)}`, { facility: "fetcher" });
                }
            }
        } finally {
            this.notifying = false;
        }
        if (this.pending.length > 0) {
            this.messages = this.pending;
            this.pending = [];
            this.status = "notStarted";
        }
    }
}

function appendDistinct(target: Message[], messages: Iterable<Message>): void {
    const seen = new Set(target);
    for (const m of messages) {
        if (seen.has(m)) continue;
        seen.add(m);
        target.push(m);
    }
}
