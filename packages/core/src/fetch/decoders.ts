import { z } from "zod";
import type { Row } from "@mailstore/shared/executor/interface.js";
import { Logger } from "../logger.js";
import type { Message } from "../message/message.js";
import type { NameRegistries } from "../message/name-registry.js";

export type FetchKind =
    | "flags"
    | "annotations"
    | "addresses"
    | "otherheader"
    | "body"
    | "trivia"
    | "partnumbers";

export const FETCH_KINDS: readonly FetchKind[] = [
    "flags",
    "annotations",
    "addresses",
    "otherheader",
    "body",
    "trivia",
    "partnumbers",
];

/**
 * Turns rows of one kind into changes to a Message. isDone() lets the
 * Fetcher skip messages whose data is already complete, and setDone()
 * records completeness once a round is over, whether or not any row
 * arrived for the message.
 */
export interface Decoder {
    readonly kind: FetchKind;
    decode(message: Message, row: Row): void;
    setDone(message: Message): void;
    isDone(message: Message): boolean;
}

const id = z.coerce.number().int();
const count = z.coerce.number().int().nullish();

const FlagRowSchema = z.object({ flag: id.nullable() });

const AnnotationRowSchema = z.object({
    id,
    name: z.string(),
    owner: id.nullish(),
    value: z.string(),
});

const AddressRowSchema = z.object({
    part: z.string(),
    position: id,
    field: id,
    name: z.string().nullish(),
    localpart: z.string(),
    domain: z.string(),
});

const HeaderRowSchema = z.object({
    part: z.string(),
    position: id,
    name: z.string(),
    value: z.string(),
});

const PartNumberRowSchema = z.object({
    part: z.string(),
    bytes: count,
    lines: count,
});

const BodyRowSchema = PartNumberRowSchema.extend({
    text: z.string().nullish(),
    data: z.instanceof(Buffer).nullish(),
    rawbytes: count,
});

const TriviaRowSchema = z.object({
    rfc822size: id,
    idate: id.nullish(),
    modseq: z.coerce.bigint().nullish(),
});

/** Validates a row and hands it to apply(); malformed rows are logged and skipped. */
abstract class RowDecoder<S extends z.ZodTypeAny> implements Decoder {
    abstract readonly kind: FetchKind;

    constructor(private readonly schema: S) { }

    decode(message: Message, row: Row): void {
        const parsed = this.schema.safeParse(row);
        if (!parsed.success) {
            Logger.warn(`Skipping malformed ${this.kind} row for uid ${message.uid}`, {
                facility: "fetcher",
                issues: parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
            });
            return;
        }
        this.apply(message, parsed.data);
    }

    protected abstract apply(message: Message, row: z.output<S>): void;
    abstract setDone(message: Message): void;
    abstract isDone(message: Message): boolean;
}

export class FlagsDecoder extends RowDecoder<typeof FlagRowSchema> {
    readonly kind = "flags";

    constructor(private readonly registries: NameRegistries) {
        super(FlagRowSchema);
    }

    protected apply(message: Message, row: z.infer<typeof FlagRowSchema>): void {
        // A left join yields a null flag for messages without flags.
        if (row.flag === null) return;
        const flag = this.registries.flags.find(row.flag);
        if (!flag) {
            // Created after the registry was last loaded; picked up on the next fetch.
            Logger.debug(`Unknown flag id ${row.flag}`, { facility: "fetcher" });
            return;
        }
        message.addFlag(flag);
    }

    setDone(message: Message): void {
        message.markFetched("flags");
    }

    isDone(message: Message): boolean {
        return message.has("flags");
    }
}

export class AnnotationDecoder extends RowDecoder<typeof AnnotationRowSchema> {
    readonly kind = "annotations";

    constructor(private readonly registries: NameRegistries) {
        super(AnnotationRowSchema);
    }

    protected apply(message: Message, row: z.infer<typeof AnnotationRowSchema>): void {
        const names = this.registries.annotationNames;
        if (!names.find(row.id)) names.add(row.name, row.id);
        message.replaceAnnotation({
            entryId: row.id,
            entryName: row.name,
            ownerId: row.owner ?? 0,
            value: row.value,
        });
    }

    setDone(message: Message): void {
        message.markFetched("annotations");
    }

    isDone(message: Message): boolean {
        return message.has("annotations");
    }
}

export class AddressDecoder extends RowDecoder<typeof AddressRowSchema> {
    readonly kind = "addresses";

    constructor() {
        super(AddressRowSchema);
    }

    protected apply(message: Message, row: z.infer<typeof AddressRowSchema>): void {
        message.headerFor(row.part).addressField(row.field, row.position).addresses.push({
            name: row.name ?? "",
            localpart: row.localpart,
            domain: row.domain,
        });
    }

    setDone(message: Message): void {
        message.markFetched("addresses");
    }

    isDone(message: Message): boolean {
        return message.has("addresses");
    }
}

export class HeaderDecoder extends RowDecoder<typeof HeaderRowSchema> {
    readonly kind = "otherheader";

    constructor() {
        super(HeaderRowSchema);
    }

    protected apply(message: Message, row: z.infer<typeof HeaderRowSchema>): void {
        message.headerFor(row.part).add({ name: row.name, value: row.value, position: row.position });
    }

    setDone(message: Message): void {
        message.markFetched("headers");
    }

    isDone(message: Message): boolean {
        return message.has("headers");
    }
}

function applyPartNumber(message: Message, row: z.infer<typeof PartNumberRowSchema>): void {
    if (row.part.endsWith(".rfc822")) {
        message.bodypart(row.part.slice(0, -".rfc822".length), true).embeddedMessage();
        return;
    }
    const part = message.bodypart(row.part, true);
    if (row.bytes !== null && row.bytes !== undefined) part.numEncodedBytes = row.bytes;
    if (row.lines !== null && row.lines !== undefined) part.numEncodedLines = row.lines;
}

export class PartNumberDecoder extends RowDecoder<typeof PartNumberRowSchema> {
    readonly kind = "partnumbers";

    constructor() {
        super(PartNumberRowSchema);
    }

    protected apply(message: Message, row: z.infer<typeof PartNumberRowSchema>): void {
        applyPartNumber(message, row);
    }

    setDone(message: Message): void {
        message.markFetched("bytesAndLines");
    }

    isDone(message: Message): boolean {
        return message.has("bytesAndLines");
    }
}

export class BodyDecoder extends RowDecoder<typeof BodyRowSchema> {
    readonly kind = "body";

    constructor() {
        super(BodyRowSchema);
    }

    protected apply(message: Message, row: z.infer<typeof BodyRowSchema>): void {
        applyPartNumber(message, row);
        if (row.part.endsWith(".rfc822")) return;
        const part = message.bodypart(row.part, true);
        if (row.data) {
            part.data = row.data;
        } else if (row.text !== null && row.text !== undefined) {
            part.text = row.text;
        }
        if (row.rawbytes !== null && row.rawbytes !== undefined) part.numBytes = row.rawbytes;
    }

    setDone(message: Message): void {
        message.markFetched("bodies");
        message.markFetched("bytesAndLines");
    }

    isDone(message: Message): boolean {
        return message.has("bodies") && message.has("bytesAndLines");
    }
}

export class TriviaDecoder extends RowDecoder<typeof TriviaRowSchema> {
    readonly kind = "trivia";

    constructor() {
        super(TriviaRowSchema);
    }

    protected apply(message: Message, row: z.infer<typeof TriviaRowSchema>): void {
        message.rfc822Size = row.rfc822size;
        if (row.idate !== null && row.idate !== undefined) message.internalDate = row.idate;
        if (row.modseq !== null && row.modseq !== undefined) message.modSeq = row.modseq;
    }

    setDone(message: Message): void {
        message.markFetched("trivia");
    }

    isDone(message: Message): boolean {
        return message.has("trivia") || message.rfc822Size > 0;
    }
}

export function createDecoder(kind: FetchKind, registries: NameRegistries): Decoder {
    switch (kind) {
        case "flags":
            return new FlagsDecoder(registries);
        case "annotations":
            return new AnnotationDecoder(registries);
        case "addresses":
            return new AddressDecoder();
        case "otherheader":
            return new HeaderDecoder();
        case "body":
            return new BodyDecoder();
        case "trivia":
            return new TriviaDecoder();
        case "partnumbers":
            return new PartNumberDecoder();
    }
}
