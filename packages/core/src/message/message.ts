export interface FlagRef {
    id: number;
    name: string;
}

export interface Annotation {
    entryId: number;
    entryName: string;
    ownerId: number;
    value: string;
}

export interface HeaderField {
    name: string;
    value: string;
    position: number;
}

export interface Address {
    name: string;
    localpart: string;
    domain: string;
}

export interface AddressField {
    field: number;
    position: number;
    addresses: Address[];
}

export class Header {
    readonly fields: HeaderField[] = [];
    readonly addressFields: AddressField[] = [];

    add(field: HeaderField): void {
        this.fields.push(field);
        this.fields.sort((a, b) => a.position - b.position);
    }

    field(name: string): HeaderField | undefined {
        const lower = name.toLowerCase();
        return this.fields.find(f => f.name.toLowerCase() === lower);
    }

    /** Returns the address field of the given type at position, creating it. */
    addressField(field: number, position: number): AddressField {
        let existing = this.addressFields.find(f => f.field === field && f.position === position);
        if (!existing) {
            existing = { field, position, addresses: [] };
            this.addressFields.push(existing);
            this.addressFields.sort((a, b) => a.position - b.position);
        }
        return existing;
    }
}

export class Bodypart {
    readonly header = new Header();
    data: Buffer | undefined;
    text: string | undefined;
    numBytes = 0;
    numEncodedBytes = 0;
    numEncodedLines = 0;
    /** Set for message/rfc822 parts. */
    embedded: Message | undefined;

    constructor(readonly partNumber: string) { }

    embeddedMessage(): Message {
        if (!this.embedded) this.embedded = new Message();
        return this.embedded;
    }
}

export type FetchedAspect =
    | "flags"
    | "annotations"
    | "addresses"
    | "headers"
    | "bodies"
    | "bytesAndLines"
    | "trivia";

/**
 * A message as the store knows it. Most of the data is filled in lazily by
 * a Fetcher; the fetched markers say which parts are complete.
 */
export class Message {
    uid = 0;
    databaseId = 0;
    rfc822Size = 0;
    internalDate = 0;
    modSeq = 0n;
    readonly flags: FlagRef[] = [];
    readonly annotations: Annotation[] = [];
    readonly header = new Header();
    readonly bodyparts = new Map<string, Bodypart>();
    private fetched = new Set<FetchedAspect>();

    constructor(init: { uid?: number; databaseId?: number } = {}) {
        this.uid = init.uid ?? 0;
        this.databaseId = init.databaseId ?? 0;
    }

    has(aspect: FetchedAspect): boolean {
        return this.fetched.has(aspect);
    }

    markFetched(aspect: FetchedAspect): void {
        this.fetched.add(aspect);
    }

    /** Returns false when the flag was already present. */
    addFlag(flag: FlagRef): boolean {
        if (this.flags.some(f => f.id === flag.id)) return false;
        this.flags.push(flag);
        return true;
    }

    replaceAnnotation(annotation: Annotation): void {
        const index = this.annotations.findIndex(
            a => a.entryId === annotation.entryId && a.ownerId === annotation.ownerId,
        );
        if (index >= 0) {
            this.annotations[index] = annotation;
        } else {
            this.annotations.push(annotation);
        }
    }

    bodypart(partNumber: string, create: true): Bodypart;
    bodypart(partNumber: string, create?: boolean): Bodypart | undefined;
    bodypart(partNumber: string, create = false): Bodypart | undefined {
        let part = this.bodyparts.get(partNumber);
        if (!part && create) {
            part = new Bodypart(partNumber);
            this.bodyparts.set(partNumber, part);
        }
        return part;
    }

    /**
     * The header a part number refers to: "" is the top-level header,
     * "2.rfc822" the header of the message embedded in part 2, anything
     * else the MIME header of that part.
     */
    headerFor(partNumber: string): Header {
        if (partNumber === "") return this.header;
        if (partNumber.endsWith(".rfc822")) {
            return this.bodypart(partNumber.slice(0, -".rfc822".length), true).embeddedMessage().header;
        }
        return this.bodypart(partNumber, true).header;
    }
}
