type Range = [number, number];

/** A set of uids kept as sorted, disjoint, non-adjacent ranges. */
export class MessageSet {
    private spans: Range[] = [];

    static of(uids: Iterable<number>): MessageSet {
        const set = new MessageSet();
        for (const uid of uids) set.add(uid);
        return set;
    }

    add(uid: number): void {
        this.addRange(uid, uid);
    }

    addRange(first: number, last: number): void {
        if (!Number.isInteger(first) || !Number.isInteger(last) || first < 1 || last < first) {
            throw new RangeError(`Invalid uid range ${first}:${last}`);
        }
        const merged: Range[] = [];
        let lo = first;
        let hi = last;
        let placed = false;
        for (const [a, b] of this.spans) {
            if (b + 1 < lo) {
                merged.push([a, b]);
            } else if (hi + 1 < a) {
                if (!placed) {
                    merged.push([lo, hi]);
                    placed = true;
                }
                merged.push([a, b]);
            } else {
                lo = Math.min(lo, a);
                hi = Math.max(hi, b);
            }
        }
        if (!placed) merged.push([lo, hi]);
        this.spans = merged;
    }

    contains(uid: number): boolean {
        return this.spans.some(([a, b]) => a <= uid && uid <= b);
    }

    /** True if any uid in first..last is in this set. */
    overlaps(first: number, last: number): boolean {
        return this.spans.some(([a, b]) => a <= last && first <= b);
    }

    count(): number {
        return this.spans.reduce((sum, [a, b]) => sum + b - a + 1, 0);
    }

    isEmpty(): boolean {
        return this.spans.length === 0;
    }

    /** True for a single contiguous range. */
    isRange(): boolean {
        return this.spans.length === 1;
    }

    smallest(): number {
        return this.spans[0]?.[0] ?? 0;
    }

    largest(): number {
        return this.spans[this.spans.length - 1]?.[1] ?? 0;
    }

    ranges(): ReadonlyArray<readonly [number, number]> {
        return this.spans;
    }

    *values(): IterableIterator<number> {
        for (const [a, b] of this.spans) {
            for (let uid = a; uid <= b; uid++) yield uid;
        }
    }

    /**
     * Fills each gap between this set's ranges that holds none of the uids
     * in other. Those uids are known not to exist, so the set selects the
     * same messages with fewer ranges.
     */
    addGapsFrom(other: MessageSet): void {
        const gaps: Range[] = [];
        for (let i = 1; i < this.spans.length; i++) {
            const previous = this.spans[i - 1];
            const current = this.spans[i];
            if (!previous || !current) continue;
            const first = previous[1] + 1;
            const last = current[0] - 1;
            if (!other.overlaps(first, last)) gaps.push([first, last]);
        }
        for (const [first, last] of gaps) this.addRange(first, last);
    }

    /** An SQL condition matching the set, e.g. "(uid>=1 and uid<=4 or uid=9)". */
    where(column = "uid"): string {
        if (this.spans.length === 0) return "false";
        const parts = this.spans.map(([a, b]) =>
            a === b ? `${column}=${a}` : `${column}>=${a} and ${column}<=${b}`);
        if (parts.length === 1) return parts[0] ?? "false";
        return `(${parts.join(" or ")})`;
    }

    toString(): string {
        return this.spans.map(([a, b]) => (a === b ? `${a}` : `${a}:${b}`)).join(",");
    }
}
