import { describe, expect, it } from "vitest";
import { Message } from "../../src/message/message.js";

describe("Message", () => {
    it("should keep one copy of each flag", () => {
        const m = new Message({ uid: 4 });

        expect(m.addFlag({ id: 1, name: "\\Seen" })).toBe(true);
        expect(m.addFlag({ id: 1, name: "\\Seen" })).toBe(false);
        expect(m.flags).toEqual([{ id: 1, name: "\\Seen" }]);
    });

    it("should replace annotations per entry and owner", () => {
        const m = new Message();
        m.replaceAnnotation({ entryId: 2, entryName: "/comment", ownerId: 0, value: "first" });
        m.replaceAnnotation({ entryId: 2, entryName: "/comment", ownerId: 5, value: "private" });
        m.replaceAnnotation({ entryId: 2, entryName: "/comment", ownerId: 0, value: "second" });

        expect(m.annotations.map(a => a.value)).toEqual(["second", "private"]);
    });

    it("should track which aspects were fetched", () => {
        const m = new Message();
        m.markFetched("flags");

        expect(m.has("flags")).toBe(true);
        expect(m.has("bodies")).toBe(false);
    });

    it("should find the header a part number refers to", () => {
        const m = new Message();

        expect(m.headerFor("")).toBe(m.header);
        expect(m.headerFor("1")).toBe(m.bodypart("1")?.header);
        expect(m.headerFor("2.rfc822")).toBe(m.bodypart("2")?.embedded?.header);
        expect(m.bodypart("3")).toBeUndefined();
    });

    it("should keep header fields in position order", () => {
        const m = new Message();
        m.header.add({ name: "Subject", value: "hi", position: 3 });
        m.header.add({ name: "Received", value: "from a", position: 1 });

        expect(m.header.fields.map(f => f.name)).toEqual(["Received", "Subject"]);
        expect(m.header.field("subject")?.value).toBe("hi");
    });

    it("should group addresses by field and position", () => {
        const m = new Message();
        m.header.addressField(2, 5).addresses.push({ name: "", localpart: "b", domain: "example.org" });
        m.header.addressField(1, 4).addresses.push({ name: "A", localpart: "a", domain: "example.org" });
        m.header.addressField(2, 5).addresses.push({ name: "", localpart: "c", domain: "example.org" });

        expect(m.header.addressFields.map(f => [f.field, f.position, f.addresses.length])).toEqual([[1, 4, 1], [2, 5, 2]]);
    });
});
