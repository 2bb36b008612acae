import { describe, expect, it } from "vitest";
import { LivetagError } from "../errors.js";
import { LoroTreeStore } from "./LoroTreeStore.js";

function storeWith(...ids: string[]): LoroTreeStore {
    const store = new LoroTreeStore();
    for (const id of ids) {
        store.createNode("tag", id);
    }
    return store;
}

describe("LoroTreeStore", () => {
    describe("createNode", () => {
        it("should use the given id", () => {
            const store = new LoroTreeStore();
            expect(store.createNode("document", "doc")).toBe("doc");
            expect(store.has("doc")).toBe(true);
            expect(store.kind("doc")).toBe("document");
            expect(store.parentId("doc")).toBeNull();
        });

        it("should derive an id when none is given", () => {
            const store = new LoroTreeStore(7n);
            const id = store.createNode("tag");
            expect(id).toContain("@");
            expect(store.has(id)).toBe(true);
        });

        it("should reject empty and duplicate ids", () => {
            const store = storeWith("a");
            expect(() => store.createNode("tag", "a")).toThrow(LivetagError);
            expect(() => store.createNode("tag", "")).toThrow(LivetagError);
        });

        it("should give pattern nodes no attributes", () => {
            const store = new LoroTreeStore();
            store.createNode("pattern", "p");
            expect(() => store.getAttribute("p", "tag")).toThrow(LivetagError);
        });
    });

    describe("attach", () => {
        it("should place children at the given index", () => {
            const store = storeWith("root", "a", "b", "c");
            store.attach("a", "root", 0);
            store.attach("b", "root", 1);
            store.attach("c", "root", 0);

            expect(store.childIds("root")).toEqual(["c", "a", "b"]);
            expect(store.parentId("c")).toBe("root");
        });

        it("should report ancestry", () => {
            const store = storeWith("root", "a", "b");
            store.attach("a", "root", 0);
            store.attach("b", "a", 0);

            expect(store.isAncestorOrSelf("root", "b")).toBe(true);
            expect(store.isAncestorOrSelf("b", "b")).toBe(true);
            expect(store.isAncestorOrSelf("b", "root")).toBe(false);
        });
    });

    describe("detach", () => {
        it("should make the node a root again", () => {
            const store = storeWith("root", "a", "b");
            store.attach("a", "root", 0);
            store.attach("b", "root", 1);
            store.detach("a");

            expect(store.childIds("root")).toEqual(["b"]);
            expect(store.parentId("a")).toBeNull();
        });

        it("should allow reattaching at a new position", () => {
            const store = storeWith("root", "a", "b", "c");
            store.attach("a", "root", 0);
            store.attach("b", "root", 1);
            store.attach("c", "root", 2);
            store.detach("a");
            store.attach("a", "root", 2);

            expect(store.childIds("root")).toEqual(["b", "c", "a"]);
        });
    });

    describe("attributes", () => {
        it("should store and read back values", () => {
            const store = storeWith("a");
            store.setAttribute("a", "tag", "p");
            store.setAttribute("a", "cls", ["x", "y"]);
            store.setAttribute("a", "style", { color: "red" });
            store.setAttribute("a", "clickable", true);

            expect(store.getAttribute("a", "tag")).toBe("p");
            expect(store.getAttribute("a", "cls")).toEqual(["x", "y"]);
            expect(store.getAttribute("a", "missing")).toBeUndefined();
            expect(Object.fromEntries(store.attributeEntries("a"))).toEqual({
                tag: "p",
                cls: ["x", "y"],
                style: { color: "red" },
                clickable: true,
            });
        });
    });

    describe("delete", () => {
        it("should delete the whole subtree", () => {
            const store = storeWith("root", "a", "b", "c");
            store.attach("a", "root", 0);
            store.attach("b", "a", 0);
            store.attach("c", "a", 1);

            expect(store.delete("a")).toEqual(["a", "b", "c"]);
            expect(store.has("a")).toBe(false);
            expect(store.has("c")).toBe(false);
            expect(store.childIds("root")).toEqual([]);
        });

        it("should reject access to deleted nodes", () => {
            const store = storeWith("a");
            store.delete("a");
            expect(() => store.kind("a")).toThrow(LivetagError);
        });
    });
});
