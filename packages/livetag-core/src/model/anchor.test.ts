import { describe, expect, it } from "vitest";
import { resolveAnchor } from "./anchor.js";

const patterns = new Set(["p1", "p2"]);
const isTag = (id: string): boolean => !patterns.has(id);

describe("resolveAnchor", () => {
    it("should return the next sibling", () => {
        expect(resolveAnchor(["a", "b", "c"], "a", isTag)).toBe("b");
    });

    it("should return undefined for the last child", () => {
        expect(resolveAnchor(["a", "b", "c"], "c", isTag)).toBeUndefined();
    });

    it("should skip pattern siblings", () => {
        expect(resolveAnchor(["a", "p1", "b"], "a", isTag)).toBe("b");
        expect(resolveAnchor(["a", "p1", "p2"], "a", isTag)).toBeUndefined();
    });

    it("should return undefined for a child that is not listed", () => {
        expect(resolveAnchor(["a", "b"], "z", isTag)).toBeUndefined();
    });
});
