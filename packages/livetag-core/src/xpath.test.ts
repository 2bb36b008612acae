import { describe, expect, it } from "vitest";
import { LivetagError } from "./errors.js";
import { evaluateQuery, parseQuery, type QueryAdapter } from "./xpath.js";

interface TreeNode {
    name: string;
    attrs: Record<string, string>;
    children: TreeNode[];
}

function node(name: string, attrs: Record<string, string> = {}, children: TreeNode[] = []): TreeNode {
    return { name, attrs, children };
}

const adapter: QueryAdapter<TreeNode> = {
    children: (n) => n.children,
    name: (n) => n.name,
    attribute: (n, name) => n.attrs[name],
};

describe("parseQuery", () => {
    it("should parse child and descendant steps", () => {
        expect(parseQuery("/ul//li")).toEqual([
            { axis: "child", name: "ul" },
            { axis: "descendant", name: "li" },
        ]);
    });

    it("should ignore a leading dot", () => {
        expect(parseQuery(".//*")).toEqual([{ axis: "descendant", name: "*" }]);
    });

    it("should parse predicates", () => {
        expect(parseQuery('//a[@href="/x"]')).toEqual([
            { axis: "descendant", name: "a", predicate: { attribute: "href", value: "/x" } },
        ]);
        expect(parseQuery("/a[@title='t']")).toEqual([
            { axis: "child", name: "a", predicate: { attribute: "title", value: "t" } },
        ]);
        expect(parseQuery("/a[@title]")).toEqual([
            { axis: "child", name: "a", predicate: { attribute: "title" } },
        ]);
    });

    it("should reject unsupported queries", () => {
        expect(() => parseQuery("li")).toThrow(LivetagError);
        expect(() => parseQuery("//li[1]")).toThrow(LivetagError);
        expect(() => parseQuery("")).toThrow(LivetagError);
        expect(() => parseQuery(".")).toThrow("Empty query");
    });
});

describe("evaluateQuery", () => {
    const inner = node("span", { class: "x" });
    const outer = node("span", {}, [inner]);
    const item = node("li", { class: "x" }, [outer]);
    const root = node("div", {}, [node("ul", {}, [item])]);

    it("should collect descendants in document order", () => {
        expect(evaluateQuery(root, "//span", adapter)).toEqual([outer, inner]);
    });

    it("should not return the same node twice", () => {
        const result = evaluateQuery(root, "//*//span", adapter);
        expect(result).toEqual([outer, inner]);
    });

    it("should filter by attribute value", () => {
        expect(evaluateQuery(root, '//*[@class="x"]', adapter)).toEqual([item, inner]);
    });

    it("should return nothing when no step matches", () => {
        expect(evaluateQuery(root, "/li", adapter)).toEqual([]);
    });
});
