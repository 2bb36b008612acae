import { describe, expect, it } from "vitest";
import { defaultAttributes } from "./attributes.js";
import { escapeAttribute, escapeText, MarkupRenderer, serializeValue } from "./MarkupRenderer.js";
import type { TagRenderer } from "./renderer.js";
import type { AttributeValue, TagState } from "./types.js";

function renderer(
    id: string,
    tag: string,
    extra: Record<string, AttributeValue> = {},
    children: TagRenderer[] = []
): MarkupRenderer {
    const state: TagState = { ...defaultAttributes(tag), ...extra };
    return new MarkupRenderer({ id, state, children: () => children });
}

describe("MarkupRenderer", () => {
    describe("render", () => {
        it("should render a bare tag with its id", () => {
            expect(renderer("t1", "div").render()).toBe('<div id="t1"></div>');
        });

        it("should render classes, styles and sorted attributes", () => {
            const r = renderer("t1", "div", {
                text: "a < b & c",
                tail: " tail",
                cls: ["x", "y"],
                style: { color: "red", "font-weight": "bold" },
                attrs: { "data-role": "card" },
                href: "/x?a=1&b=2",
                clickable: true,
            });

            expect(r.render()).toBe(
                '<div id="t1" class="x y" style="color:red;font-weight:bold" clickable="true" data-role="card" href="/x?a=1&amp;b=2">a &lt; b &amp; c</div> tail'
            );
        });

        it("should self-close empty void elements", () => {
            expect(renderer("t2", "br").render()).toBe('<br id="t2" />');
            expect(renderer("i", "img", { src: "a.png", alt: "A" }).render()).toBe('<img id="i" alt="A" src="a.png" />');
        });

        it("should render children in order", () => {
            const first = renderer("1", "li", { text: "x" });
            const second = renderer("2", "li", { text: "y" });
            const list = renderer("l", "ul", {}, [first, second]);

            expect(list.render()).toBe('<ul id="l"><li id="1">x</li><li id="2">y</li></ul>');
        });
    });

    describe("setters", () => {
        it("should expose specific setters for the structured attributes", () => {
            const r = renderer("t", "p");
            expect(Object.keys(r.setters).sort()).toEqual(["attrs", "cls", "style", "tag", "tail", "text"]);
        });

        it("should reflect setter updates", () => {
            const r = renderer("t", "p");
            r.setters.text?.("new");
            r.setters.tag?.("span");
            r.setters.cls?.(["c"]);

            expect(r.render()).toBe('<span id="t" class="c">new</span>');
        });

        it("should render generic attributes and drop empty ones", () => {
            const r = renderer("t", "p");
            r.setAttribute("title", "T");
            expect(r.render()).toBe('<p id="t" title="T"></p>');

            r.setAttribute("title", "");
            expect(r.render()).toBe('<p id="t"></p>');
        });

        it("should let attributes override entries of the attrs map", () => {
            const r = renderer("t", "p", { attrs: { title: "a", lang: "en" } });
            r.setAttribute("title", "b");

            expect(r.getAttribute("title")).toBe("b");
            expect(r.getAttribute("lang")).toBe("en");
            expect(r.getAttribute("missing")).toBeUndefined();
        });
    });

    describe("childMoved", () => {
        it("should only accept its own children", () => {
            const child = renderer("c", "li");
            const stranger = renderer("s", "li");
            const list = renderer("l", "ul", {}, [child]);

            expect(list.childMoved(child)).toBe(true);
            expect(list.childMoved(stranger)).toBe(false);
        });
    });

    describe("xpath", () => {
        const itemA = renderer("a", "li", { cls: ["item"] });
        const itemB = renderer("b", "li");
        const list = renderer("u", "ul", {}, [itemA, itemB]);
        const para = renderer("p", "p");
        const root = renderer("r", "div", {}, [list, para]);

        it("should find descendants by name", () => {
            expect(root.xpath("//li")).toEqual([itemA, itemB]);
        });

        it("should only look at children for a single slash", () => {
            expect(root.xpath("/li")).toEqual([]);
            expect(root.xpath(".//ul")).toEqual([list]);
        });

        it("should filter by attribute", () => {
            expect(root.xpath("/ul/li[@class='item']")).toEqual([itemA]);
            expect(root.xpath('//*[@id="p"]')).toEqual([para]);
            expect(root.xpath("//li[@class]")).toEqual([itemA]);
        });
    });
});

describe("serializeValue", () => {
    it("should omit empty and false values", () => {
        expect(serializeValue("")).toBeUndefined();
        expect(serializeValue(false)).toBeUndefined();
        expect(serializeValue([])).toBeUndefined();
        expect(serializeValue({})).toBeUndefined();
    });

    it("should serialize the other values", () => {
        expect(serializeValue(3)).toBe("3");
        expect(serializeValue(true)).toBe("true");
        expect(serializeValue(["a", "b"])).toBe("a b");
        expect(serializeValue({ a: "1", b: "2" })).toBe("a:1;b:2");
    });
});

describe("escaping", () => {
    it("should escape text", () => {
        expect(escapeText('<a href="x">&</a>')).toBe('&lt;a href="x"&gt;&amp;&lt;/a&gt;');
    });

    it("should escape attribute values", () => {
        expect(escapeAttribute('say "hi" & <go>')).toBe("say &quot;hi&quot; &amp; <go>");
    });
});
