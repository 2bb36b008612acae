/**
 * MarkupRenderer - reference renderer producing a markup string
 *
 * Keeps its own copy of the tag's attributes, updated through setters, and
 * reads its children's renderers from the binding when rendering.
 */

import { isStringArray, isStringRecord } from "./attributes.js";
import type { AttributeSetters, RendererBinding, TagRenderer } from "./renderer.js";
import type { AttributeValue } from "./types.js";
import { evaluateQuery, type QueryAdapter } from "./xpath.js";

const VOID_ELEMENTS = new Set([
    "area", "base", "br", "col", "embed", "hr", "img", "input",
    "link", "meta", "source", "track", "wbr",
]);

export function escapeText(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;");
}

export function escapeAttribute(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/"/g, "&quot;");
}

/**
 * Markup form of an attribute value; undefined when it should be omitted
 */
export function serializeValue(value: AttributeValue): string | undefined {
    if (typeof value === "string") return value === "" ? undefined : value;
    if (typeof value === "number") return String(value);
    if (typeof value === "boolean") return value ? "true" : undefined;
    if (Array.isArray(value)) return value.length > 0 ? value.join(" ") : undefined;

    const entries = Object.entries(value);
    return entries.length > 0 ? entries.map(([k, v]) => `${k}:${v}`).join(";") : undefined;
}

const queryAdapter: QueryAdapter<TagRenderer> = {
    children: (node) => (node instanceof MarkupRenderer ? node.children() : []),
    name: (node) => (node instanceof MarkupRenderer ? node.tagName : ""),
    attribute: (node, name) => (node instanceof MarkupRenderer ? node.getAttribute(name) : undefined),
};

export class MarkupRenderer implements TagRenderer {
    readonly setters: AttributeSetters;

    private readonly binding: RendererBinding;
    private _tagName = "div";
    private text = "";
    private tail = "";
    private cls: string[] = [];
    private style: Record<string, string> = {};
    private attrs: Record<string, string> = {};
    private readonly properties = new Map<string, AttributeValue>();

    constructor(binding: RendererBinding) {
        this.binding = binding;
        this.setters = {
            tag: (value) => {
                if (typeof value === "string") this._tagName = value;
            },
            text: (value) => {
                this.text = typeof value === "string" ? value : String(value);
            },
            tail: (value) => {
                this.tail = typeof value === "string" ? value : String(value);
            },
            cls: (value) => {
                this.cls = isStringArray(value) ? [...value] : [];
            },
            style: (value) => {
                this.style = isStringRecord(value) ? { ...value } : {};
            },
            attrs: (value) => {
                this.attrs = isStringRecord(value) ? { ...value } : {};
            },
        };

        for (const [name, value] of Object.entries(binding.state)) {
            const setter = this.setters[name];
            if (setter) {
                setter(value);
            } else {
                this.setAttribute(name, value);
            }
        }
    }

    get id(): string {
        return this.binding.id;
    }

    get tagName(): string {
        return this._tagName;
    }

    children(): TagRenderer[] {
        return this.binding.children();
    }

    setAttribute(name: string, value: AttributeValue): void {
        this.properties.set(name, value);
    }

    /**
     * Attributes in markup order: id, class, style, then the rest by name.
     * Declared attributes win over entries of the same name in `attrs`.
     */
    markupAttributes(): Array<[string, string]> {
        const result: Array<[string, string]> = [["id", this.id]];
        const cls = serializeValue(this.cls);
        if (cls !== undefined) result.push(["class", cls]);
        const style = serializeValue(this.style);
        if (style !== undefined) result.push(["style", style]);

        const rest = new Map<string, string>(Object.entries(this.attrs));
        for (const [name, value] of this.properties) {
            const serialized = serializeValue(value);
            if (serialized === undefined) {
                rest.delete(name);
            } else {
                rest.set(name, serialized);
            }
        }
        const names = [...rest.keys()].filter((n) => n !== "id" && n !== "class" && n !== "style").sort();
        for (const name of names) {
            const value = rest.get(name);
            if (value !== undefined) result.push([name, value]);
        }
        return result;
    }

    getAttribute(name: string): string | undefined {
        return this.markupAttributes().find(([n]) => n === name)?.[1];
    }

    render(): string {
        const attributes = this.markupAttributes()
            .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
            .join("");
        const children = this.children();
        const tail = escapeText(this.tail);

        if (VOID_ELEMENTS.has(this._tagName) && children.length === 0 && this.text === "") {
            return `<${this._tagName}${attributes} />${tail}`;
        }

        const inner = children.map((child) => child.render()).join("");
        return `<${this._tagName}${attributes}>${escapeText(this.text)}${inner}</${this._tagName}>${tail}`;
    }

    /**
     * Nothing to move: `render` reads the live children from the binding,
     * which the tree has already reordered. Only its own children are
     * accepted.
     */
    childMoved(child: TagRenderer): boolean {
        return this.children().includes(child);
    }

    xpath(query: string): TagRenderer[] {
        return evaluateQuery<TagRenderer>(this, query, queryAdapter);
    }
}
