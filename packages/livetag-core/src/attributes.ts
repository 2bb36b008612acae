/**
 * Attribute defaults, validation and coercion
 */

import { LivetagError } from "./errors.js";
import type { AttributeValue, DeclaredAttribute, TagAttributes, TagState } from "./types.js";

const STRING_ATTRIBUTES = new Set<string>([
    "tag",
    "text",
    "tail",
    "alt",
    "onclick",
    "ondragstart",
    "ondragover",
    "ondrop",
]);

const BOOLEAN_ATTRIBUTES = new Set<string>(["clickable", "draggable"]);

const RECORD_ATTRIBUTES = new Set<string>(["style", "attrs"]);

const MARKUP_NAME = /^[A-Za-z_][\w.:-]*$/;

/**
 * Default values of the declared attributes
 */
export function defaultAttributes(tag: string): TagAttributes {
    return {
        tag,
        text: "",
        tail: "",
        cls: [],
        style: {},
        attrs: {},
        alt: "",
        onclick: "",
        clickable: false,
        draggable: false,
        ondragstart: "",
        ondragover: "",
        ondrop: "",
    };
}

export function isDeclaredAttribute(name: string): name is DeclaredAttribute {
    return (
        STRING_ATTRIBUTES.has(name) ||
        BOOLEAN_ATTRIBUTES.has(name) ||
        RECORD_ATTRIBUTES.has(name) ||
        name === "cls"
    );
}

/**
 * Whether a string can be written as an element or attribute name
 */
export function isMarkupName(name: string): boolean {
    return MARKUP_NAME.test(name);
}

export function isStringRecord(value: unknown): value is Record<string, string> {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return false;
    }
    return Object.values(value).every((v) => typeof v === "string");
}

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Narrow a value read back from the arena
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
    switch (typeof value) {
        case "string":
        case "boolean":
            return true;
        case "number":
            return Number.isFinite(value);
        default:
            return isStringArray(value) || isStringRecord(value);
    }
}

/**
 * Coerce a value for the named attribute, rejecting values the attribute
 * cannot hold. Names must be valid markup names; free-form attributes take
 * any storable AttributeValue.
 */
export function coerceAttribute(name: string, value: AttributeValue): AttributeValue {
    if (!isMarkupName(name)) {
        throw new LivetagError(`Invalid attribute name "${name}"`, "setAttribute", { name, value });
    }
    if (BOOLEAN_ATTRIBUTES.has(name)) {
        return Array.isArray(value) ? value.length > 0 : Boolean(value);
    }
    if (STRING_ATTRIBUTES.has(name)) {
        if (typeof value !== "string") {
            throw new LivetagError(`Attribute "${name}" must be a string`, "setAttribute", { name, value });
        }
        if (name === "tag" && value.trim() === "") {
            throw new LivetagError("Tag name must not be empty", "setAttribute", { name, value });
        }
        if (name === "tag" && !isMarkupName(value)) {
            throw new LivetagError(`Invalid tag name "${value}"`, "setAttribute", { name, value });
        }
        return value;
    }
    if (name === "cls") {
        if (typeof value === "string") {
            return value.split(/\s+/).filter((c) => c !== "");
        }
        if (!isStringArray(value)) {
            throw new LivetagError(`Attribute "cls" must be a string or a string array`, "setAttribute", { value });
        }
        return [...value];
    }
    if (RECORD_ATTRIBUTES.has(name)) {
        if (!isStringRecord(value)) {
            throw new LivetagError(`Attribute "${name}" must be a record of strings`, "setAttribute", { name, value });
        }
        const invalid = name === "attrs" ? Object.keys(value).find((key) => !isMarkupName(key)) : undefined;
        if (invalid !== undefined) {
            throw new LivetagError(`Invalid attribute name "${invalid}"`, "setAttribute", { name, value });
        }
        return { ...value };
    }
    if (!isAttributeValue(value)) {
        throw new LivetagError(`Attribute "${name}" has an unsupported value`, "setAttribute", { name, value });
    }
    return cloneValue(value);
}

/**
 * Copy arrays and records so that renderers never alias model state
 */
export function cloneValue(value: AttributeValue): AttributeValue {
    if (Array.isArray(value)) return [...value];
    if (typeof value === "object") return { ...value };
    return value;
}

export function sameValue(a: AttributeValue | undefined, b: AttributeValue | undefined): boolean {
    if (a === b) return true;
    if (a === undefined || b === undefined) return false;
    if (Array.isArray(a) || Array.isArray(b)) {
        return Array.isArray(a) && Array.isArray(b)
            && a.length === b.length && a.every((v, i) => v === b[i]);
    }
    if (typeof a === "object" && typeof b === "object") {
        const keys = Object.keys(a);
        return keys.length === Object.keys(b).length && keys.every((k) => a[k] === b[k]);
    }
    return false;
}

/**
 * Merge stored attribute values over the declared defaults
 */
export function buildState(stored: ReadonlyMap<string, AttributeValue>): TagState {
    const tag = stored.get("tag");
    const state: TagState = { ...defaultAttributes(typeof tag === "string" ? tag : "div") };
    for (const [name, value] of stored) {
        state[name] = cloneValue(value);
    }
    return state;
}
