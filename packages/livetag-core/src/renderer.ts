/**
 * Renderer capability contract
 *
 * A renderer is bound 1:1 to a tag when the tag is activated. It turns the
 * tag's state into markup and executes structural operations on whatever
 * backend it wraps. The tree only depends on this contract.
 */

import { UnsupportedCapabilityError } from "./errors.js";
import type { AttributeValue, TagState } from "./types.js";

export type AttributeSetter = (value: AttributeValue) => void;

/**
 * Explicit capability map: attribute name to setter
 */
export type AttributeSetters = Readonly<Partial<Record<string, AttributeSetter>>>;

/**
 * What a renderer is given when it is bound to a tag
 */
export interface RendererBinding {
    /** Id of the owning tag */
    readonly id: string;
    /** Attribute state at bind time */
    readonly state: Readonly<TagState>;
    /** Renderers of the tag's current tag children, in order */
    children(): TagRenderer[];
}

export interface TagRenderer {
    /** Specific setters, looked up by attribute name */
    readonly setters?: AttributeSetters;
    /** Render the tag and all its children */
    render(): string;
    /** Generic fallback for attributes without a specific setter */
    setAttribute?(name: string, value: AttributeValue): void;
    /** Perform a move of one of its children; false when it could not */
    childMoved?(child: TagRenderer): boolean;
    /** Structural query below this renderer */
    xpath?(query: string): TagRenderer[];
    /** Release backend resources when the tag is destroyed */
    dispose?(): void;
}

export type RendererFactory = (binding: RendererBinding) => TagRenderer;

export type AttributeDispatcher = (name: string, value: AttributeValue) => void;

/**
 * Resolve the setter dispatch of a renderer once, at bind time.
 * Names without a specific setter go to the generic fallback; when the
 * renderer has none the value stays model-only.
 */
export function bindSetters(renderer: TagRenderer): AttributeDispatcher {
    const setters = new Map<string, AttributeSetter>();
    for (const [name, setter] of Object.entries(renderer.setters ?? {})) {
        if (setter) setters.set(name, setter);
    }
    const fallback = renderer.setAttribute?.bind(renderer);

    return (name, value) => {
        const setter = setters.get(name);
        if (setter) {
            setter(value);
        } else if (fallback) {
            fallback(name, value);
        }
    };
}

/**
 * Ask a renderer to move a child, failing when it cannot
 */
export function requestChildMove(parent: TagRenderer, child: TagRenderer, context: Record<string, unknown>): boolean {
    if (!parent.childMoved) {
        throw new UnsupportedCapabilityError("childMoved", "moveChild", context);
    }
    return parent.childMoved(child);
}

export function runQuery(renderer: TagRenderer, query: string, context: Record<string, unknown>): TagRenderer[] {
    if (!renderer.xpath) {
        throw new UnsupportedCapabilityError("xpath", "xpath", context);
    }
    return renderer.xpath(query);
}
