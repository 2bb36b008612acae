/**
 * AttributeWriter - Attribute mutations on tags
 */

import { cloneValue, coerceAttribute, sameValue } from "../attributes.js";
import { LivetagError } from "../errors.js";
import type { AttributeInput, AttributeValue } from "../types.js";
import type { TreeContext } from "./context.js";
import { requireTag } from "./TagReader.js";

/**
 * Set one attribute on a tag.
 *
 * The model is always updated. Only an active tag forwards the value to its
 * renderer and emits an update record; the record is built after the
 * renderer has been updated.
 */
export function setAttribute(
    ctx: TreeContext,
    id: string,
    name: string,
    value: AttributeValue
): void {
    requireTag(ctx.store, id, "setAttribute");
    if (name === "id") {
        throw new LivetagError("Tag ids cannot be changed", "setAttribute", { id, value });
    }

    const coerced = coerceAttribute(name, value);
    if (sameValue(ctx.store.getAttribute(id, name), coerced)) return;
    ctx.store.setAttribute(id, name, coerced);

    const runtime = ctx.runtime(id);
    if (!runtime.active || !runtime.apply) return;

    runtime.apply(name, cloneValue(coerced));
    ctx.dispatch(id, {
        id,
        kind: "update",
        name,
        value: cloneValue(coerced),
    });
}

/**
 * Set several attributes in order. Undefined values are skipped.
 */
export function applyAttributes(ctx: TreeContext, id: string, attributes: AttributeInput): void {
    for (const [name, value] of Object.entries(attributes)) {
        if (value !== undefined) {
            setAttribute(ctx, id, name, value);
        }
    }
}
