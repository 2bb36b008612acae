/**
 * Lifecycle - Activation and rendering of tags
 */

import { LivetagError } from "../errors.js";
import { bindSetters, type TagRenderer } from "../renderer.js";
import type { AttributeInput } from "../types.js";
import { applyAttributes } from "./AttributeWriter.js";
import type { TreeContext } from "./context.js";
import { getTagChildIds, requireTag } from "./TagReader.js";

/**
 * Prepare a tag for rendering.
 *
 * Applies the given attributes, binds the renderer once and activates the
 * tag together with its tag descendants. Calling it on an active tag only
 * applies the attributes.
 */
export function prepare(ctx: TreeContext, id: string, attributes?: AttributeInput): void {
    requireTag(ctx.store, id, "prepare");
    if (attributes) {
        applyAttributes(ctx, id, attributes);
    }

    const runtime = ctx.runtime(id);
    if (runtime.active) return;

    // Bind only once the whole subtree is prepared: a failure below must
    // leave this tag unbound.
    for (const childId of getTagChildIds(ctx.store, id)) {
        prepare(ctx, childId);
    }
    if (!runtime.renderer) {
        const renderer = ctx.createRenderer(id);
        runtime.renderer = renderer;
        runtime.apply = bindSetters(renderer);
    }
    runtime.active = true;
}

/**
 * Render a tag and all its children to markup
 */
export function render(ctx: TreeContext, id: string, attributes?: AttributeInput): string {
    prepare(ctx, id, attributes);
    return requireRenderer(ctx, id, "render").render();
}

export function requireRenderer(ctx: TreeContext, id: string, operation: string): TagRenderer {
    const renderer = ctx.runtime(id).renderer;
    if (!renderer) {
        throw new LivetagError(`Tag "${id}" has no renderer; prepare it first`, operation, { id });
    }
    return renderer;
}
