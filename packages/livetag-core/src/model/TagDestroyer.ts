/**
 * TagDestroyer - Removal of a node and its subtree from the arena
 */

import { handleTreeError } from "../errors.js";
import { removeChild } from "./ChildWriter.js";
import type { TreeContext } from "./context.js";

/**
 * Destroy a node: remove it from its parent (emitting the removed record
 * when due), dispose the renderers of its subtree and delete it.
 * Returns the ids of all destroyed nodes.
 */
export function destroy(ctx: TreeContext, id: string): string[] {
    const parentId = ctx.store.parentId(id);
    if (parentId !== null) {
        removeChild(ctx, parentId, id);
    }

    const destroyed = ctx.store.delete(id);
    for (const destroyedId of destroyed) {
        const renderer = ctx.runtime(destroyedId).renderer;
        try {
            renderer?.dispose?.();
        } catch (e) {
            handleTreeError("destroy", e, { id: destroyedId }, ctx.logger);
        }
    }
    return destroyed;
}
