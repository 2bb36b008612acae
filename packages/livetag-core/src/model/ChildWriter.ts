/**
 * ChildWriter - Structural mutations and their change records
 */

import { LivetagError } from "../errors.js";
import { requestChildMove } from "../renderer.js";
import { resolveAnchor } from "./anchor.js";
import type { TreeContext } from "./context.js";
import { render, requireRenderer } from "./Lifecycle.js";
import { isTag, requireTag } from "./TagReader.js";

function anchorOf(ctx: TreeContext, parentId: string, childId: string): { before?: string } {
    const before = resolveAnchor(ctx.store.childIds(parentId), childId, (id) => isTag(ctx.store, id));
    return before === undefined ? {} : { before };
}

function requireChildOf(ctx: TreeContext, parentId: string, childId: string, operation: string): void {
    if (ctx.store.parentId(childId) !== parentId) {
        throw new LivetagError(`Node "${childId}" is not a child of "${parentId}"`, operation, { parentId, childId });
    }
}

/**
 * Emit the added record for a tag child that is already in place
 */
function emitAdded(ctx: TreeContext, parentId: string, childId: string): void {
    const markup = render(ctx, childId);
    ctx.dispatch(parentId, {
        id: childId,
        kind: "added",
        name: "children",
        value: markup,
        parent: parentId,
        ...anchorOf(ctx, parentId, childId),
    });
}

/**
 * Insert a node into a tag's children.
 *
 * `index` ranges over 0..n for the parent's current n children, n meaning
 * the end. A node that already belongs to this parent is moved instead; a
 * node belonging to another parent is removed from it first.
 */
export function insertChild(
    ctx: TreeContext,
    parentId: string,
    childId: string,
    index?: number
): void {
    requireTag(ctx.store, parentId, "insertChild");
    if (ctx.store.isAncestorOrSelf(childId, parentId)) {
        throw new LivetagError(`Inserting "${childId}" into "${parentId}" would create a cycle`, "insertChild", { parentId, childId });
    }

    const count = ctx.store.childIds(parentId).length;
    const position = index ?? count;
    if (!Number.isInteger(position) || position < 0 || position > count) {
        throw new LivetagError(`Index ${position} is out of range`, "insertChild", { parentId, childId, index });
    }

    const currentParentId = ctx.store.parentId(childId);
    if (currentParentId === parentId) {
        moveChild(ctx, parentId, childId, Math.min(position, count - 1));
        return;
    }
    if (currentParentId !== null) {
        removeChild(ctx, currentParentId, childId);
    }

    ctx.store.attach(childId, parentId, position);

    if (!isTag(ctx.store, childId) || !ctx.runtime(parentId).active) return;
    emitAdded(ctx, parentId, childId);
}

/**
 * Move a child to `index` within its parent's children.
 * `index` is the position the child ends up at.
 */
export function moveChild(
    ctx: TreeContext,
    parentId: string,
    childId: string,
    index: number
): void {
    requireChildOf(ctx, parentId, childId, "moveChild");
    const siblings = ctx.store.childIds(parentId);
    if (!Number.isInteger(index) || index < 0 || index >= siblings.length) {
        throw new LivetagError(`Index ${index} is out of range`, "moveChild", { parentId, childId, index });
    }
    if (siblings.indexOf(childId) === index) return;

    ctx.store.detach(childId);
    ctx.store.attach(childId, parentId, index);

    if (!isTag(ctx.store, childId) || !ctx.runtime(parentId).active) return;

    const context = { parentId, childId, index };
    const moved = requestChildMove(
        requireRenderer(ctx, parentId, "moveChild"),
        requireRenderer(ctx, childId, "moveChild"),
        context
    );
    if (!moved) {
        ctx.logger.warn(`LiveTree.moveChild: renderer rejected moving "${childId}" in "${parentId}"`);
        if (ctx.moveFailurePolicy === "reinsert") {
            emitRemoved(ctx, parentId, childId);
            emitAdded(ctx, parentId, childId);
        }
        return;
    }

    ctx.dispatch(parentId, {
        id: childId,
        kind: "moved",
        name: "children",
        value: childId,
        parent: parentId,
        ...anchorOf(ctx, parentId, childId),
    });
}

function emitRemoved(ctx: TreeContext, parentId: string, childId: string): void {
    ctx.dispatch(parentId, {
        id: childId,
        kind: "removed",
        name: "children",
        value: childId,
        parent: parentId,
    });
}

/**
 * Detach a child from its parent. The child becomes an unattached root.
 */
export function removeChild(ctx: TreeContext, parentId: string, childId: string): void {
    requireChildOf(ctx, parentId, childId, "removeChild");
    ctx.store.detach(childId);

    if (!isTag(ctx.store, childId) || !ctx.runtime(parentId).active) return;
    emitRemoved(ctx, parentId, childId);
}
