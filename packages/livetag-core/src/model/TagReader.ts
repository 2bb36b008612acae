/**
 * TagReader - Read operations for the tag tree
 */

import { buildState } from "../attributes.js";
import { LivetagError } from "../errors.js";
import type { LoroTreeStore } from "../internal/LoroTreeStore.js";
import type { NodeKind, TagState } from "../types.js";

export function isTagKind(kind: NodeKind): boolean {
    return kind === "tag" || kind === "document";
}

export function isTag(store: LoroTreeStore, id: string): boolean {
    return isTagKind(store.kind(id));
}

/**
 * Throw unless the node is a tag (or a document)
 */
export function requireTag(store: LoroTreeStore, id: string, operation: string): void {
    if (!isTag(store, id)) {
        throw new LivetagError(`Node "${id}" is a pattern node, not a tag`, operation, { id });
    }
}

export function getState(store: LoroTreeStore, id: string): TagState {
    requireTag(store, id, "getState");
    return buildState(store.attributeEntries(id));
}

/**
 * Ids of the tag children of a node, skipping pattern nodes
 */
export function getTagChildIds(store: LoroTreeStore, id: string): string[] {
    return store.childIds(id).filter((childId) => isTag(store, childId));
}

/**
 * Walk the parent chain to the owning Document.
 * Stops at the first node without a tag parent.
 */
export function findDocument(store: LoroTreeStore, id: string): string | null {
    let current = id;
    for (;;) {
        const kind = store.kind(current);
        if (kind === "document") return current;
        if (kind === "pattern") return null;

        const parentId = store.parentId(current);
        if (parentId === null) return null;
        current = parentId;
    }
}
