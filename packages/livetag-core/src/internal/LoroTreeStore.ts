/**
 * Internal node arena backed by a LoroTree
 * This file contains all Loro-specific code and should not be exposed publicly
 */

import { LoroDoc, LoroMap, LoroTree, type LoroTreeNode, type TreeID } from "loro-crdt";
import { isAttributeValue } from "../attributes.js";
import { LivetagError } from "../errors.js";
import type { AttributeValue, NodeKind } from "../types.js";

/**
 * Internal constants for Loro container names
 */
export const TREE_CONTAINER = "tree";

/**
 * Node data keys
 */
export const NODE_KIND = "kind";
export const NODE_ID = "id";
export const NODE_ATTRS = "attrs";

function isNodeKind(value: unknown): value is NodeKind {
    return value === "tag" || value === "document" || value === "pattern";
}

/**
 * Arena of nodes indexed by public id.
 *
 * Every node is a LoroTree node; its parent link and ordered children are
 * the tree's own. Public ids are either given explicitly or taken from the
 * node's TreeID (`${counter}@${peer}`).
 */
export class LoroTreeStore {
    private readonly _doc: LoroDoc;
    private readonly treeIds = new Map<string, TreeID>();
    private readonly publicIds = new Map<TreeID, string>();

    constructor(peerId?: bigint) {
        this._doc = new LoroDoc();
        if (peerId !== undefined) {
            this._doc.setPeerId(peerId);
        }
    }

    /** Get the tree container */
    get tree(): LoroTree {
        return this._doc.getTree(TREE_CONTAINER);
    }

    has(id: string): boolean {
        return this.treeIds.has(id);
    }

    /**
     * Create an unattached node (a root of the tree)
     */
    createNode(kind: NodeKind, id?: string): string {
        if (id !== undefined && (id === "" || this.treeIds.has(id))) {
            throw new LivetagError(`Node id "${id}" is empty or already in use`, "createNode", { id });
        }

        const treeNode = this.tree.createNode();
        const publicId = id ?? treeNode.id;
        if (this.treeIds.has(publicId)) {
            this.tree.delete(treeNode.id);
            throw new LivetagError(`Node id "${publicId}" is already in use`, "createNode", { id: publicId });
        }

        const data = treeNode.data;
        data.set(NODE_KIND, kind);
        data.set(NODE_ID, publicId);
        if (kind !== "pattern") {
            data.setContainer(NODE_ATTRS, new LoroMap());
        }

        this.treeIds.set(publicId, treeNode.id);
        this.publicIds.set(treeNode.id, publicId);
        return publicId;
    }

    kind(id: string): NodeKind {
        const kind = this.node(id, "kind").data.get(NODE_KIND);
        if (!isNodeKind(kind)) {
            throw new LivetagError(`Node "${id}" has no valid kind`, "kind", { id, kind });
        }
        return kind;
    }

    parentId(id: string): string | null {
        const parent = this.node(id, "parentId").parent();
        if (!parent) return null;
        return this.publicIds.get(parent.id) ?? null;
    }

    childIds(id: string): string[] {
        const children = this.node(id, "childIds").children() ?? [];
        const ids: string[] = [];
        for (const child of children) {
            const childId = this.publicIds.get(child.id);
            if (childId !== undefined) ids.push(childId);
        }
        return ids;
    }

    /**
     * True when `ancestorId` is `id` itself or one of its ancestors
     */
    isAncestorOrSelf(ancestorId: string, id: string): boolean {
        let current: string | null = id;
        while (current !== null) {
            if (current === ancestorId) return true;
            current = this.parentId(current);
        }
        return false;
    }

    /**
     * Place a node under a parent at the given index of the parent's
     * children. The node must be unattached.
     */
    attach(id: string, parentId: string, index: number): void {
        const parent = this.node(parentId, "attach");
        this.node(id, "attach").move(parent, index);
    }

    /**
     * Make a node an unattached root again
     */
    detach(id: string): void {
        this.node(id, "detach").move();
    }

    getAttribute(id: string, name: string): AttributeValue | undefined {
        const value = this.attributes(id, "getAttribute").get(name);
        return isAttributeValue(value) ? value : undefined;
    }

    setAttribute(id: string, name: string, value: AttributeValue): void {
        this.attributes(id, "setAttribute").set(name, value);
    }

    /**
     * All stored attributes, in insertion order of their keys
     */
    attributeEntries(id: string): Map<string, AttributeValue> {
        const attrs = this.attributes(id, "attributeEntries");
        const entries = new Map<string, AttributeValue>();
        for (const key of attrs.keys()) {
            const value = attrs.get(key);
            if (isAttributeValue(value)) entries.set(key, value);
        }
        return entries;
    }

    /**
     * Delete a node and its whole subtree.
     * Returns the ids of every deleted node, the node itself first.
     */
    delete(id: string): string[] {
        const removed: string[] = [];
        const collect = (nodeId: string): void => {
            removed.push(nodeId);
            for (const childId of this.childIds(nodeId)) {
                collect(childId);
            }
        };
        collect(id);

        const treeId = this.treeIds.get(id);
        if (treeId !== undefined) {
            this.tree.delete(treeId);
        }
        for (const removedId of removed) {
            const removedTreeId = this.treeIds.get(removedId);
            if (removedTreeId !== undefined) this.publicIds.delete(removedTreeId);
            this.treeIds.delete(removedId);
        }
        return removed;
    }

    /** Commit pending changes */
    commit(): void {
        this._doc.commit();
    }

    private node(id: string, operation: string): LoroTreeNode {
        const treeId = this.treeIds.get(id);
        const treeNode = treeId !== undefined ? this.tree.getNodeByID(treeId) : undefined;
        if (!treeNode || treeNode.isDeleted()) {
            throw new LivetagError(`Unknown node "${id}"`, operation, { id });
        }
        return treeNode;
    }

    private attributes(id: string, operation: string): LoroMap {
        const attrs = this.node(id, operation).data.get(NODE_ATTRS);
        if (!(attrs instanceof LoroMap)) {
            throw new LivetagError(`Node "${id}" has no attributes`, operation, { id });
        }
        return attrs;
    }
}
