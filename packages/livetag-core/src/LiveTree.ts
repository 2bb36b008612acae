/**
 * LiveTree - Main tree abstraction for @livetag/core
 * Owns the node arena, the runtime state of tags and the notification
 * streams of documents
 */

import { defaultAttributes } from "./attributes.js";
import { handleTreeError, LivetagError } from "./errors.js";
import { LoroTreeStore } from "./internal/LoroTreeStore.js";
import { MarkupRenderer } from "./MarkupRenderer.js";
import { setAttribute } from "./model/AttributeWriter.js";
import { insertChild, moveChild, removeChild } from "./model/ChildWriter.js";
import type { TagRuntime, TreeContext } from "./model/context.js";
import { prepare, render, requireRenderer } from "./model/Lifecycle.js";
import { destroy } from "./model/TagDestroyer.js";
import { findDocument, getState, isTag, requireTag } from "./model/TagReader.js";
import { runQuery, type RendererFactory, type TagRenderer } from "./renderer.js";
import type {
    AttributeInput,
    AttributeValue,
    ChangeListener,
    ChangeRecord,
    Logger,
    MoveFailurePolicy,
    NodeData,
    NodeKind,
    TagAttributes,
    TagEvent,
    TagEventListener,
    TagState,
} from "./types.js";

/**
 * Options for creating a LiveTree
 */
export interface LiveTreeOptions {
    /** Creates the renderer bound to each tag (default: MarkupRenderer) */
    renderer?: RendererFactory;
    /** Peer ID of the underlying arena document (optional, generated if not provided) */
    peerId?: bigint;
    /** What to emit when a renderer rejects a move (default: "suppress") */
    moveFailurePolicy?: MoveFailurePolicy;
    /** Where diagnostics go (default: console) */
    logger?: Logger;
}

/**
 * Options for creating a node
 */
export interface CreateNodeOptions {
    /** Explicit id; generated if not provided */
    id?: string;
}

/**
 * LiveTree - one tree of tags per session
 *
 * This class provides:
 * - Node creation (tags, documents, pattern nodes)
 * - The mutation API (attributes and children), emitting change records
 * - Activation and rendering
 * - Document subscriptions and inbound tag events
 *
 * Every call completes its record dispatch before returning. A LiveTree
 * must only be mutated by one caller at a time.
 */
export class LiveTree {
    private readonly store: LoroTreeStore;
    private readonly rendererFactory: RendererFactory;
    private readonly logger: Logger;
    private readonly moveFailurePolicy: MoveFailurePolicy;

    private readonly runtimes = new Map<string, TagRuntime>();
    private readonly owners = new Map<TagRenderer, string>();
    private readonly listeners = new Map<string, Set<ChangeListener>>();
    private readonly eventListeners = new Map<string, Set<TagEventListener>>();

    private readonly ctx: TreeContext;

    constructor(options?: LiveTreeOptions) {
        this.store = new LoroTreeStore(options?.peerId);
        this.rendererFactory = options?.renderer ?? ((binding) => new MarkupRenderer(binding));
        this.logger = options?.logger ?? console;
        this.moveFailurePolicy = options?.moveFailurePolicy ?? "suppress";

        this.ctx = {
            store: this.store,
            logger: this.logger,
            moveFailurePolicy: this.moveFailurePolicy,
            runtime: (id) => this.runtime(id),
            createRenderer: (id) => this.createRenderer(id),
            dispatch: (originId, record) => this.dispatch(originId, record),
        };
    }

    // === Creation ===

    /**
     * Create an unattached, inactive tag
     */
    createTag(tag: string, attributes?: AttributeInput, options?: CreateNodeOptions): string {
        return this.mutate(() => this.createTagNode("tag", tag, attributes, options));
    }

    /**
     * Create a document: the root tag that collects change records
     */
    createDocument(attributes?: AttributeInput, options?: CreateNodeOptions): string {
        return this.mutate(() => this.createTagNode("document", "html", attributes, options));
    }

    /**
     * Create a pattern node: a placeholder child that never renders
     */
    createPattern(options?: CreateNodeOptions): string {
        return this.mutate(() => this.store.createNode("pattern", options?.id));
    }

    private createTagNode(
        kind: NodeKind,
        tag: string,
        attributes: AttributeInput | undefined,
        options: CreateNodeOptions | undefined
    ): string {
        const id = this.store.createNode(kind, options?.id);
        const initial: AttributeInput = { ...defaultAttributes(tag), ...attributes };
        try {
            for (const [name, value] of Object.entries(initial)) {
                if (value !== undefined) setAttribute(this.ctx, id, name, value);
            }
        } catch (e) {
            // Rejected attributes leave no half-built node behind
            this.store.delete(id);
            this.runtimes.delete(id);
            throw e;
        }
        return id;
    }

    // === Node Access ===

    has(id: string): boolean {
        return this.store.has(id);
    }

    getKind(id: string): NodeKind {
        return this.store.kind(id);
    }

    /**
     * Get the parent ID of a node. Returns null for unattached nodes.
     */
    getParentId(id: string): string | null {
        return this.store.parentId(id);
    }

    /**
     * Get the IDs of all children of a node, pattern nodes included
     */
    getChildIds(id: string): string[] {
        return this.store.childIds(id);
    }

    /**
     * Get a copy of the full attribute state of a tag
     */
    getState(id: string): TagState {
        return getState(this.store, id);
    }

    getNode(id: string): NodeData {
        return {
            id,
            kind: this.store.kind(id),
            parentId: this.store.parentId(id),
            childIds: this.store.childIds(id),
            active: this.isActive(id),
        };
    }

    isActive(id: string): boolean {
        return this.runtimes.get(id)?.active ?? false;
    }

    /**
     * Get the Document that records of this node would reach, if any
     */
    findDocument(id: string): string | null {
        return findDocument(this.store, id);
    }

    // === Modifications ===

    setAttribute<K extends keyof TagAttributes>(id: string, name: K, value: TagAttributes[K]): void;
    setAttribute(id: string, name: string, value: AttributeValue): void;
    setAttribute(id: string, name: string, value: AttributeValue): void {
        this.mutate(() => setAttribute(this.ctx, id, name, value));
    }

    appendChild(parentId: string, childId: string): void {
        this.mutate(() => insertChild(this.ctx, parentId, childId));
    }

    /**
     * Insert a node at `index` of a tag's children (default: at the end)
     */
    insertChild(parentId: string, childId: string, index?: number): void {
        this.mutate(() => insertChild(this.ctx, parentId, childId, index));
    }

    /**
     * Move a child so that it ends up at `index` of its parent's children
     */
    moveChild(parentId: string, childId: string, index: number): void {
        this.mutate(() => moveChild(this.ctx, parentId, childId, index));
    }

    removeChild(parentId: string, childId: string): void {
        this.mutate(() => removeChild(this.ctx, parentId, childId));
    }

    /**
     * Destroy a node and its subtree. Its id is free afterwards.
     */
    destroy(id: string): void {
        const destroyed = this.mutate(() => destroy(this.ctx, id));
        for (const destroyedId of destroyed) {
            const renderer = this.runtimes.get(destroyedId)?.renderer;
            if (renderer) this.owners.delete(renderer);
            this.runtimes.delete(destroyedId);
            this.listeners.delete(destroyedId);
            this.eventListeners.delete(destroyedId);
        }
    }

    // === Rendering ===

    /**
     * Prepare a tag for rendering: apply attributes, bind and activate
     * its renderer and those of its tag descendants
     */
    prepare(id: string, attributes?: AttributeInput): void {
        this.mutate(() => prepare(this.ctx, id, attributes));
    }

    /**
     * Render a tag and all its children to markup
     */
    render(id: string, attributes?: AttributeInput): string {
        return this.mutate(() => render(this.ctx, id, attributes));
    }

    /**
     * Find the tags matching a structural query below an active tag
     */
    xpath(id: string, query: string): string[] {
        requireTag(this.store, id, "xpath");
        if (!this.isActive(id)) {
            throw new LivetagError(`Tag "${id}" is not active`, "xpath", { id, query });
        }
        const matches = runQuery(requireRenderer(this.ctx, id, "xpath"), query, { id, query });
        const ids: string[] = [];
        for (const renderer of matches) {
            const owner = this.owners.get(renderer);
            if (owner !== undefined) ids.push(owner);
        }
        return ids;
    }

    // === Subscriptions ===

    /**
     * Subscribe to the change records reaching a document
     * @returns Unsubscribe function
     */
    subscribe(documentId: string, listener: ChangeListener): () => void {
        if (this.store.kind(documentId) !== "document") {
            throw new LivetagError(`Node "${documentId}" is not a document`, "subscribe", { documentId });
        }
        let listeners = this.listeners.get(documentId);
        if (!listeners) {
            listeners = new Set();
            this.listeners.set(documentId, listeners);
        }
        listeners.add(listener);
        return () => {
            listeners.delete(listener);
        };
    }

    // === Events ===

    /**
     * Listen to events the remote consumer sends for a tag
     * @returns Unsubscribe function
     */
    onEvent(id: string, listener: TagEventListener): () => void {
        requireTag(this.store, id, "onEvent");
        let listeners = this.eventListeners.get(id);
        if (!listeners) {
            listeners = new Set();
            this.eventListeners.set(id, listeners);
        }
        listeners.add(listener);
        return () => {
            listeners.delete(listener);
        };
    }

    /**
     * Deliver an inbound event to a tag's listeners.
     * Clicks need a clickable tag, drops a draggable source.
     * @returns Whether the event was delivered
     */
    triggerEvent(id: string, event: TagEvent): boolean {
        const state = this.getState(id);
        const accepted = event.type === "clicked"
            ? state.clickable
            : isTag(this.store, event.sourceId) && this.getState(event.sourceId).draggable;
        if (!accepted) {
            this.logger.warn(`LiveTree.triggerEvent: ignored "${event.type}" on "${id}"`);
            return false;
        }

        for (const listener of this.eventListeners.get(id) ?? []) {
            try {
                listener(event);
            } catch (e) {
                handleTreeError("triggerEvent", e, { id, type: event.type }, this.logger);
            }
        }
        return true;
    }

    // === Internals ===

    private mutate<T>(fn: () => T): T {
        try {
            return fn();
        } finally {
            this.store.commit();
        }
    }

    private runtime(id: string): TagRuntime {
        let runtime = this.runtimes.get(id);
        if (!runtime) {
            runtime = { renderer: null, apply: null, active: false };
            this.runtimes.set(id, runtime);
        }
        return runtime;
    }

    private createRenderer(id: string): TagRenderer {
        const renderer = this.rendererFactory({
            id,
            state: getState(this.store, id),
            children: () => this.childRenderers(id),
        });
        this.owners.set(renderer, id);
        return renderer;
    }

    private childRenderers(id: string): TagRenderer[] {
        const renderers: TagRenderer[] = [];
        if (!this.store.has(id)) return renderers;
        for (const childId of this.store.childIds(id)) {
            const renderer = this.runtimes.get(childId)?.renderer;
            if (renderer && isTag(this.store, childId)) renderers.push(renderer);
        }
        return renderers;
    }

    /**
     * Walk the ancestor chain to the owning document and deliver the record
     */
    private dispatch(originId: string, record: ChangeRecord): void {
        const documentId = findDocument(this.store, originId);
        if (documentId === null) {
            this.logger.debug(`LiveTree.dispatch: no document above "${originId}", dropping ${record.kind} of "${record.id}"`);
            return;
        }

        for (const listener of this.listeners.get(documentId) ?? []) {
            try {
                listener(record);
            } catch (e) {
                handleTreeError("dispatch", e, { documentId, record }, this.logger);
            }
        }
    }
}
