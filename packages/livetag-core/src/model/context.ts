/**
 * Shared context handed to the tree operation modules
 */

import type { LoroTreeStore } from "../internal/LoroTreeStore.js";
import type { AttributeDispatcher, TagRenderer } from "../renderer.js";
import type { ChangeRecord, Logger, MoveFailurePolicy } from "../types.js";

/**
 * Runtime state of a tag that is not part of the arena
 */
export interface TagRuntime {
    renderer: TagRenderer | null;
    /** Setter dispatch resolved when the renderer was bound */
    apply: AttributeDispatcher | null;
    active: boolean;
}

export interface TreeContext {
    readonly store: LoroTreeStore;
    readonly logger: Logger;
    readonly moveFailurePolicy: MoveFailurePolicy;
    /** Runtime state of a tag, created on first access */
    runtime(id: string): TagRuntime;
    /** Bind a new renderer to a tag */
    createRenderer(id: string): TagRenderer;
    /** Deliver a record to the Document owning `originId`, if any */
    dispatch(originId: string, record: ChangeRecord): void;
}
