/**
 * Public types for @livetag/core
 * No Loro types are exposed - the arena is an internal detail
 */


// ============================================================================
// Attributes
// ============================================================================

/**
 * Any value a tag attribute can hold
 */
export type AttributeValue = string | number | boolean | string[] | Record<string, string>;

/**
 * Attributes every tag declares, with their value types
 */
export interface TagAttributes {
    /** Element name */
    tag: string;
    text: string;
    /** Text rendered after the closing tag */
    tail: string;
    /** CSS classes */
    cls: string[];
    /** CSS styles */
    style: Record<string, string>;
    /** Custom markup attributes not explicitly declared */
    attrs: Record<string, string>;
    alt: string;
    onclick: string;
    /** Tells the remote consumer to send click events back */
    clickable: boolean;
    /** Tells the remote consumer to send drag events back */
    draggable: boolean;
    ondragstart: string;
    ondragover: string;
    ondrop: string;
}

export type DeclaredAttribute = keyof TagAttributes;

/**
 * Full attribute state of a tag: declared attributes plus free-form ones
 */
export type TagState = TagAttributes & { [name: string]: AttributeValue };

/**
 * Attributes accepted when creating or preparing a tag
 */
export type AttributeInput = { [name: string]: AttributeValue | undefined };


// ============================================================================
// Nodes
// ============================================================================

/**
 * "pattern" nodes are placeholders that never render and never take part
 * in diffing
 */
export type NodeKind = "tag" | "document" | "pattern";

/**
 * Read-only view of a node in the arena
 */
export interface NodeData {
    id: string;
    kind: NodeKind;
    parentId: string | null;
    childIds: string[];
    active: boolean;
}


// ============================================================================
// Change records
// ============================================================================

export type ChangeKind = "update" | "added" | "moved" | "removed";

export interface AttributeUpdatedRecord {
    id: string;
    kind: "update";
    name: string;
    value: AttributeValue;
}

export interface ChildAddedRecord {
    id: string;
    kind: "added";
    name: "children";
    /** Rendered markup of the added child */
    value: string;
    parent: string;
    /** Id of the next tag sibling; absent means append */
    before?: string;
}

export interface ChildMovedRecord {
    id: string;
    kind: "moved";
    name: "children";
    value: string;
    parent: string;
    before?: string;
}

export interface ChildRemovedRecord {
    id: string;
    kind: "removed";
    name: "children";
    value: string;
    parent: string;
}

export type StructuralRecord = ChildAddedRecord | ChildMovedRecord | ChildRemovedRecord;

/**
 * Minimal description of one mutation, delivered to a Document's subscribers
 */
export type ChangeRecord = AttributeUpdatedRecord | StructuralRecord;

export type ChangeListener = (record: ChangeRecord) => void;


// ============================================================================
// Events
// ============================================================================

/**
 * Inbound events sent back by the remote consumer
 */
export type TagEvent =
    | { type: "clicked" }
    | { type: "dropped"; sourceId: string };

export type TagEventListener = (event: TagEvent) => void;


// ============================================================================
// Ambient
// ============================================================================

export type Logger = Pick<Console, "debug" | "warn" | "error">;

/**
 * What happens when the renderer rejects a child move.
 * - "suppress": no record; model and remote order diverge
 * - "reinsert": a removed record followed by an added record
 */
export type MoveFailurePolicy = "suppress" | "reinsert";
