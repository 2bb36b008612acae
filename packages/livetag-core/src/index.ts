/**
 * @livetag/core
 *
 * Server-held tree of markup tags that renders to a string and, once
 * activated, reports every mutation as a minimal change record
 */

// Main class
export { LiveTree } from "./LiveTree.js";
export type { CreateNodeOptions, LiveTreeOptions } from "./LiveTree.js";

// Renderers
export { bindSetters } from "./renderer.js";
export type {
    AttributeDispatcher,
    AttributeSetter,
    AttributeSetters,
    RendererBinding,
    RendererFactory,
    TagRenderer,
} from "./renderer.js";
export { MarkupRenderer, escapeAttribute, escapeText, serializeValue } from "./MarkupRenderer.js";
export { evaluateQuery, parseQuery } from "./xpath.js";
export type { QueryAdapter, QueryStep } from "./xpath.js";

// Attributes
export { coerceAttribute, defaultAttributes, isDeclaredAttribute, isMarkupName } from "./attributes.js";

// Error handling
export { LivetagError, UnsupportedCapabilityError, handleTreeError } from "./errors.js";

// Types
export type {
    AttributeInput,
    AttributeUpdatedRecord,
    AttributeValue,
    ChangeKind,
    ChangeListener,
    ChangeRecord,
    ChildAddedRecord,
    ChildMovedRecord,
    ChildRemovedRecord,
    DeclaredAttribute,
    Logger,
    MoveFailurePolicy,
    NodeData,
    NodeKind,
    StructuralRecord,
    TagAttributes,
    TagEvent,
    TagEventListener,
    TagState,
} from "./types.js";
