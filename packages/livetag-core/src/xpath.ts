/**
 * A small structural query language over any tree of nodes.
 *
 * Supported: an optional leading ".", then steps of `/name` (children) or
 * `//name` (descendants), where name may be `*`, each with an optional
 * `[@attr]` or `[@attr="value"]` predicate.
 */

import { LivetagError } from "./errors.js";

export type Axis = "child" | "descendant";

export interface QueryStep {
    axis: Axis;
    /** Element name, or "*" for any */
    name: string;
    predicate?: {
        attribute: string;
        value?: string;
    };
}

/**
 * How to walk a concrete node type
 */
export interface QueryAdapter<T> {
    children(node: T): T[];
    name(node: T): string;
    attribute(node: T, name: string): string | undefined;
}

const STEP = /^(\/\/?)(\*|[A-Za-z_][\w.:-]*)(?:\[@([A-Za-z_][\w.:-]*)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'))?\])?/;

export function parseQuery(query: string): QueryStep[] {
    let rest = query.trim();
    if (rest.startsWith(".")) rest = rest.slice(1);

    const steps: QueryStep[] = [];
    while (rest.length > 0) {
        const match = STEP.exec(rest);
        if (!match) {
            throw new LivetagError(`Unsupported query "${query}"`, "xpath", { query, at: rest });
        }
        const [whole, slashes, name, attribute, doubleQuoted, singleQuoted] = match;
        const step: QueryStep = {
            axis: slashes === "//" ? "descendant" : "child",
            name,
        };
        if (attribute !== undefined) {
            const value = doubleQuoted ?? singleQuoted;
            step.predicate = value === undefined ? { attribute } : { attribute, value };
        }
        steps.push(step);
        rest = rest.slice(whole.length);
    }

    if (steps.length === 0) {
        throw new LivetagError(`Empty query "${query}"`, "xpath", { query });
    }
    return steps;
}

function descendants<T>(node: T, adapter: QueryAdapter<T>, out: T[]): T[] {
    for (const child of adapter.children(node)) {
        out.push(child);
        descendants(child, adapter, out);
    }
    return out;
}

function matches<T>(node: T, step: QueryStep, adapter: QueryAdapter<T>): boolean {
    if (step.name !== "*" && adapter.name(node) !== step.name) return false;
    if (!step.predicate) return true;

    const actual = adapter.attribute(node, step.predicate.attribute);
    if (actual === undefined) return false;
    return step.predicate.value === undefined || actual === step.predicate.value;
}

/**
 * Evaluate a query relative to `root`. Results are unique and follow the
 * order in which they were first reached.
 */
export function evaluateQuery<T>(root: T, query: string, adapter: QueryAdapter<T>): T[] {
    let context: T[] = [root];
    for (const step of parseQuery(query)) {
        const next: T[] = [];
        const seen = new Set<T>();
        for (const node of context) {
            const candidates = step.axis === "child"
                ? adapter.children(node)
                : descendants(node, adapter, []);
            for (const candidate of candidates) {
                if (!seen.has(candidate) && matches(candidate, step, adapter)) {
                    seen.add(candidate);
                    next.push(candidate);
                }
            }
        }
        context = next;
    }
    return context;
}
