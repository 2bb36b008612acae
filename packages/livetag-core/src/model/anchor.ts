/**
 * Anchor resolution for ordered insertion on the remote side
 */

/**
 * Id of the nearest tag sibling strictly after `childId`, or undefined when
 * the child is the last tag (append semantics). Pattern nodes are skipped.
 */
export function resolveAnchor(
    siblingIds: readonly string[],
    childId: string,
    isTag: (id: string) => boolean
): string | undefined {
    const position = siblingIds.indexOf(childId);
    if (position === -1) return undefined;

    for (let i = position + 1; i < siblingIds.length; i++) {
        const siblingId = siblingIds[i];
        if (siblingId !== undefined && isTag(siblingId)) {
            return siblingId;
        }
    }
    return undefined;
}
