/**
 * Tree Normalizer
 *
 * Walks a raw syntax tree and builds the outline. Nodes with named
 * children become containers, the rest terminals. A node whose name
 * cannot be extracted fails, and its parent drops it; siblings and
 * ancestors are unaffected.
 */

import { RawNode } from '../parser/types';
import { OutlineError } from '../common/errors';
import { createLogger } from '../common/logger';
import { NameExtractor, defaultNameExtractor } from './name-extractor';
import { OutlineNode } from './types';
import { UNSET_BYTE_SPAN, toByteSpan, toLocationSpan } from './span';

const log = createLogger('normalize');

export type NormalizeResult =
    | { success: true; node: OutlineNode }
    | { success: false; error: OutlineError };

export interface CollectedChildren {
    children: OutlineNode[];
    /** Failures that were filtered out, in source order */
    dropped: OutlineError[];
}

/**
 * Normalize one node and its subtree.
 */
export function normalizeNode(
    node: RawNode,
    nameExtractor: NameExtractor = defaultNameExtractor,
): NormalizeResult {
    const kind = node.kind();
    const startByte = node.startByte();
    const endByte = node.endByte();
    const text = node.textSlice(startByte, endByte);

    const named = nameExtractor.extract(kind, text);
    if (!named.success) {
        return {
            success: false,
            error: new OutlineError('NodeExtractionFailed', `${kind} at byte ${startByte}: ${named.error.message}`, named.error),
        };
    }

    const locationSpan = toLocationSpan(node.startPosition(), node.endPosition());

    if (node.namedChildCount() === 0) {
        return {
            success: true,
            node: {
                variant: 'terminal',
                type: kind,
                name: named.name,
                locationSpan,
                span: toByteSpan(startByte, endByte),
            },
        };
    }

    const { children, dropped } = collectChildren(node, nameExtractor);
    if (children.length === 0) {
        return {
            success: false,
            error: new OutlineError(
                'NodeExtractionFailed',
                `${kind} at byte ${startByte}: all ${dropped.length} children failed`,
                dropped[0],
            ),
        };
    }

    return {
        success: true,
        node: {
            variant: 'container',
            type: kind,
            name: named.name,
            locationSpan,
            headerSpan: toByteSpan(startByte, endByte),
            footerSpan: [...UNSET_BYTE_SPAN],
            children,
        },
    };
}

/**
 * Normalize the named children of a node in source order, keeping the
 * successes and reporting the failures separately.
 */
export function collectChildren(
    node: RawNode,
    nameExtractor: NameExtractor = defaultNameExtractor,
): CollectedChildren {
    const children: OutlineNode[] = [];
    const dropped: OutlineError[] = [];

    const count = node.namedChildCount();
    for (let i = 0; i < count; i++) {
        const child = node.namedChild(i);
        if (!child) continue;

        const result = normalizeNode(child, nameExtractor);
        if (result.success) {
            children.push(result.node);
        } else {
            dropped.push(result.error);
        }
    }

    return { children, dropped };
}

/**
 * Normalize a tree from its root. The root is only a traversal anchor:
 * its surviving children are returned, the root itself is not.
 *
 * @throws OutlineError RootExtractionFailed when the root cannot be named
 */
export function normalizeRoot(
    root: RawNode,
    nameExtractor: NameExtractor = defaultNameExtractor,
): OutlineNode[] {
    const kind = root.kind();
    const named = nameExtractor.extract(kind, root.textSlice(root.startByte(), root.endByte()));
    if (!named.success) {
        throw new OutlineError('RootExtractionFailed', `root ${kind}: ${named.error.message}`, named.error);
    }

    const { children, dropped } = collectChildren(root, nameExtractor);
    for (const error of dropped) {
        log.debug('Dropped subtree', { reason: error.message });
    }
    return children;
}

/**
 * True when any node of the named tree is a parser error node.
 */
export function detectParseErrors(root: RawNode): boolean {
    if (root.isError()) {
        return true;
    }
    const count = root.namedChildCount();
    for (let i = 0; i < count; i++) {
        const child = root.namedChild(i);
        if (child && detectParseErrors(child)) {
            return true;
        }
    }
    return false;
}
