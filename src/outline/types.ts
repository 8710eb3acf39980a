/**
 * Outline data model.
 *
 * In memory, nodes are discriminated by `variant`. The serialized form
 * drops it: a node with `children` is a container, a node with `span`
 * a terminal.
 */

/** [line (1-based), column (0-based, bytes)] */
export type LinePoint = [line: number, column: number];

export interface LocationSpan {
    start: LinePoint;
    end: LinePoint;
}

/** [start, end) absolute byte offsets; [0, -1] means unset */
export type ByteSpan = [start: number, end: number];

interface OutlineNodeBase {
    /** Grammar kind label */
    type: string;
    name: string;
    locationSpan: LocationSpan;
}

export interface ContainerNode extends OutlineNodeBase {
    variant: 'container';
    headerSpan: ByteSpan;
    footerSpan: ByteSpan;
    children: OutlineNode[];
}

export interface TerminalNode extends OutlineNodeBase {
    variant: 'terminal';
    span: ByteSpan;
}

export type OutlineNode = ContainerNode | TerminalNode;

export interface ParsingError {
    location: LocationSpan;
    message: string;
}

export const OUTLINE_FORMAT_VERSION = 1;

export interface OutlineFile {
    type: 'file';
    /** File path as supplied by the caller */
    name: string;
    locationSpan: LocationSpan;
    footerSpan: ByteSpan;
    parsingErrorsDetected: boolean;
    children: OutlineNode[];
    parsingError: ParsingError | null;
    formatVersion: typeof OUTLINE_FORMAT_VERSION;
}

export function isContainer(node: OutlineNode): node is ContainerNode {
    return node.variant === 'container';
}
