/**
 * Parser capability consumed by the outline core.
 *
 * These types decouple the normalizer from tree-sitter internals so the
 * core can be driven by any tree that exposes the same accessors.
 */

/**
 * Position in source. Both fields are 0-based; `column` is a byte
 * offset within the line.
 */
export interface Point {
    row: number;
    column: number;
}

/**
 * A node of the concrete syntax tree, borrowed read-only for one traversal.
 */
export interface RawNode {
    /** Grammar node type, e.g. "function_item", "identifier" */
    kind(): string;
    /** Children that are named in the grammar (no punctuation tokens) */
    namedChildCount(): number;
    namedChild(index: number): RawNode | null;
    startPosition(): Point;
    endPosition(): Point;
    /** Absolute UTF-8 byte offset of the first byte */
    startByte(): number;
    /** Absolute UTF-8 byte offset one past the last byte */
    endByte(): number;
    /** Source text between two byte offsets; "" when the range is unusable */
    textSlice(startByte: number, endByte: number): string;
    /** True for nodes the parser inserted to recover from a syntax error */
    isError(): boolean;
}

export type ParseResult =
    | { success: true; root: RawNode }
    | { success: false; error: string };

export interface SourceParser {
    parse(sourceText: string): ParseResult;
}
