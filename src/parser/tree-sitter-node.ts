import { SyntaxNode } from 'tree-sitter';
import { Point, RawNode } from './types';
import { SourceText } from './source-text';

/**
 * RawNode view of a tree-sitter SyntaxNode.
 *
 * Converts the binding's UTF-16 indices and columns to UTF-8 byte
 * offsets through the SourceText the tree was parsed from.
 */
export class TreeSitterRawNode implements RawNode {
    constructor(
        private readonly node: SyntaxNode,
        private readonly source: SourceText,
    ) {}

    kind(): string {
        return this.node.type;
    }

    namedChildCount(): number {
        return this.node.namedChildCount;
    }

    namedChild(index: number): RawNode | null {
        const child = this.node.namedChild(index);
        return child ? new TreeSitterRawNode(child, this.source) : null;
    }

    startPosition(): Point {
        return {
            row: this.node.startPosition.row,
            column: this.source.byteColumn(this.node.startIndex, this.node.startPosition.column),
        };
    }

    endPosition(): Point {
        return {
            row: this.node.endPosition.row,
            column: this.source.byteColumn(this.node.endIndex, this.node.endPosition.column),
        };
    }

    startByte(): number {
        return this.source.byteOffset(this.node.startIndex);
    }

    endByte(): number {
        return this.source.byteOffset(this.node.endIndex);
    }

    textSlice(startByte: number, endByte: number): string {
        return this.source.sliceBytes(startByte, endByte);
    }

    isError(): boolean {
        return this.node.type === 'ERROR';
    }
}
