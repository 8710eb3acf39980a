/**
 * In-memory RawNode trees for unit tests.
 * Offsets index the source string directly, so keep fixtures ASCII.
 */

import { ParseResult, Point, RawNode, SourceParser } from '../parser/types';

export interface FakeNodeShape {
    kind: string;
    start: number;
    end: number;
    children?: FakeNodeShape[];
}

function pointAt(text: string, offset: number): Point {
    const before = text.slice(0, offset);
    const lineStart = before.lastIndexOf('\n') + 1;
    return { row: before.split('\n').length - 1, column: offset - lineStart };
}

export class FakeRawNode implements RawNode {
    constructor(
        private readonly shape: FakeNodeShape,
        private readonly source: string,
    ) {}

    kind(): string {
        return this.shape.kind;
    }

    namedChildCount(): number {
        return this.shape.children?.length ?? 0;
    }

    namedChild(index: number): RawNode | null {
        const child = this.shape.children?.[index];
        return child ? new FakeRawNode(child, this.source) : null;
    }

    startPosition(): Point {
        return pointAt(this.source, this.shape.start);
    }

    endPosition(): Point {
        return pointAt(this.source, this.shape.end);
    }

    startByte(): number {
        return this.shape.start;
    }

    endByte(): number {
        return this.shape.end;
    }

    textSlice(startByte: number, endByte: number): string {
        if (startByte < 0 || endByte > this.source.length || startByte > endByte) {
            return '';
        }
        return this.source.slice(startByte, endByte);
    }

    isError(): boolean {
        return this.shape.kind === 'ERROR';
    }
}

/**
 * Shape of a node covering the first occurrence of `text` in `source`.
 */
export function nodeAt(source: string, kind: string, text: string, children?: FakeNodeShape[]): FakeNodeShape {
    const start = source.indexOf(text);
    if (start < 0) {
        throw new Error(`"${text}" not found in fixture`);
    }
    return { kind, start, end: start + text.length, children };
}

/**
 * Parser producing a `source_file` root with one `identifier` child per
 * whitespace-separated word.
 */
export class WordParser implements SourceParser {
    parse(sourceText: string): ParseResult {
        const children: FakeNodeShape[] = [];
        for (const match of sourceText.matchAll(/\S+/g)) {
            const start = match.index ?? 0;
            children.push({ kind: 'identifier', start, end: start + match[0].length });
        }
        const root: FakeNodeShape = { kind: 'source_file', start: 0, end: sourceText.length, children };
        return { success: true, root: new FakeRawNode(root, sourceText) };
    }
}

export class FailingParser implements SourceParser {
    parse(): ParseResult {
        return { success: false, error: 'grammar unavailable' };
    }
}
