import { Point } from '../parser/types';
import { ByteSpan, LinePoint, LocationSpan } from './types';

export const UNSET_BYTE_SPAN: ByteSpan = [0, -1];

/**
 * Parser position -> display position (1-based line, byte column).
 */
export function toLinePoint(point: Point): LinePoint {
    return [point.row + 1, point.column];
}

export function toLocationSpan(start: Point, end: Point): LocationSpan {
    return { start: toLinePoint(start), end: toLinePoint(end) };
}

export function toByteSpan(startByte: number, endByte: number): ByteSpan {
    return [startByte, endByte];
}

/**
 * Span covering a whole file. Lines split on '\n' (a '\r' before it is
 * dropped) and a trailing terminator does not open an extra line; the end
 * column is the byte length of the last line.
 */
export function fileLocationSpan(text: string): LocationSpan {
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    if (lines.length === 0) {
        return { start: [1, 0], end: [1, 0] };
    }

    let last = lines[lines.length - 1];
    const terminated = text.endsWith('\n');
    if (terminated && last.endsWith('\r')) {
        last = last.slice(0, -1);
    }
    return { start: [1, 0], end: [lines.length, Buffer.byteLength(last, 'utf8')] };
}

/**
 * Lexicographic comparison of two line points.
 */
export function compareLinePoints(a: LinePoint, b: LinePoint): number {
    return a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1];
}
