import { strict as assert } from 'assert';
import { test, describe } from 'node:test';

import {
    UNSET_BYTE_SPAN,
    compareLinePoints,
    fileLocationSpan,
    toByteSpan,
    toLinePoint,
    toLocationSpan,
} from './span';

describe('span conversion', () => {
    test('rows become 1-based, columns stay 0-based', () => {
        assert.deepEqual(toLinePoint({ row: 0, column: 0 }), [1, 0]);
        assert.deepEqual(toLinePoint({ row: 4, column: 7 }), [5, 7]);
    });

    test('builds location spans from both endpoints', () => {
        assert.deepEqual(
            toLocationSpan({ row: 1, column: 2 }, { row: 3, column: 1 }),
            { start: [2, 2], end: [4, 1] },
        );
    });

    test('byte spans keep offsets unchanged', () => {
        assert.deepEqual(toByteSpan(10, 42), [10, 42]);
        assert.deepEqual(UNSET_BYTE_SPAN, [0, -1]);
    });

    test('compares line points lexicographically', () => {
        assert.ok(compareLinePoints([1, 9], [2, 0]) < 0);
        assert.ok(compareLinePoints([2, 3], [2, 1]) > 0);
        assert.equal(compareLinePoints([3, 3], [3, 3]), 0);
    });
});

describe('fileLocationSpan', () => {
    test('empty file', () => {
        assert.deepEqual(fileLocationSpan(''), { start: [1, 0], end: [1, 0] });
    });

    test('trailing newline does not add a line', () => {
        assert.deepEqual(fileLocationSpan('fn main() {}\n'), { start: [1, 0], end: [1, 12] });
    });

    test('unterminated last line', () => {
        assert.deepEqual(fileLocationSpan('ab\ncd'), { start: [1, 0], end: [2, 2] });
    });

    test('CRLF line endings', () => {
        assert.deepEqual(fileLocationSpan('a\r\nbb\r\n'), { start: [1, 0], end: [2, 2] });
    });

    test('blank last line counts', () => {
        assert.deepEqual(fileLocationSpan('a\n\n'), { start: [1, 0], end: [2, 0] });
    });

    test('end column counts bytes', () => {
        assert.deepEqual(fileLocationSpan('let s = "é";'), { start: [1, 0], end: [1, 13] });
    });
});
