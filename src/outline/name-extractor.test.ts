import { strict as assert } from 'assert';
import { test, describe } from 'node:test';

import { HeuristicNameExtractor, isNamedKind } from './name-extractor';

const extractor = new HeuristicNameExtractor();

function nameOf(kind: string, text: string): string {
    const result = extractor.extract(kind, text);
    assert.ok(result.success, `expected a name for ${kind}`);
    return result.name;
}

describe('HeuristicNameExtractor', () => {
    test('strips keywords and punctuation from a function signature', () => {
        assert.equal(nameOf('identifier', 'fn foo(x: i32)'), 'foo');
    });

    test('fails when nothing survives stripping', () => {
        const result = extractor.extract('identifier', '##');
        assert.equal(result.success, false);
        if (!result.success) {
            assert.equal(result.error.code, 'NameExtractionFailed');
        }
    });

    test('fails on empty text for a named kind', () => {
        assert.equal(extractor.extract('function_item', '').success, false);
    });

    test('names other nodes after their kind', () => {
        assert.equal(nameOf('block', '{ let x = 1; }'), 'block');
        assert.equal(nameOf('parameters', '()'), 'parameters');
    });

    test('extracts struct and enum names', () => {
        assert.equal(nameOf('struct_item', 'pub struct Point { x: i32, y: i32 }'), 'Point');
        assert.equal(nameOf('enum_item', 'enum Color { Red, Green }'), 'Color');
    });

    test('returns identifiers unchanged', () => {
        assert.equal(nameOf('type_identifier', 'Point'), 'Point');
    });

    test('cuts identifiers that contain a stripped keyword', () => {
        // "pubsub" loses its "pub"
        assert.equal(nameOf('function_item', 'fn handle_pubsub() {}'), 'handle_');
    });

    test('accepts any whitespace between tokens', () => {
        assert.equal(nameOf('function_item', 'pub\n\tfn\tspaced ()'), 'spaced');
    });
});

describe('isNamedKind', () => {
    test('matches identifier and item kinds', () => {
        assert.equal(isNamedKind('identifier'), true);
        assert.equal(isNamedKind('field_identifier'), true);
        assert.equal(isNamedKind('impl_item'), true);
        assert.equal(isNamedKind('block'), false);
    });
});
