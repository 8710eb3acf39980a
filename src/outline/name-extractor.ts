/**
 * Name Extractor
 *
 * Derives the display name of a node. Declarations get a token from their
 * text; everything else is named after its grammar kind. The extractor is
 * injected into the normalizer so a grammar-aware one can replace it.
 */

import { OutlineError } from '../common/errors';

export type NameResult =
    | { success: true; name: string }
    | { success: false; error: OutlineError };

export interface NameExtractor {
    extract(kind: string, text: string): NameResult;
}

/** Kinds that plausibly name a declaration */
const NAMED_KIND_MARKERS = ['identifier', 'item'];

/** Replaced in this order, by plain substring match */
const STRIPPED_TOKENS = [
    '{', '}', '(', ')', ':', '#', '[', ']',
    'fn', 'struct', 'enum', 'pub',
];

export function isNamedKind(kind: string): boolean {
    return NAMED_KIND_MARKERS.some(marker => kind.includes(marker));
}

/**
 * Strips punctuation and keywords from declaration text and keeps the
 * first remaining word. Not a re-parse: an identifier containing a
 * stripped keyword ("prefix" -> "pre ix") is cut at the keyword.
 */
export class HeuristicNameExtractor implements NameExtractor {
    extract(kind: string, text: string): NameResult {
        if (!isNamedKind(kind)) {
            return { success: true, name: kind };
        }

        let stripped = text;
        for (const token of STRIPPED_TOKENS) {
            stripped = stripped.split(token).join(' ');
        }

        const name = stripped.split(/\s+/).find(word => word.length > 0);
        if (name === undefined) {
            return {
                success: false,
                error: new OutlineError('NameExtractionFailed', `no name token in ${kind} text`),
            };
        }
        return { success: true, name };
    }
}

export const defaultNameExtractor: NameExtractor = new HeuristicNameExtractor();
