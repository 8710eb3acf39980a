/**
 * Outline core: span conversion, naming, normalization, serialization.
 */

export * from './types';
export { UNSET_BYTE_SPAN, toLinePoint, toLocationSpan, toByteSpan, fileLocationSpan, compareLinePoints } from './span';
export { HeuristicNameExtractor, defaultNameExtractor, isNamedKind } from './name-extractor';
export type { NameExtractor, NameResult } from './name-extractor';
export { normalizeNode, normalizeRoot, collectChildren, detectParseErrors } from './normalizer';
export type { NormalizeResult, CollectedChildren } from './normalizer';
export { serializeOutline, deserializeOutline, OutlineFileSchema } from './serializer';
export { OutlineConverter } from './converter';
export type { OutlineConverterOptions } from './converter';
