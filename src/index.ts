/**
 * Rust source outlines: syntax tree in, container/terminal tree out.
 *
 * ```typescript
 * import { OutlineConverter, RustAdapter, serializeOutline } from 'semantic-outline';
 *
 * const converter = new OutlineConverter({ parser: new RustAdapter().createParser() });
 * const json = serializeOutline(converter.convert(source, 'src/lib.rs'));
 * ```
 */

export * from './common';
export * from './outline';
export { RustAdapter } from './parser/rust';
export { TreeSitterAdapter, TreeSitterSourceParser } from './parser/adapter';
export type { LanguageAdapter } from './parser/adapter';
export type { Point, RawNode, ParseResult, SourceParser } from './parser/types';
export { SourceText } from './parser/source-text';
export { TreeSitterRawNode } from './parser/tree-sitter-node';
export { loadConfig, DEFAULT_CONFIG, ENV_VARS } from './driver/config';
export type { Config } from './driver/config';
export { OutlineSession, formatResponse } from './driver/session';
export type { ConversionRequest, ConversionResponse, SessionOptions, SessionSummary } from './driver/session';
export { readSource, writeOutline } from './driver/storage';
