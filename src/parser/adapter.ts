/**
 * Language Adapter Pattern
 *
 * Isolates grammar loading from the outline core. An adapter supplies
 * a SourceParser; the core only ever sees RawNode trees.
 */

import Parser, { Tree } from 'tree-sitter';
import { ParseResult, SourceParser } from './types';
import { SourceText } from './source-text';
import { TreeSitterRawNode } from './tree-sitter-node';
import { createLogger } from '../common/logger';

const log = createLogger('parser');

/**
 * Language adapter interface
 */
export interface LanguageAdapter {
    /**
     * Unique language identifier (lowercase), e.g. 'rust'
     */
    readonly id: string;

    /**
     * Human-readable language name, e.g. 'Rust'
     */
    readonly displayName: string;

    /**
     * NPM package providing the tree-sitter grammar
     */
    readonly npmPackage: string;

    /**
     * Create a parser for this language
     */
    createParser(): SourceParser;
}

/**
 * Base adapter for tree-sitter grammars
 *
 * Subclasses only need to implement loadLanguage().
 *
 * Example:
 * ```typescript
 * export class RustAdapter extends TreeSitterAdapter {
 *     readonly id = 'rust';
 *     readonly displayName = 'Rust';
 *     readonly npmPackage = 'tree-sitter-rust';
 *
 *     protected loadLanguage() {
 *         return require('tree-sitter-rust');
 *     }
 * }
 * ```
 */
export abstract class TreeSitterAdapter implements LanguageAdapter {
    abstract readonly id: string;
    abstract readonly displayName: string;
    abstract readonly npmPackage: string;

    /**
     * Grammar object handed to Parser#setLanguage (subclass implements this)
     */
    protected abstract loadLanguage(): unknown;

    public createParser(): SourceParser {
        const parser = new Parser();
        parser.setLanguage(this.loadLanguage());
        log.debug('Grammar loaded', { language: this.displayName, package: this.npmPackage });
        return new TreeSitterSourceParser(parser, this.id);
    }
}

/**
 * SourceParser backed by a configured tree-sitter Parser.
 * The parser instance is reused across files; trees are not.
 */
export class TreeSitterSourceParser implements SourceParser {
    constructor(
        private readonly parser: Parser,
        private readonly languageId: string,
    ) {}

    parse(sourceText: string): ParseResult {
        const source = SourceText.fromString(sourceText);
        let tree: Tree;
        try {
            // The binding rejects strings longer than its default 32K buffer
            tree = this.parser.parse(sourceText, undefined, { bufferSize: sourceText.length + 1 });
        } catch (error) {
            return {
                success: false,
                error: `${this.languageId} parser rejected input: ${error instanceof Error ? error.message : String(error)}`,
            };
        }
        return { success: true, root: new TreeSitterRawNode(tree.rootNode, source) };
    }
}
