/**
 * Rust Language Adapter
 *
 * Binds tree-sitter-rust to the outline core.
 */

import { TreeSitterAdapter } from '../adapter';

export class RustAdapter extends TreeSitterAdapter {
    readonly id = 'rust';
    readonly displayName = 'Rust';
    readonly npmPackage = 'tree-sitter-rust';

    protected loadLanguage(): unknown {
        // Grammar bindings are loaded at runtime
        // eslint-disable-next-line @typescript-eslint/no-require-imports
        return require('tree-sitter-rust');
    }
}
