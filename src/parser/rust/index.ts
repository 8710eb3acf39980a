/**
 * Rust Parser Module
 */

export { RustAdapter } from './adapter';
