import * as fs from 'fs/promises';
import * as path from 'path';
import { OutlineError, systemErrorCode } from '../common/errors';

// A BOM stays in the text so byte offsets match the file
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Read a source file as UTF-8 text.
 *
 * @throws OutlineError InputUnavailable when the file is missing,
 *   unreadable, larger than maxBytes or not valid UTF-8
 */
export async function readSource(filePath: string, maxBytes: number): Promise<string> {
    let bytes: Buffer;
    try {
        const stats = await fs.stat(filePath);
        if (!stats.isFile()) {
            throw new OutlineError('InputUnavailable', `${filePath} is not a file`);
        }
        if (stats.size > maxBytes) {
            throw new OutlineError('InputUnavailable', `${filePath} is ${stats.size} bytes, limit is ${maxBytes}`);
        }
        bytes = await fs.readFile(filePath);
    } catch (error) {
        if (error instanceof OutlineError) throw error;
        const code = systemErrorCode(error) ?? 'unknown error';
        throw new OutlineError('InputUnavailable', `cannot read ${filePath} (${code})`, error);
    }

    try {
        return decoder.decode(bytes);
    } catch (error) {
        throw new OutlineError('InputUnavailable', `${filePath} is not valid UTF-8`, error);
    }
}

/**
 * Write a document, replacing any existing content.
 * Ensures the directory exists before writing.
 *
 * @throws OutlineError OutputWriteFailed
 */
export async function writeOutline(filePath: string, content: string): Promise<void> {
    try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, content, { encoding: 'utf-8' });
    } catch (error) {
        const code = systemErrorCode(error) ?? 'unknown error';
        throw new OutlineError('OutputWriteFailed', `cannot write ${filePath} (${code})`, error);
    }
}
