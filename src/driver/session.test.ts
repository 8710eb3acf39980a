/**
 * Session protocol tests
 *
 * Drives the request loop over in-memory streams against a temporary
 * workspace.
 */

import { strict as assert } from 'assert';
import { test, describe, before, after } from 'node:test';
import { Readable, Writable } from 'stream';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

import { configureLogger } from '../common/logger';
import { OutlineConverter } from '../outline/converter';
import { deserializeOutline } from '../outline/serializer';
import { WordParser } from '../test/fake-tree';
import { OutlineSession, SessionSummary, formatResponse } from './session';

interface SessionRun {
    responses: string[];
    summary: SessionSummary;
}

async function runSession(lines: string[], sentinel?: string): Promise<SessionRun> {
    const chunks: string[] = [];
    const output = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {
            chunks.push(chunk.toString());
            callback();
        },
    });
    const session = new OutlineSession({
        converter: new OutlineConverter({ parser: new WordParser() }),
        sentinel,
        maxFileSizeKB: 1,
    });

    const summary = await session.run(Readable.from([lines.join('\n') + '\n']), output);
    return { responses: chunks.join('').split('\n').filter(l => l.length > 0), summary };
}

describe('OutlineSession', () => {
    let root: string;

    before(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'outline-session-test-'));
        fs.writeFileSync(path.join(root, 'a.rs'), 'alpha beta\n');
        configureLogger({ output: () => undefined });
    });

    after(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    test('answers each request in order until the sentinel', async () => {
        const input = path.join(root, 'a.rs');
        const missing = path.join(root, 'missing.rs');
        const out1 = path.join(root, 'out', 'a.json');
        const out2 = path.join(root, 'out', 'missing.json');
        const out3 = path.join(root, 'out', 'after.json');

        const { responses, summary } = await runSession([
            input, 'rust', out1,
            missing, 'rust', out2,
            'end',
            input, 'rust', out3,
        ]);

        assert.deepEqual(responses, [
            'OK',
            `ERR InputUnavailable: cannot read ${missing} (ENOENT)`,
        ]);
        assert.deepEqual(summary, { processed: 2, failed: 1 });
        assert.equal(fs.existsSync(out2), false);
        assert.equal(fs.existsSync(out3), false);

        const outline = deserializeOutline(fs.readFileSync(out1, 'utf-8'));
        assert.equal(outline.name, input);
        assert.deepEqual(outline.children.map(c => c.name), ['alpha', 'beta']);
    });

    test('uses the first token of each path line', async () => {
        const input = path.join(root, 'a.rs');
        const out = path.join(root, 'tokens.json');

        const { responses } = await runSession([`  ${input}   trailing words`, '', `${out} ignored`]);

        assert.deepEqual(responses, ['OK']);
        assert.ok(fs.existsSync(out));
    });

    test('honours a custom sentinel', async () => {
        const input = path.join(root, 'a.rs');
        const out = path.join(root, 'custom.json');

        const { responses, summary } = await runSession(['quit', input, '', out], 'quit');

        assert.deepEqual(responses, []);
        assert.deepEqual(summary, { processed: 0, failed: 0 });
    });

    test('ignores an incomplete trailing request', async () => {
        const { responses, summary } = await runSession([path.join(root, 'a.rs'), 'rust']);

        assert.deepEqual(responses, []);
        assert.equal(summary.processed, 0);
    });

    test('a blank input path is an error response', async () => {
        const { responses } = await runSession(['', 'rust', path.join(root, 'blank.json')]);

        assert.deepEqual(responses, ['ERR InputUnavailable: missing input path']);
    });

    test('oversized inputs fail without stopping the session', async () => {
        const big = path.join(root, 'big.rs');
        fs.writeFileSync(big, 'x'.repeat(2048));
        const out = path.join(root, 'after-big.json');

        const { responses } = await runSession([
            big, '', path.join(root, 'big.json'),
            path.join(root, 'a.rs'), '', out,
        ]);

        assert.deepEqual(responses, [
            `ERR InputUnavailable: ${big} is 2048 bytes, limit is 1024`,
            'OK',
        ]);
    });
});

describe('formatResponse', () => {
    test('formats both outcomes', () => {
        assert.equal(formatResponse({ status: 'ok' }), 'OK');
        assert.equal(
            formatResponse({ status: 'error', code: 'OutputWriteFailed', message: 'disk full' }),
            'ERR OutputWriteFailed: disk full',
        );
    });
});
