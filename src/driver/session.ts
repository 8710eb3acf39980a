/**
 * Conversion Session
 *
 * Line-oriented request loop. Each request is three lines:
 *
 *   <input path>
 *   <reserved line, ignored>
 *   <output path>
 *
 * Only the first whitespace-delimited token of a path line is used. A
 * request starting with the sentinel line ends the session. Every request
 * gets exactly one response line, `OK` or `ERR <code>: <message>`, in
 * request order.
 */

import * as readline from 'readline';
import { Readable, Writable } from 'stream';
import { OutlineError, isOutlineError } from '../common/errors';
import { createLogger } from '../common/logger';
import { OutlineConverter } from '../outline/converter';
import { serializeOutline } from '../outline/serializer';
import { readSource, writeOutline } from './storage';

const log = createLogger('session');

export interface ConversionRequest {
    inputPath: string;
    outputPath: string;
}

export type ConversionResponse =
    | { status: 'ok' }
    | { status: 'error'; code: string; message: string };

export interface SessionOptions {
    converter: OutlineConverter;
    /** Line that ends the session (default: 'end') */
    sentinel?: string;
    maxFileSizeKB: number;
}

export interface SessionSummary {
    processed: number;
    failed: number;
}

const REQUEST_LINES = 3;

export function formatResponse(response: ConversionResponse): string {
    return response.status === 'ok'
        ? 'OK'
        : `ERR ${response.code}: ${response.message}`;
}

function firstToken(line: string): string {
    return line.trim().split(/\s+/)[0];
}

export class OutlineSession {
    private readonly converter: OutlineConverter;
    private readonly sentinel: string;
    private readonly maxBytes: number;

    constructor(options: SessionOptions) {
        this.converter = options.converter;
        this.sentinel = options.sentinel ?? 'end';
        this.maxBytes = options.maxFileSizeKB * 1024;
    }

    /**
     * Serve requests from `input` until the sentinel or end of input.
     * Each request completes before the next line is consumed.
     */
    async run(input: Readable, output: Writable): Promise<SessionSummary> {
        const lines = readline.createInterface({ input, crlfDelay: Infinity });
        const summary: SessionSummary = { processed: 0, failed: 0 };
        let pending: string[] = [];

        for await (const line of lines) {
            if (pending.length === 0 && line.trim() === this.sentinel) {
                log.info('Sentinel received, ending session');
                break;
            }

            pending.push(line);
            if (pending.length < REQUEST_LINES) continue;

            const request: ConversionRequest = {
                inputPath: firstToken(pending[0]),
                outputPath: firstToken(pending[2]),
            };
            pending = [];

            const response = await this.handle(request);
            summary.processed++;
            if (response.status === 'error') summary.failed++;
            output.write(formatResponse(response) + '\n');
        }

        if (pending.length > 0) {
            log.warn('Input ended inside a request, ignoring it', { lines: pending.length });
        }
        log.info('Session finished', { ...summary });
        return summary;
    }

    /**
     * Convert one file and persist its outline. Never throws: failures
     * become error responses so the session can continue.
     */
    async handle(request: ConversionRequest): Promise<ConversionResponse> {
        log.debug('Request', { input: request.inputPath, output: request.outputPath });
        try {
            await this.convertFile(request);
            return { status: 'ok' };
        } catch (error) {
            if (isOutlineError(error)) {
                log.warn('Conversion failed', { input: request.inputPath, code: error.code, reason: error.message });
                return { status: 'error', code: error.code, message: error.message };
            }
            const message = error instanceof Error ? error.message : String(error);
            log.error('Unexpected conversion error', { input: request.inputPath, error: message });
            return { status: 'error', code: 'InternalError', message };
        }
    }

    private async convertFile(request: ConversionRequest): Promise<void> {
        if (!request.inputPath) {
            throw new OutlineError('InputUnavailable', 'missing input path');
        }
        if (!request.outputPath) {
            throw new OutlineError('OutputWriteFailed', 'missing output path');
        }

        const text = await readSource(request.inputPath, this.maxBytes);
        const outline = this.converter.convert(text, request.inputPath);
        await writeOutline(request.outputPath, serializeOutline(outline));
    }
}
