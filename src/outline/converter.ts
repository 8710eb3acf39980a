import { OutlineError } from '../common/errors';
import { createLogger } from '../common/logger';
import { SourceParser } from '../parser/types';
import { NameExtractor, defaultNameExtractor } from './name-extractor';
import { detectParseErrors, normalizeRoot } from './normalizer';
import { fileLocationSpan, UNSET_BYTE_SPAN } from './span';
import { OUTLINE_FORMAT_VERSION, OutlineFile } from './types';

const log = createLogger('convert');

export interface OutlineConverterOptions {
    parser: SourceParser;
    nameExtractor?: NameExtractor;
    /**
     * Set `parsingErrorsDetected` from parser error nodes. When false the
     * flag is always false.
     */
    detectParseErrors?: boolean;
}

/**
 * Turns source text into an OutlineFile: parse, normalize, wrap.
 */
export class OutlineConverter {
    private readonly parser: SourceParser;
    private readonly nameExtractor: NameExtractor;
    private readonly detectErrors: boolean;

    constructor(options: OutlineConverterOptions) {
        this.parser = options.parser;
        this.nameExtractor = options.nameExtractor ?? defaultNameExtractor;
        this.detectErrors = options.detectParseErrors ?? true;
    }

    /**
     * Failures are thrown to the caller, which reports them.
     *
     * @throws OutlineError ParseFailed or RootExtractionFailed
     */
    convert(sourceText: string, filePath: string): OutlineFile {
        const start = Date.now();

        const parsed = this.parser.parse(sourceText);
        if (!parsed.success) {
            throw new OutlineError('ParseFailed', parsed.error);
        }

        const children = normalizeRoot(parsed.root, this.nameExtractor);
        const outline: OutlineFile = {
            type: 'file',
            name: filePath,
            locationSpan: fileLocationSpan(sourceText),
            footerSpan: [...UNSET_BYTE_SPAN],
            parsingErrorsDetected: this.detectErrors && detectParseErrors(parsed.root),
            children,
            parsingError: null,
            formatVersion: OUTLINE_FORMAT_VERSION,
        };

        log.debug('Converted', { file: filePath, nodes: children.length, durationMs: Date.now() - start });
        return outline;
    }
}
