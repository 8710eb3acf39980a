#!/usr/bin/env node
/**
 * Semantic Outline CLI
 *
 * Usage:
 *   semantic-outline [session]              # serve requests on stdin/stdout
 *   semantic-outline convert <in> <out>     # convert one file
 */

import { configureLogger, createLogger } from '../common/logger';
import { describeError } from '../common/errors';
import { OutlineConverter } from '../outline/converter';
import { serializeOutline } from '../outline/serializer';
import { RustAdapter } from '../parser/rust';
import { loadConfig, ENV_VARS } from './config';
import { OutlineSession } from './session';
import { readSource, writeOutline } from './storage';

const log = createLogger('cli');

export interface CliArgs {
    command: 'session' | 'convert' | 'help';
    verbose: boolean;
    paths: string[];
}

/**
 * Parse command line arguments
 *
 * @throws Error on unknown options or commands
 */
export function parseArgs(argv: string[]): CliArgs {
    const result: CliArgs = { command: 'session', verbose: false, paths: [] };

    for (const arg of argv) {
        switch (arg) {
            case '--verbose':
            case '-v':
                result.verbose = true;
                break;

            case '--help':
            case '-h':
                result.command = 'help';
                break;

            case 'session':
            case 'convert':
                if (result.command !== 'help') result.command = arg;
                break;

            default:
                if (arg.startsWith('-')) {
                    throw new Error(`Unknown option: ${arg}`);
                }
                result.paths.push(arg);
                break;
        }
    }

    if (result.command === 'convert' && result.paths.length !== 2) {
        throw new Error('convert expects <input> <output>');
    }
    if (result.command === 'session' && result.paths.length > 0) {
        throw new Error(`Unexpected argument: ${result.paths[0]}`);
    }

    return result;
}

function printHelp(): void {
    console.error(`
semantic-outline - Rust source outlines as JSON

USAGE:
  semantic-outline [session] [OPTIONS]
  semantic-outline convert <input> <output> [OPTIONS]

COMMANDS:
  session            Read requests from stdin (default). Each request is
                     three lines: input path, reserved line, output path.
                     A line "end" finishes the session.
  convert            Convert a single file

OPTIONS:
  --verbose, -v      Debug logging
  --help, -h         Show this help

ENVIRONMENT:
  ${ENV_VARS.LOG_LEVEL}            debug | info | warn | error
  ${ENV_VARS.LOG_FORMAT}           pretty | json
  ${ENV_VARS.DETECT_PARSE_ERRORS}  true | false
  ${ENV_VARS.SESSION_SENTINEL}     Line that ends a session (default: end)
  ${ENV_VARS.MAX_FILE_SIZE_KB}     Largest input accepted (default: 1024)
`);
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
    const args = parseArgs(argv);
    if (args.command === 'help') {
        printHelp();
        return 0;
    }

    const config = loadConfig();
    configureLogger({
        level: args.verbose ? 'debug' : config.logLevel,
        format: config.logFormat,
    });

    const converter = new OutlineConverter({
        parser: new RustAdapter().createParser(),
        detectParseErrors: config.detectParseErrors,
    });

    if (args.command === 'convert') {
        const [inputPath, outputPath] = args.paths;
        const text = await readSource(inputPath, config.maxFileSizeKB * 1024);
        await writeOutline(outputPath, serializeOutline(converter.convert(text, inputPath)));
        log.info('Outline written', { input: inputPath, output: outputPath });
        return 0;
    }

    const session = new OutlineSession({
        converter,
        sentinel: config.sessionSentinel,
        maxFileSizeKB: config.maxFileSizeKB,
    });
    // Failures were already answered per request
    await session.run(process.stdin, process.stdout);
    return 0;
}

if (require.main === module) {
    main()
        .then(code => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            log.error(describeError(error));
            process.exitCode = 1;
        });
}
