// src/cli/program.ts

import { Buffer } from 'node:buffer';
import { Command, Option } from 'commander';
import inquirer from 'inquirer';
import path from 'node:path';
import type { ChunkPlacement, ILogFacility, ILogger } from '../@types/index.ts';
import { config } from '../config/index.ts';
import { decode } from '../core/decoder/index.ts';
import { InvalidEncodingError } from '../core/errors.ts';
import { encode } from '../core/encoder/index.ts';
import { print } from '../core/inspector/index.ts';
import type { Chunk } from '../core/png/index.ts';
import { remove } from '../core/remover/index.ts';
import { getLogger, NoopLogFacility } from '../utils/logging/logUtils.ts';

const PLACEMENTS: readonly ChunkPlacement[] = ['end', 'before-terminal'];

export interface ICliDependencies {
    createLogger(name: string, verbose: boolean, quiet: boolean): ILogger;
    promptMessage(): Promise<string>;
    write(text: string): void;
    exit(code: number): void;
}

type IGlobalOptions = {
    verbose?: boolean;
    quiet?: boolean;
};

function defaultLogger(logFacility: ILogFacility) {
    return (name: string, verbose: boolean, quiet: boolean): ILogger =>
        getLogger(name, quiet ? NoopLogFacility : logFacility, verbose);
}

async function promptForMessage(): Promise<string> {
    const answers = await inquirer.prompt<{ message: string }>([
        {
            type: 'password',
            name: 'message',
            message: 'Enter the message to hide:',
            mask: '*',
            validate: (value: string) => {
                if (value.length === 0) {
                    return 'Message cannot be empty';
                }
                return true;
            },
        },
    ]);
    return answers.message;
}

export const defaultCliDependencies: ICliDependencies = {
    createLogger: defaultLogger(console),
    promptMessage: promptForMessage,
    write: (text) => {
        process.stdout.write(`${text}\n`);
    },
    exit: (code) => process.exit(code),
};

/**
 * Text of a removed chunk, or its data as hex when it is not text.
 * The chunk is already gone from the file at this point, so its bytes must always be printed.
 */
function describeRemoved(chunk: Chunk, logger: ILogger): string {
    try {
        return chunk.dataAsString();
    } catch (error) {
        if (!(error instanceof InvalidEncodingError)) throw error;
        logger.warn(`Removed "${chunk.type}" data is not text; printing it as hex.`);
        return Buffer.from(chunk.data).toString('hex');
    }
}

function isChunkPlacement(value: unknown): value is ChunkPlacement {
    return PLACEMENTS.some((placement) => placement === value);
}

/**
 * Builds the `chunk-veil` program. Dependencies are injectable so the commands can run without a terminal.
 */
export function buildProgram(deps: ICliDependencies = defaultCliDependencies): Command {
    const program = new Command();

    const run = async (name: string, task: (logger: ILogger, verbose: boolean) => Promise<void>) => {
        const { verbose = false, quiet = false } = program.opts<IGlobalOptions>();
        const logger = deps.createLogger(name, verbose, quiet);
        try {
            await task(logger, verbose);
        } catch (error) {
            logger.error(`${name} failed: ${error instanceof Error ? error.message : String(error)}`);
            deps.exit(1);
        }
    };

    program
        .name('chunk-veil')
        .description('A CLI tool to hide messages in custom PNG chunks')
        .version('1.0.0')
        .option('-v, --verbose', 'Enable verbose logging')
        .option('-q, --quiet', 'Disable logging')
        .option('--no-banner', 'Do not print the banner');

    program
        .command('encode')
        .description('Hide a message in a new chunk')
        .argument('<file>', 'PNG file to read')
        .argument('<type>', 'Four-letter chunk type, e.g. ruSt')
        .argument('[message]', 'Message to hide (prompted for when omitted)')
        .option('-o, --output <file>', 'Write the result here instead of overwriting the input')
        .addOption(
            new Option('--at <placement>', 'Where to insert the chunk')
                .choices(PLACEMENTS)
                .default(config.placement.strategy),
        )
        .option('--unique', 'Fail when a chunk of the same type already exists')
        .showHelpAfterError()
        .action(async (file: string, type: string, message: string | undefined, options: { output?: string; at?: string; unique?: boolean }) => {
            await run('encoder', async (logger, verbose) => {
                const placement = options.at ?? config.placement.strategy;
                if (!isChunkPlacement(placement)) {
                    throw new Error(`Unknown placement "${placement}".`);
                }
                const text = message ?? (await deps.promptMessage());
                await encode({
                    inputFile: path.resolve(file),
                    outputFile: options.output === undefined ? undefined : path.resolve(options.output),
                    chunkType: type,
                    message: text,
                    placement,
                    uniqueType: options.unique ?? false,
                    verbose,
                    logger,
                });
            });
        });

    program
        .command('decode')
        .description('Print the message stored in the first chunk of a type')
        .argument('<file>', 'PNG file to read')
        .argument('<type>', 'Four-letter chunk type')
        .showHelpAfterError()
        .action(async (file: string, type: string) => {
            await run('decoder', async (logger, verbose) => {
                const message = await decode({ inputFile: path.resolve(file), chunkType: type, verbose, logger });
                if (message === undefined) {
                    deps.exit(1);
                    return;
                }
                deps.write(message);
            });
        });

    program
        .command('remove')
        .description('Remove the first chunk of a type and print its message (hex when not text)')
        .argument('<file>', 'PNG file to rewrite')
        .argument('<type>', 'Four-letter chunk type')
        .showHelpAfterError()
        .action(async (file: string, type: string) => {
            await run('remover', async (logger, verbose) => {
                const chunk = await remove({ inputFile: path.resolve(file), chunkType: type, verbose, logger });
                deps.write(describeRemoved(chunk, logger));
            });
        });

    program
        .command('print')
        .description('List the chunks of a PNG file')
        .argument('<file>', 'PNG file to read')
        .action(async (file: string) => {
            await run('inspector', async (logger, verbose) => {
                deps.write(await print({ inputFile: path.resolve(file), verbose, logger }));
            });
        });

    return program;
}
