import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { exitCodeFor, EXIT_FATAL, runBatch } from '../batch';
import { parseHexColor, parseMargin, parsePlaceholder, resolveBatchOptions } from '../shared/config';
import { describeError, InputDirectoryMissingError, InvalidOptionError } from '../shared/errors';
import { createPdfRedactionEngine } from '../shared/file/redaction/pdf/engine';
import type { RedactionOptions, RgbColor } from '../shared/file/redaction/pdf/types';
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from '../shared/logger';

interface CliOptions {
  input?: string;
  output?: string;
  fill?: RgbColor;
  margin?: number;
  placeholder?: string;
  scrub: boolean;
  logLevel?: LogLevel;
}

export interface CliIo {
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Builds the logger once the level is known. */
  createLogger?: (level?: LogLevel) => Logger;
}

function argumentParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      if (error instanceof InvalidOptionError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}

function buildProgram(): Command {
  return new Command()
    .name('cpf-redact')
    .description('Mask the first three and last two digits of every CPF in a directory of PDFs')
    .version('1.0.0')
    .option('-i, --input <dir>', 'Input directory (default: data/input)')
    .option('-o, --output <dir>', 'Output directory (default: data/output)')
    .option('--fill <hex>', 'Mask colour as #rrggbb (default: #000000)', argumentParser(parseHexColor))
    .option('--margin <pt>', 'Points added around each mask (default: 1)', argumentParser(parseMargin))
    .option('--placeholder <char>', 'Character drawn over each masked digit', argumentParser(parsePlaceholder))
    .option('--no-scrub', 'Paint over masked digits without removing them from the text layer')
    .addOption(new Option('--log-level <level>', 'Log verbosity').choices(LOG_LEVELS))
    .exitOverride();
}

function toRedactionOptions(options: CliOptions): Partial<RedactionOptions> {
  const redaction: Partial<RedactionOptions> = { scrubTextLayer: options.scrub };
  if (options.fill) redaction.fillColor = options.fill;
  if (options.margin !== undefined) redaction.margin = options.margin;
  if (options.placeholder) redaction.placeholder = options.placeholder;
  return redaction;
}

/** Parses `argv` (user arguments only), runs the batch and returns the exit code. */
export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const logger = io.createLogger
    ? io.createLogger(options.logLevel)
    : createLogger('cpf-redact', { level: options.logLevel });
  const batchOptions = resolveBatchOptions({ inputDir: options.input, outputDir: options.output }, io.env, io.cwd);
  const engine = createPdfRedactionEngine({ options: toRedactionOptions(options), logger });

  try {
    const report = await runBatch(batchOptions, engine, logger);
    return exitCodeFor(report);
  } catch (error) {
    if (error instanceof InputDirectoryMissingError) {
      logger.error(error.message);
      return EXIT_FATAL;
    }
    logger.error('Batch aborted.', { reason: describeError(error) });
    return EXIT_FATAL;
  }
}
