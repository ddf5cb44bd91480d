// packages/node-runtime/src/program.ts
import { Command, CommanderError, Option } from 'commander';
import { accessSync, constants as fsConstants, existsSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
  LazyRangeBuffer,
  DEFAULT_COMPLETION,
  DEFAULT_MAX_EXTRACT_BYTES,
  DEFAULT_STRATEGY,
  COMPLETION_MODES,
  STRATEGY_NAMES,
  base64Encode,
  hexEncode,
  toVerbosity,
  type CompletionMode,
  type LazyRangeBufferOptions,
} from '../../core/src/index.js';
import { FilesystemError, InvalidRangeError } from '../../core/src/errors/index.js';
import { FileRangeSource } from './FileRangeSource.js';

export const PKG_VERSION = '1.0.0'; // sync with root package.json

export const OUTPUT_FORMATS = ['raw', 'hex', 'base64'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

/** Process boundary, injectable so the program can run in-process. */
export interface CliIO {
  stdout(chunk: string | Uint8Array): void;
  stderr(msg: string): void;
  env   : Record<string, string | undefined>;
  cwd   : string;
}

type GlobalOptions = {
  strategy  : string;
  mode      : CompletionMode;
  chunkSize?: number;
  verbose   : number;
};

type RangeOptions = {
  offset : number;
  length?: number;
};

type ExtractOptions = RangeOptions & {
  format: OutputFormat;
  out   : string;
};

function nonNegativeInt(label: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new InvalidRangeError(`${label} must be a non-negative integer`);
    }
    return n;
  };
}

function positiveInt(label: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isSafeInteger(n) || n <= 0) {
      throw new InvalidRangeError(`${label} must be a positive integer`);
    }
    return n;
  };
}

/** Extraction guard; BYTERANGE_MAX_BYTES overrides the default. */
export function maxExtractBytes(env: CliIO['env']): number {
  const envLimit = Number(env.BYTERANGE_MAX_BYTES);
  return Number.isFinite(envLimit) && envLimit > 0
    ? Math.floor(envLimit)
    : DEFAULT_MAX_EXTRACT_BYTES;
}

function assertWritable(out: string): void {
  const targetDir = dirname(out);
  if (!existsSync(targetDir)) {
    throw new FilesystemError(`Output directory does not exist: ${targetDir}`);
  }
  try {
    accessSync(targetDir, fsConstants.W_OK);
  } catch {
    throw new FilesystemError('Output directory is not writeable');
  }
}

function render(data: Uint8Array, format: OutputFormat): string | Uint8Array {
  switch (format) {
    case 'hex'   : return hexEncode(data) + '\n';
    case 'base64': return base64Encode(data) + '\n';
    case 'raw'   : return data;
  }
}

function rangeOptions(cmd: Command): Command {
  return cmd
    .addOption(
      new Option('--offset <bytes>', 'start of the range')
        .argParser(nonNegativeInt('Offset'))
        .default(0),
    )
    .addOption(
      new Option('--length <bytes>', 'range length (default: to end of file)')
        .argParser(nonNegativeInt('Length')),
    );
}

export function buildProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name('byterange')
    .version(PKG_VERSION)
    .description('Extract byte ranges from files, tolerating short reads')
    .exitOverride()
    .configureOutput({
      writeOut: s => io.stdout(s),
      writeErr: s => io.stderr(s),
    })

    .addOption(
      new Option('-S, --strategy <name>', 'read strategy')
        .choices(STRATEGY_NAMES)
        .default(DEFAULT_STRATEGY),
    )
    .addOption(
      new Option('-m, --mode <mode>', 'behaviour when the file ends early')
        .choices(COMPLETION_MODES)
        .default(DEFAULT_COMPLETION),
    )
    .addOption(
      new Option('-c, --chunk-size <bytes>', 'cap on bytes per physical read')
        .argParser(positiveInt('Chunk size')),
    )
    // verbosity (repeatable)
    .addOption(
      new Option('-v, --verbose', 'increase verbosity (use multiple times)')
        .default(0)
        .argParser<number>((_, previous) => previous + 1),
    );

  const bufferOptions = (): LazyRangeBufferOptions => {
    const opts = program.opts<GlobalOptions>();
    return {
      strategy  : opts.strategy,
      completion: opts.mode,
      verbose   : toVerbosity(opts.verbose),
      logger    : msg => io.stderr(msg + '\n'),
    };
  };

  const openSource = (file: string): FileRangeSource =>
    FileRangeSource.open(resolve(io.cwd, file), {
      maxReadSize: program.opts<GlobalOptions>().chunkSize,
    });

  /* ------------------------------------------------------------------ */
  /*  extract                                                            */
  /* ------------------------------------------------------------------ */
  rangeOptions(
    program
      .command('extract <file>')
      .description('Write the bytes of a range; --out - for STDOUT'),
  )
    .addOption(
      new Option('-f, --format <format>', 'output encoding')
        .choices(OUTPUT_FORMATS)
        .default('raw'),
    )
    .option('-o, --out <file>', 'output file (default STDOUT)', '-')
    .action((file: string, opts: ExtractOptions) => {
      const limit = maxExtractBytes(io.env);
      const outPath = opts.out === '-' ? null : resolve(io.cwd, opts.out);
      if (outPath) assertWritable(outPath);

      const src = openSource(file);
      try {
        const size = opts.length ?? Math.max(0, src.length - opts.offset);
        if (size > limit) {
          throw new InvalidRangeError(
            `Range of ${size} bytes exceeds limit of ${limit} bytes`,
          );
        }

        const range   = new LazyRangeBuffer(src, opts.offset, size, bufferOptions());
        const payload = render(range.getData(), opts.format);

        if (outPath) writeFileSync(outPath, payload);
        else io.stdout(payload);
      } finally {
        src.close();
      }
    });

  /* ------------------------------------------------------------------ */
  /*  info                                                               */
  /* ------------------------------------------------------------------ */
  rangeOptions(
    program
      .command('info <file>')
      .description('Describe a range as JSON without reading it'),
  )
    .action((file: string, opts: RangeOptions) => {
      const src = openSource(file);
      try {
        const size  = opts.length ?? Math.max(0, src.length - opts.offset);
        const range = new LazyRangeBuffer(src, opts.offset, size, bufferOptions());
        const end   = range.position + range.size;
        const meta  = {
          file,
          sourceLength: src.length,
          position    : range.position,
          size        : range.size,
          end,
          withinSource: end <= src.length,
        };
        io.stdout(JSON.stringify(meta, null, 2) + '\n');
      } finally {
        src.close();
      }
    });

  return program;
}

/**
 * Parse `argv` (user arguments only) and run the selected command.
 * Resolves with the process exit code.
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  try {
    await buildProgram(io).parseAsync(argv, { from: 'user' });
    return 0;
  } catch (err) {
    // commander has already printed usage errors via writeErr
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof Error) {
      io.stderr(`Error [${err.constructor.name}]: ${err.message}\n`);
    } else {
      io.stderr(`Error [Unknown]: ${String(err)}\n`);
    }
    return 1;
  }
}
