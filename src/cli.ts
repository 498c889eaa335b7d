#!/usr/bin/env node
/**
 * jsonpack CLI
 *
 * Command-line front end for the JSON <-> MessagePack converter.
 */

import { parseArgs } from 'node:util';
import { readFile } from 'node:fs/promises';
import { convertJsonToMessagePack, convertMessagePackToJson, Result } from './convert';
import { decideEncoding, TextEncoding, InputEncoding } from './transport/encoding';
import { ConversionError, describeError } from './errors';
import { loadConfig, Config } from './config';
import { configureLogger, log } from './logger';

// =============================================================================
// Version
// =============================================================================

export const VERSION = '0.1.0';

// =============================================================================
// CLI Types
// =============================================================================

export type InputSource =
  | { kind: 'text'; text: string }
  | { kind: 'file'; path: string }
  | { kind: 'stdin' };

export type Command =
  | { type: 'help' }
  | { type: 'version' }
  | { type: 'encode'; input: InputSource; outputEncoding?: TextEncoding }
  | { type: 'decode'; input: InputSource; inputEncoding: InputEncoding; indent?: number }
  | { type: 'detect'; input: InputSource }
  | { type: 'usage-error'; message: string };

/** Process boundary, replaceable in tests */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
  readFile(path: string): Promise<string>;
  env: NodeJS.ProcessEnv;
}

export const USAGE = `Usage: jsonpack <command> [text] [options]

Commands:
  encode    Convert JSON to MessagePack text (base64 unless --hex)
  decode    Convert hex or base64 MessagePack text to JSON
  detect    Print whether the text would be read as hex or base64

Input is the text argument, the file named by --file, or stdin.

Options:
  -f, --file <path>     Read input from a file
      --hex             encode: write hex instead of base64
      --from <enc>      decode: auto | hex | base64 (default: auto)
      --indent <n>      decode: spaces per indentation level, 0-8
  -h, --help            Show this help
  -v, --version         Show the version

Environment:
  JSONPACK_LOG_LEVEL, JSONPACK_OUTPUT_ENCODING, JSONPACK_INDENT`;

// =============================================================================
// Argument Parsing
// =============================================================================

function parseOptions(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      file: { type: 'string', short: 'f' },
      hex: { type: 'boolean', default: false },
      from: { type: 'string' },
      indent: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
  });
}

export function parseCommand(argv: string[]): Command {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (err) {
    return { type: 'usage-error', message: describeError(err) };
  }

  const { values, positionals } = parsed;

  if (values.help) {
    return { type: 'help' };
  }
  if (values.version) {
    return { type: 'version' };
  }
  if (positionals.length === 0) {
    return { type: 'help' };
  }

  const [command, ...rest] = positionals;
  if (command === 'help') return { type: 'help' };
  if (command === 'version') return { type: 'version' };

  if (rest.length > 1) {
    return { type: 'usage-error', message: 'Expected at most one text argument' };
  }
  if (rest.length === 1 && values.file !== undefined) {
    return { type: 'usage-error', message: 'Give either a text argument or --file, not both' };
  }

  const input: InputSource =
    rest.length === 1 ? { kind: 'text', text: rest[0] }
    : values.file !== undefined ? { kind: 'file', path: values.file }
    : { kind: 'stdin' };

  switch (command) {
    case 'encode':
      return { type: 'encode', input, outputEncoding: values.hex ? 'hex' : undefined };

    case 'decode': {
      const inputEncoding = parseInputEncoding(values.from);
      if (inputEncoding === null) {
        return { type: 'usage-error', message: `Invalid --from value: ${values.from}` };
      }
      let indent: number | undefined;
      if (values.indent !== undefined) {
        indent = Number(values.indent);
        if (!Number.isInteger(indent) || indent < 0 || indent > 8) {
          return { type: 'usage-error', message: `Invalid --indent value: ${values.indent}` };
        }
      }
      return { type: 'decode', input, inputEncoding, indent };
    }

    case 'detect':
      return { type: 'detect', input };

    default:
      return { type: 'usage-error', message: `Unknown command: ${command}` };
  }
}

function parseInputEncoding(s: string | undefined): InputEncoding | null {
  switch (s) {
    case undefined:
    case 'auto':
      return 'auto';
    case 'hex':
    case 'base64':
      return s;
    default:
      return null;
  }
}

// =============================================================================
// Running
// =============================================================================

async function readInput(source: InputSource, io: CliIO): Promise<string> {
  switch (source.kind) {
    case 'text':
      return source.text;
    case 'file':
      return stripLineBreak(await io.readFile(source.path));
    case 'stdin':
      return stripLineBreak(await io.readStdin());
  }
}

function stripLineBreak(text: string): string {
  return text.replace(/\r?\n$/, '');
}

function report(result: Result<string, ConversionError>, io: CliIO): number {
  if (result.ok) {
    io.stdout(result.value);
    return 0;
  }
  log.debug(`conversion failed at stage ${result.error.stage}`);
  io.stderr(result.error.message);
  return 1;
}

/**
 * Run the CLI and return its exit code: 0 on success, 1 when the conversion
 * or the input read fails, 2 on a usage or configuration error.
 */
export async function runCli(argv: string[], io: CliIO = processIO()): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(io.env);
  } catch (err) {
    io.stderr(describeError(err));
    return 2;
  }
  configureLogger(config.logLevel);

  const command = parseCommand(argv);
  switch (command.type) {
    case 'help':
      io.stdout(USAGE);
      return 0;

    case 'version':
      io.stdout(VERSION);
      return 0;

    case 'usage-error':
      io.stderr(`${command.message}\n\n${USAGE}`);
      return 2;
  }

  let text: string;
  try {
    text = await readInput(command.input, io);
  } catch (err) {
    log.error(`cannot read input from ${command.input.kind}`, { error: describeError(err) });
    io.stderr(`Cannot read input: ${describeError(err)}`);
    return 1;
  }
  log.debug(`read ${text.length} characters from ${command.input.kind}`);

  switch (command.type) {
    case 'encode':
      return report(
        convertJsonToMessagePack(text, {
          outputEncoding: command.outputEncoding ?? config.outputEncoding,
        }),
        io
      );

    case 'decode':
      return report(
        convertMessagePackToJson(text, {
          inputEncoding: command.inputEncoding,
          indent: command.indent ?? config.indent,
        }),
        io
      );

    case 'detect':
      io.stdout(decideEncoding(text));
      return 0;
  }
}

function processIO(): CliIO {
  return {
    stdout: text => {
      process.stdout.write(`${text}\n`);
    },
    stderr: text => {
      process.stderr.write(`${text}\n`);
    },
    readStdin: async () => {
      const chunks: Buffer[] = [];
      for await (const chunk of process.stdin) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks).toString('utf8');
    },
    readFile: path => readFile(path, 'utf8'),
    env: process.env,
  };
}

// =============================================================================
// Main
// =============================================================================

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    err => {
      log.error('unexpected failure', { error: describeError(err) });
      process.exitCode = 1;
    }
  );
}
