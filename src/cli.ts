/**
 * totcli: check .tot files and convert them to and from JSON, YAML and TOML.
 *
 *   totcli <file> check
 *   totcli <file> to <json|yaml|toml> <out>
 *   totcli <file> from <json|yaml|toml> <out>
 */

import { readFileSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { isForeignFormat, readForeign, writeForeign, type ForeignFormat } from './convert.js';
import { TotError, TotIoError } from './errors.js';
import { Logger, levelFromEnv } from './logger.js';
import { parseValue } from './parser.js';
import { stringify } from './stringify.js';

/** Everything the CLI touches outside the process, injectable for tests. */
export interface CliIo {
  readFile(path: string): Promise<string>;
  writeFile(path: string, contents: string): Promise<void>;
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
}

export const nodeIo: CliIo = {
  readFile: (path) => readFile(path, 'utf8'),
  writeFile: (path, contents) => writeFile(path, contents, 'utf8'),
  stdout: (text) => void process.stdout.write(text),
  stderr: (text) => void process.stderr.write(text),
  env: process.env,
};

export const HELP_TEXT = `
totcli v${readVersion()}

USAGE:
  totcli <file> <command> [options]

COMMANDS:
  check                        Verify that <file> is a valid .tot document
  to <json|yaml|toml> <out>    Convert <file> from .tot to the given type
  from <json|yaml|toml> <out>  Convert <file> from the given type to .tot

OPTIONS:
  --help, -h     Show this help message
  --version, -v  Show version information

ENVIRONMENT:
  TOT_LOG        Log level: off, error, warn, info, debug (default), trace
`;

/**
 * Reads the version from package.json, one directory above this module.
 */
export function readVersion(): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch {
    return '(unknown)';
  }
  return '(unknown)';
}

class UsageError extends Error {
  override readonly name = 'UsageError';
}

type Command =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'check'; file: string }
  | { kind: 'to' | 'from'; file: string; format: ForeignFormat; out: string };

export function parseArgs(argv: readonly string[]): Command {
  const [first, command, ...rest] = argv;
  if (first === undefined || argv.includes('--help') || argv.includes('-h') || first === 'help') return { kind: 'help' };
  if (argv.includes('--version') || argv.includes('-v')) return { kind: 'version' };
  if (command === undefined) throw new UsageError(`Missing command after ${first}`);
  switch (command) {
    case 'check':
      if (rest.length > 0) throw new UsageError(`Unexpected argument: ${rest.join(' ')}`);
      return { kind: 'check', file: first };
    case 'to':
    case 'from': {
      const [format, out, ...extra] = rest;
      if (format === undefined || out === undefined) {
        throw new UsageError(`Usage: totcli <file> ${command} <json|yaml|toml> <out>`);
      }
      if (!isForeignFormat(format)) throw new UsageError(`Unknown file type: ${format}`);
      if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra.join(' ')}`);
      return { kind: command, file: first, format, out };
    }
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

async function read(io: CliIo, path: string): Promise<string> {
  try {
    return await io.readFile(path);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TotIoError(`Cannot read ${path}: ${reason}`, { cause: error });
  }
}

async function write(io: CliIo, path: string, contents: string): Promise<void> {
  try {
    await io.writeFile(path, contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TotIoError(`Cannot write ${path}: ${reason}`, { cause: error });
  }
}

function describeError(error: unknown): string {
  if (error instanceof TotError) return error.toString();
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the CLI and return its exit code: 0 on success, 1 on any failure.
 */
export async function runCli(argv: readonly string[], io: CliIo = nodeIo): Promise<number> {
  const logger = new Logger({ level: levelFromEnv(io.env), write: io.stderr });
  logger.debug('start', { argv: [...argv] });
  try {
    const command = parseArgs(argv);
    switch (command.kind) {
      case 'help':
        io.stdout(HELP_TEXT);
        return 0;
      case 'version':
        io.stdout(`totcli v${readVersion()}\n`);
        return 0;
      case 'check': {
        parseValue(await read(io, command.file));
        logger.info('check_ok', { file: command.file });
        io.stdout(`${command.file}: ok\n`);
        return 0;
      }
      case 'to': {
        const value = parseValue(await read(io, command.file));
        await write(io, command.out, writeForeign(command.format, value));
        logger.info('convert_done', { from: 'tot', to: command.format, out: command.out });
        return 0;
      }
      case 'from': {
        const value = readForeign(command.format, await read(io, command.file));
        await write(io, command.out, stringify(value));
        logger.info('convert_done', { from: command.format, to: 'tot', out: command.out });
        return 0;
      }
    }
  } catch (error) {
    logger.debug('failed', { error: describeError(error) });
    io.stderr(`Error: ${describeError(error)}\n`);
    if (error instanceof UsageError) io.stderr('\nRun "totcli help" for usage information.\n');
    return 1;
  }
}
