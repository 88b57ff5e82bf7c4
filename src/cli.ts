/**
 * Command-line interface: `pdf-defang check <input>` and
 * `pdf-defang remove <input> <output>`.
 *
 * Exit codes: 0 success, 1 sanitization failed, 2 usage error or input that
 * could not be checked, 3 JavaScript still detected in the sanitized output.
 */

import { parseArgs } from 'node:util';
import { checkFile, sanitizeFile } from './files.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

export const USAGE = `Usage: pdf-defang [options] <command> <input> [output]

Commands:
  check <input>            Report whether the PDF contains JavaScript
  remove <input> <output>  Write a copy of the PDF with JavaScript removed

Options:
  -v, --verbose            Log every step to stderr
  -h, --help               Show this help`;

export const ExitCode = {
  Ok: 0,
  Failed: 1,
  Usage: 2,
  Unverified: 2,
  StillDetected: 3,
} as const;

export interface CliIO {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

type Command =
  | { readonly name: 'help' }
  | { readonly name: 'check'; readonly input: string; readonly verbose: boolean }
  | { readonly name: 'remove'; readonly input: string; readonly output: string; readonly verbose: boolean };

/** Thrown by parseCommand for arguments that do not form a command */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCommand(argv: readonly string[]): Command {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { name: 'help' };

  const verbose = values.verbose === true;
  const [command, input, output, ...extra] = positionals;
  if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra[0]}`);

  switch (command) {
    case 'check':
      if (input === undefined || output !== undefined) throw new UsageError('check takes exactly one input file');
      return { name: 'check', input, verbose };
    case 'remove':
      if (input === undefined || output === undefined) throw new UsageError('remove takes an input and an output file');
      return { name: 'remove', input, output, verbose };
    case undefined:
      throw new UsageError('Missing command');
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/** Run the CLI and resolve to the process exit code. */
export async function run(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.stderr(`Error: ${err.message}`);
    io.stderr(USAGE);
    return ExitCode.Usage;
  }

  if (command.name === 'help') {
    io.stdout(USAGE);
    return ExitCode.Ok;
  }

  const logger = createLogger({ level: command.verbose ? 'debug' : 'info', write: io.stderr });
  try {
    return command.name === 'check'
      ? await runCheck(command.input, logger, io)
      : await runRemove(command.input, command.output, logger, io);
  } catch (err) {
    logger.error('Unexpected failure', err);
    io.stdout(`Result: An error occurred: ${err instanceof Error ? err.message : String(err)}`);
    return ExitCode.Failed;
  }
}

async function runCheck(input: string, logger: Logger, io: CliIO): Promise<number> {
  const result = await checkFile(input, { logger });
  switch (result.status) {
    case 'detected':
      io.stdout(`Result: JavaScript DETECTED in '${input}' (${result.finding.location}).`);
      return ExitCode.Ok;
    case 'clean':
      io.stdout(`Result: No JavaScript detected (based on checks) in '${input}'.`);
      return ExitCode.Ok;
    case 'unverified':
      io.stdout(`Result: Cannot check '${input}': ${result.error.message}.`);
      return ExitCode.Unverified;
  }
}

async function runRemove(input: string, output: string, logger: Logger, io: CliIO): Promise<number> {
  const result = await sanitizeFile(input, output, { logger });
  if (!result.ok) {
    io.stdout(`Result: Failed to sanitize '${input}': ${result.error.message}.`);
    return ExitCode.Failed;
  }
  io.stdout(`Result: Successfully processed '${input}' and saved sanitized file to '${output}'.`);

  const verification = await checkFile(output, { logger });
  if (verification.status === 'clean') {
    io.stdout(`Verification: Sanitized file '${output}' appears clean.`);
    return ExitCode.Ok;
  }
  io.stdout(`Verification Warning: JavaScript may still be present in '${output}'. Manual review recommended.`);
  return ExitCode.StillDetected;
}
