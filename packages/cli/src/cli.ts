/**
 * CLI dispatcher: argv in, exit status out
 */

import { GateError, errorMessage, logger } from '@ssh-gate/core';
import { USAGE, UsageError, parseArgs, type CliArgs } from './args.js';
import { runSsh, type SshCommandServices } from './commands/ssh.js';

export const VERSION = '0.1.0';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdout: OutputStream;
  stderr: OutputStream;
}

const processIo: CliIo = { stdout: process.stdout, stderr: process.stderr };

export async function runCli(
  argv: readonly string[],
  services: SshCommandServices = {},
  io: CliIo = processIo
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`ssh-gate: ${error.message}\nTry 'ssh-gate --help' for usage.\n`);
      return error.exitCode;
    }
    throw error;
  }

  switch (args.command) {
    case 'help':
      io.stdout.write(USAGE.trimStart());
      return 0;
    case 'version':
      io.stdout.write(`ssh-gate ${VERSION}\n`);
      return 0;
    case 'ssh':
      break;
  }

  try {
    return await runSsh(args, services);
  } catch (error) {
    if (error instanceof GateError) {
      logger.error({ code: error.code, details: error.details }, `[ssh-gate] ${error.message}`);
      return error.exitCode;
    }
    logger.error({ err: error }, `[ssh-gate] Unexpected error: ${errorMessage(error)}`);
    return 1;
  }
}
