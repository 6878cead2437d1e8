/**
 * Interactive child process launcher
 *
 * The ssh client inherits the operator's terminal. Exit by signal is reported
 * the way a shell does, as 128 + signal number.
 */

import { spawn } from 'child_process';
import { constants } from 'os';
import type { LaunchedProcess, ProcessLauncher } from '../spi/index.js';
import { ProcessLaunchError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    const number = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
    return 128 + (number ?? 0);
  }
  return 1;
}

export class ChildProcessLauncher implements ProcessLauncher {
  launch(command: string, args: readonly string[]): LaunchedProcess {
    logger.debug(`[process] Spawning ${command} with ${args.length} arguments`);

    const child = spawn(command, args, { stdio: 'inherit' });

    const exited = new Promise<number>((resolve, reject) => {
      child.once('error', (error: NodeJS.ErrnoException) => {
        // 'error' without 'spawn' means the binary never ran
        if (child.pid === undefined) {
          reject(
            new ProcessLaunchError(`Cannot launch ${command}: ${error.message}`, {
              command,
              errno: error.code,
            })
          );
        } else {
          logger.warn(`[process] ${command} error: ${error.message}`);
        }
      });
      child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        const status = exitStatus(code, signal);
        logger.debug(`[process] ${command} exited: code=${code} signal=${signal}`);
        resolve(status);
      });
    });

    return {
      get pid() {
        return child.pid;
      },
      kill: (signal: NodeJS.Signals) => child.kill(signal),
      exited,
    };
  }
}
