/**
 * ssh-add backed key agent
 *
 * The private key goes to the agent over stdin, never through a file.
 */

import { spawn } from 'child_process';
import type { KeyAgent } from '../spi/index.js';
import { KeyGenerationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export class OpenSshAgent implements KeyAgent {
  constructor(private readonly binary: string = 'ssh-add') {}

  async addKey(privateKey: string, lifetimeSeconds: number): Promise<void> {
    if (!process.env.SSH_AUTH_SOCK) {
      throw new KeyGenerationError(
        'Agent mode requires a running ssh-agent (SSH_AUTH_SOCK is not set)',
        'agent_unavailable'
      );
    }
    await this.run(['-q', '-t', String(lifetimeSeconds), '-'], privateKey);
    logger.debug(`[agent] Added ephemeral key (lifetime ${lifetimeSeconds}s)`);
  }

  async removeKey(publicKeyPath: string): Promise<void> {
    await this.run(['-q', '-d', publicKeyPath]);
    logger.debug(`[agent] Removed ephemeral key ${publicKeyPath}`);
  }

  private run(args: string[], input?: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.binary, args, { stdio: ['pipe', 'ignore', 'pipe'] });
      let stderr = '';

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
      child.on('error', reject);
      child.on('close', (code: number | null) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${this.binary} exited with ${code}: ${stderr.trim()}`));
        }
      });

      child.stdin.end(input ?? '');
    });
  }
}
