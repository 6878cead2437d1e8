/**
 * Ephemeral key material
 *
 * One keypair per session. The private half is written owner-only (or handed
 * to the agent) before the public half exists anywhere, and `dispose()`
 * removes every trace regardless of how the session ended.
 */

import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { createHash } from 'crypto';
import ssh2 from 'ssh2';
import type { KeyAgent } from '../spi/index.js';
import { KeyGenerationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { OpenSshAgent } from './agent.js';
import { publicKeyPath } from './key-path.js';

export { deriveKeyPath, publicKeyPath } from './key-path.js';
export { OpenSshAgent } from './agent.js';

export type KeyAlgorithm = 'rsa' | 'ed25519';

export const KEY_ALGORITHMS: readonly KeyAlgorithm[] = ['rsa', 'ed25519'];

/**
 * Accepted key sizes in bits. EC2 Instance Connect only takes RSA and ED25519.
 */
export const SUPPORTED_KEY_SIZES: Record<KeyAlgorithm, readonly number[]> = {
  rsa: [2048, 3072, 4096, 8192],
  ed25519: [256],
};

export const DEFAULT_KEY_SIZES: Record<KeyAlgorithm, number> = {
  rsa: 2048,
  ed25519: 256,
};

/** Agent-side lifetime, matched to the trust grant TTL */
export const DEFAULT_AGENT_LIFETIME_SECONDS = 60;

export interface KeyMaterialOptions {
  algorithm: KeyAlgorithm;
  size: number;
  /** Private key path; the public key goes to `<path>.pub` */
  path: string;
  agentMode: boolean;
  /** Agent used in agent mode (default: ssh-add) */
  agent?: KeyAgent;
  lifetimeSeconds?: number;
  comment?: string;
}

export function isKeyAlgorithm(value: string): value is KeyAlgorithm {
  return (KEY_ALGORITHMS as readonly string[]).includes(value);
}

export class KeyMaterial {
  private disposed = false;

  private constructor(
    readonly algorithm: KeyAlgorithm,
    readonly size: number,
    readonly path: string,
    readonly agentMode: boolean,
    private readonly publicKeyLine: string,
    readonly fingerprint: string,
    private readonly agent?: KeyAgent
  ) {}

  /**
   * Generate a fresh keypair and place it on disk or in the agent.
   *
   * @throws KeyGenerationError on an unsupported algorithm/size, an unwritable
   *   path, a path already in use, or an agent failure
   */
  static async create(options: KeyMaterialOptions): Promise<KeyMaterial> {
    const { algorithm, size, agentMode } = options;
    const keyPath = path.resolve(options.path);
    const pubPath = publicKeyPath(keyPath);

    validateKeySpec(algorithm, size);

    const comment = options.comment ?? `ssh-gate@${path.basename(keyPath)}`;
    const pair = generateKeyPair(algorithm, size, comment);
    const fingerprint = computeFingerprint(pair.publicKey);

    try {
      await fs.mkdir(path.dirname(keyPath), { recursive: true, mode: 0o700 });
    } catch (error) {
      throw new KeyGenerationError(
        `Cannot create key directory ${path.dirname(keyPath)}: ${errorMessage(error)}`,
        'key_write_failed'
      );
    }

    if (agentMode) {
      const agent = options.agent ?? new OpenSshAgent();
      // Reserve the public key path first so an overlapping session is caught
      // before anything reaches the agent.
      const pubHandle = await openExclusive(pubPath, 0o644);
      let added = false;
      try {
        try {
          await agent.addKey(
            pair.privateKey,
            options.lifetimeSeconds ?? DEFAULT_AGENT_LIFETIME_SECONDS
          );
        } catch (error) {
          if (error instanceof KeyGenerationError) {
            throw error;
          }
          throw new KeyGenerationError(
            `Failed to load key into agent: ${errorMessage(error)}`,
            'agent_add_failed'
          );
        }
        added = true;
        try {
          await pubHandle.writeFile(`${pair.publicKey}\n`);
        } catch (error) {
          throw new KeyGenerationError(
            `Failed to write public key ${pubPath}: ${errorMessage(error)}`,
            'key_write_failed'
          );
        }
      } catch (error) {
        await pubHandle.close();
        if (added) {
          await removeFromAgent(agent, pubPath, pair.publicKey);
        }
        await fs.rm(pubPath, { force: true });
        throw error;
      }
      await pubHandle.close();

      logger.debug(`[keys] Loaded ${algorithm} key ${fingerprint} into agent`);
      return new KeyMaterial(algorithm, size, keyPath, true, pair.publicKey, fingerprint, agent);
    }

    const privHandle = await openExclusive(keyPath, 0o600);
    try {
      await privHandle.writeFile(pair.privateKey);
    } catch (error) {
      await privHandle.close();
      await fs.rm(keyPath, { force: true });
      throw new KeyGenerationError(
        `Failed to write private key ${keyPath}: ${errorMessage(error)}`,
        'key_write_failed'
      );
    }
    await privHandle.close();

    try {
      await fs.writeFile(pubPath, `${pair.publicKey}\n`, { mode: 0o644 });
    } catch (error) {
      await fs.rm(keyPath, { force: true });
      throw new KeyGenerationError(
        `Failed to write public key ${pubPath}: ${errorMessage(error)}`,
        'key_write_failed'
      );
    }

    logger.debug(`[keys] Wrote ${algorithm} key ${fingerprint} to ${keyPath}`);
    return new KeyMaterial(algorithm, size, keyPath, false, pair.publicKey, fingerprint);
  }

  /**
   * OpenSSH public key line (`ssh-ed25519 AAAA... comment`)
   */
  publicKey(): string {
    return this.publicKeyLine;
  }

  get publicKeyPath(): string {
    return publicKeyPath(this.path);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Remove key files (and the agent entry). Idempotent; never throws.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    if (this.agentMode && this.agent) {
      try {
        await this.agent.removeKey(this.publicKeyPath);
      } catch (error) {
        logger.warn(`[keys] Failed to remove key from agent: ${errorMessage(error)}`);
      }
    }

    const files = this.agentMode ? [this.publicKeyPath] : [this.path, this.publicKeyPath];
    for (const file of files) {
      try {
        await fs.rm(file, { force: true });
      } catch (error) {
        logger.warn(`[keys] Failed to remove ${file}: ${errorMessage(error)}`);
      }
    }

    logger.debug(`[keys] Disposed key ${this.fingerprint}`);
  }
}

function validateKeySpec(algorithm: string, size: number): asserts algorithm is KeyAlgorithm {
  if (!isKeyAlgorithm(algorithm)) {
    throw new KeyGenerationError(`Unsupported key algorithm: ${algorithm}`, 'unsupported_key', {
      algorithm,
    });
  }
  if (!SUPPORTED_KEY_SIZES[algorithm].includes(size)) {
    throw new KeyGenerationError(
      `Unsupported ${algorithm} key size ${size} (expected one of ${SUPPORTED_KEY_SIZES[algorithm].join(', ')})`,
      'unsupported_key',
      { algorithm, size }
    );
  }
}

function generateKeyPair(
  algorithm: KeyAlgorithm,
  size: number,
  comment: string
): { privateKey: string; publicKey: string } {
  try {
    const pair =
      algorithm === 'rsa'
        ? ssh2.utils.generateKeyPairSync('rsa', { bits: size, comment })
        : ssh2.utils.generateKeyPairSync('ed25519', { comment });
    return { privateKey: pair.private, publicKey: pair.public.trim() };
  } catch (error) {
    throw new KeyGenerationError(`Key generation failed: ${errorMessage(error)}`);
  }
}

/**
 * OpenSSH-style SHA256 fingerprint of the key blob
 */
export function computeFingerprint(publicKeyLine: string): string {
  const blob = publicKeyLine.split(/\s+/)[1];
  if (!blob) {
    throw new KeyGenerationError('Malformed public key line', 'key_generation_failed');
  }
  const digest = createHash('sha256').update(Buffer.from(blob, 'base64')).digest('base64');
  return `SHA256:${digest.replace(/=+$/, '')}`;
}

/**
 * Undo a successful agent add. ssh-add -d identifies the key by its public
 * file, so that file is rewritten first. Failures are logged; the agent
 * lifetime still expires the key.
 */
async function removeFromAgent(agent: KeyAgent, pubPath: string, publicKeyLine: string): Promise<void> {
  try {
    await fs.writeFile(pubPath, `${publicKeyLine}\n`, { mode: 0o644 });
    await agent.removeKey(pubPath);
  } catch (error) {
    logger.warn(`[keys] Failed to remove key from agent after setup error: ${errorMessage(error)}`);
  }
}

async function openExclusive(file: string, mode: number): Promise<FileHandle> {
  try {
    return await fs.open(file, 'wx', mode);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      throw new KeyGenerationError(
        `Key path ${file} is already in use; another session to this target may be open (remove the file if it was left by a crashed session)`,
        'key_path_in_use',
        { path: file }
      );
    }
    throw new KeyGenerationError(
      `Cannot write key file ${file}: ${errorMessage(error)}`,
      'key_write_failed'
    );
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
