/**
 * session-manager-plugin presence and version check
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { PluginError, errorMessage, logger } from '@ssh-gate/core';

export const MIN_PLUGIN_VERSION = '1.1.23.0';

const execFileAsync = promisify(execFile);

export type VersionProbe = (pluginPath: string) => Promise<string>;

/**
 * Run `<plugin> --version` and return its trimmed stdout
 */
export const probePluginVersion: VersionProbe = async pluginPath => {
  const { stdout } = await execFileAsync(pluginPath, ['--version'], { timeout: 10_000 });
  return stdout.trim();
};

/**
 * Compare dotted numeric versions; missing segments count as 0.
 *
 * @returns negative, zero or positive like a sort comparator
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(part => parseInt(part, 10) || 0);
  const right = b.split('.').map(part => parseInt(part, 10) || 0);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Ensure the plugin runs and is recent enough.
 *
 * @returns the detected version
 * @throws PluginError if it is missing, fails, or is older than the minimum
 */
export async function checkPlugin(
  pluginPath: string,
  probe: VersionProbe = probePluginVersion,
  minimum: string = MIN_PLUGIN_VERSION
): Promise<string> {
  let output: string;
  try {
    output = await probe(pluginPath);
  } catch (error) {
    throw new PluginError(
      `session-manager-plugin not found or not runnable at ${pluginPath}: ${errorMessage(error)}`,
      { plugin_path: pluginPath }
    );
  }

  const version = output.match(/\d+(?:\.\d+)+/)?.[0];
  if (!version) {
    throw new PluginError(`Cannot read session-manager-plugin version from "${output}"`, {
      plugin_path: pluginPath,
    });
  }
  if (compareVersions(version, minimum) < 0) {
    throw new PluginError(
      `session-manager-plugin ${version} is too old; ${minimum} or newer is required`,
      { plugin_path: pluginPath, version, minimum }
    );
  }

  logger.debug(`[plugin] session-manager-plugin ${version} at ${pluginPath}`);
  return version;
}
