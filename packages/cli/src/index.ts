/**
 * @ssh-gate/cli
 */

export { runCli, VERSION, type CliIo, type OutputStream } from './cli.js';
export { parseArgs, UsageError, USAGE, type CliArgs, type CliCommand } from './args.js';
export {
  runSsh,
  awsBackends,
  type BackendFactory,
  type SessionBackends,
  type SshCommandServices,
} from './commands/ssh.js';
export {
  checkPlugin,
  compareVersions,
  probePluginVersion,
  MIN_PLUGIN_VERSION,
  type VersionProbe,
} from './plugin.js';
