/**
 * `ssh-gate ssh` command
 *
 * Config → target → plugin check → instance lookup → orchestrated session.
 */

import path from 'path';
import {
  SessionOrchestrator,
  deriveKeyPath,
  enableDebugLogging,
  loadConfig,
  logger,
  resolveTarget,
  type GateConfig,
  type InstanceDirectory,
  type KeyAgent,
  type ProcessLauncher,
  type ResolvedTarget,
  type SessionBrokerClient,
  type SignalSource,
  type TrustBrokerClient,
} from '@ssh-gate/core';
import {
  Ec2InstanceDirectory,
  InstanceConnectTrustBroker,
  SsmSessionBroker,
  createAwsClients,
  destroyAwsClients,
} from '@ssh-gate/aws';
import { FileAuditSink } from '@ssh-gate/audit-file';
import type { CliArgs } from '../args.js';
import { checkPlugin, type VersionProbe } from '../plugin.js';

/**
 * Cloud-side collaborators for one (profile, region)
 */
export interface SessionBackends {
  directory: InstanceDirectory;
  trustBroker: TrustBrokerClient;
  sessionBroker: SessionBrokerClient;
  close(): void;
}

export type BackendFactory = (target: ResolvedTarget, config: GateConfig) => SessionBackends;

export const awsBackends: BackendFactory = (target, config) => {
  const clients = createAwsClients({
    profile: target.profile,
    region: target.region,
    ssmEndpoint: config.ssm_endpoint,
  });
  return {
    directory: new Ec2InstanceDirectory(clients.ec2),
    trustBroker: new InstanceConnectTrustBroker(clients.instanceConnect),
    sessionBroker: new SsmSessionBroker(clients.ssm, {
      region: target.region,
      endpoint: config.ssm_endpoint,
    }),
    close: () => destroyAwsClients(clients),
  };
};

export interface SshCommandServices {
  backends?: BackendFactory;
  probePlugin?: VersionProbe;
  launcher?: ProcessLauncher;
  agent?: KeyAgent;
  signals?: SignalSource;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

/**
 * Run one SSH session and return the ssh client's exit status.
 */
export async function runSsh(args: CliArgs, services: SshCommandServices = {}): Promise<number> {
  const env = services.env ?? process.env;
  const config = await loadConfig(args.configPath, { env, homeDir: services.homeDir });
  const debug = args.debug === true || config.debug;
  if (debug) {
    enableDebugLogging();
  }

  const target = resolveTarget(
    config,
    args.instance ?? '',
    {
      profile: args.profile,
      region: args.region,
      user: args.user,
      port: args.port,
      keyType: args.keyType,
      keySize: args.keySize,
      agentMode: args.agentMode,
    },
    env
  );
  if (target.alias) {
    logger.debug(`[ssh] Host alias ${target.alias} -> ${target.name}`);
  }

  await checkPlugin(config.plugin_path, services.probePlugin);

  const backends = (services.backends ?? awsBackends)(target, config);
  const audit = config.audit.enabled
    ? new FileAuditSink({ auditDir: config.audit.dir ?? path.join(config.gate_dir, 'audit') })
    : undefined;

  try {
    const location = await backends.directory.resolve(target.name);

    const orchestrator = new SessionOrchestrator(
      {
        trustBroker: backends.trustBroker,
        sessionBroker: backends.sessionBroker,
        launcher: services.launcher,
        agent: services.agent,
        audit,
        signals: services.signals,
      },
      {
        pluginPath: config.plugin_path,
        debug,
        sshBinary: config.ssh.binary,
        connectRetries: config.ssh.connect_retries,
        retryDelayMs: config.ssh.retry_delay_ms,
        earlyFailureWindowMs: config.ssh.early_failure_window_ms,
      }
    );

    return await orchestrator.run({
      instanceId: location.instanceId,
      availabilityZone: location.availabilityZone,
      user: target.user,
      port: target.port,
      region: target.region,
      profile: target.profile,
      key: {
        algorithm: target.keyType,
        size: target.keySize,
        path: deriveKeyPath(config.gate_dir, location.instanceId, target.region, target.profile),
        agentMode: target.agentMode,
      },
      command: args.remoteCommand,
    });
  } finally {
    await audit?.shutdown();
    backends.close();
  }
}
