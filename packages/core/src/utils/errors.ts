/**
 * Custom error classes
 *
 * All gate errors extend GateError for consistent error handling. The CLI maps
 * `exitCode` straight onto the process exit status.
 */

export class GateError extends Error {
  constructor(
    message: string,
    public code: string,
    public exitCode: number = 1,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GateError';
  }
}

/**
 * Local key generation or key file failure. Raised before any remote call.
 */
export class KeyGenerationError extends GateError {
  constructor(message: string, code = 'key_generation_failed', details?: Record<string, unknown>) {
    super(message, code, 1, details);
    this.name = 'KeyGenerationError';
  }
}

/**
 * Trust broker refused to authorize the public key.
 */
export class TrustInstallError extends GateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'trust_install_failed', 1, details);
    this.name = 'TrustInstallError';
  }
}

export class InstanceResolutionError extends GateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'instance_not_found', 1, details);
    this.name = 'InstanceResolutionError';
  }
}

export class SessionStartError extends GateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'session_start_failed', 1, details);
    this.name = 'SessionStartError';
  }
}

/**
 * SSH client binary missing or not executable.
 */
export class ProcessLaunchError extends GateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'process_launch_failed', 127, details);
    this.name = 'ProcessLaunchError';
  }
}

export class SessionInterruptedError extends GateError {
  constructor(signal: string) {
    super(`Session setup interrupted by ${signal}`, 'interrupted', 130, { signal });
    this.name = 'SessionInterruptedError';
  }
}

export class ConfigurationError extends GateError {
  constructor(message: string, code = 'configuration_error', details?: Record<string, unknown>) {
    super(message, code, 2, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Proxying executable (session-manager-plugin) missing or too old.
 */
export class PluginError extends GateError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'plugin_unavailable', 1, details);
    this.name = 'PluginError';
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
