/**
 * @ssh-gate/core
 *
 * Ephemeral-access session lifecycle: key material, trust grant, broker
 * session description, ssh invocation and the orchestrator composing them.
 */

// Capability interfaces
export * from './spi/index.js';

// Configuration loader
export * from './config/index.js';

// Scoped resources
export * from './scope/index.js';

// Session components
export * from './keys/index.js';
export * from './trust/index.js';
export * from './tunnel/index.js';
export * from './session/index.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/logger.js';
