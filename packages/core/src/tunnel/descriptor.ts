import type { SessionDescriptor } from '../spi/index.js';

/** Session document that bridges the broker channel to the instance's sshd */
export const SSH_SESSION_DOCUMENT = 'AWS-StartSSHSession';

/**
 * Describe the broker session for an SSH connection. Pure data, no I/O.
 *
 * Key order (Target, DocumentName, Parameters) is preserved through
 * JSON.stringify and forms part of the proxying executable's input.
 */
export function describeSession(instanceId: string, port: number): SessionDescriptor {
  return Object.freeze({
    Target: instanceId,
    DocumentName: SSH_SESSION_DOCUMENT,
    Parameters: Object.freeze({ portNumber: Object.freeze([String(port)] as const) }),
  });
}
