import path from 'path';

/**
 * Percent-encode every byte outside [A-Za-z0-9_-].
 *
 * '.' is encoded too because it separates the segments of the file name.
 */
function encodeSegment(value: string): string {
  let encoded = '';
  for (const byte of Buffer.from(value, 'utf-8')) {
    const char = String.fromCharCode(byte);
    encoded += /[A-Za-z0-9_-]/.test(char)
      ? char
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return encoded;
}

/**
 * Ephemeral key location: `<gate-dir>/<instance-id>.<region>.<profile>`
 *
 * Deterministic per target, so two sessions to the same target collide on
 * purpose (and KeyMaterial.create reports it) while different targets never do.
 */
export function deriveKeyPath(
  gateDir: string,
  instanceId: string,
  region: string,
  profile: string
): string {
  const fileName = [instanceId, region, profile].map(encodeSegment).join('.');
  return path.join(gateDir, fileName);
}

export function publicKeyPath(keyPath: string): string {
  return `${keyPath}.pub`;
}
