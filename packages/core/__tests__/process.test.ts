import { describe, it, expect } from 'vitest';
import { ChildProcessLauncher, exitStatus } from '../src/session/process.js';
import { ProcessLaunchError } from '../src/utils/errors.js';

describe('exitStatus', () => {
  it('passes exit codes through', () => {
    expect(exitStatus(0, null)).toBe(0);
    expect(exitStatus(255, null)).toBe(255);
  });

  it('maps termination by signal to 128 + signal number', () => {
    expect(exitStatus(null, 'SIGINT')).toBe(130);
    expect(exitStatus(null, 'SIGTERM')).toBe(143);
    expect(exitStatus(null, 'SIGKILL')).toBe(137);
  });
});

describe('ChildProcessLauncher', () => {
  it('rejects with ProcessLaunchError when the binary does not exist', async () => {
    const launched = new ChildProcessLauncher().launch('/nonexistent/ssh-gate-test-binary', []);

    await expect(launched.exited).rejects.toBeInstanceOf(ProcessLaunchError);
    await expect(launched.exited).rejects.toMatchObject({ details: { errno: 'ENOENT' } });
  });
});
