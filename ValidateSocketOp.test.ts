import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ShellResult, SSHBinary } from './fwdctl-internals.ts';
import { captureIO } from './testing/harness.ts';
import { masterPid, ValidateSocketOp } from './ValidateSocketOp.ts';

function answering(reply: Partial<ShellResult>): SSHBinary & { calls: string[][] }
{
  const calls: string[][] = [];
  return {
    command: 'ssh',
    calls,
    run: async (command, args) =>
    {
      calls.push([command, ...args]);
      return { exitCode: 0, stdout: '', stderr: '', ...reply };
    },
  };
}

describe('masterPid', () =>
{
  it('reads the pid from the check reply', () =>
  {
    expect(masterPid('Master running (pid=4242)\r\n')).toBe(4242);
    expect(masterPid('')).toBeUndefined();
  });
});

describe('ValidateSocketOp', () =>
{
  const { io } = captureIO();
  let dir: string;
  let socketPath: string;

  beforeEach(async () =>
  {
    dir = await mkdtemp(join(tmpdir(), 'fwdctl-validate-'));
    socketPath = join(dir, 'bastion');
  });

  afterEach(async () =>
  {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports a missing socket without asking ssh', async () =>
  {
    const ssh = answering({});

    const outcome = await new ValidateSocketOp(socketPath, 'bastion', ssh).run(io);

    expect(outcome).toEqual({ ok: true, value: { valid: false, status: 'not-found' } });
    expect(ssh.calls).toEqual([]);
  });

  it('reports a live master with its pid', async () =>
  {
    await writeFile(socketPath, '');
    const ssh = answering({ stderr: 'Master running (pid=4242)\r\n' });

    const outcome = await new ValidateSocketOp(socketPath, 'bastion', ssh).run(io);

    expect(outcome).toEqual({ ok: true, value: { valid: true, status: 'alive', pid: 4242 } });
    expect(ssh.calls).toEqual([['ssh', '-S', socketPath, '-O', 'check', 'bastion']]);
  });

  it('keeps what ssh said about a dead master', async () =>
  {
    await writeFile(socketPath, '');
    const stderr = `Control socket connect(${socketPath}): Connection refused\r\n`;
    const ssh = answering({ exitCode: 255, stderr });

    const outcome = await new ValidateSocketOp(socketPath, 'bastion', ssh).run(io);

    expect(outcome).toEqual({
      ok: true,
      value: { valid: false, status: 'dead', detail: `Control socket connect(${socketPath}): Connection refused` },
    });
  });

  it('falls back to the exit code when ssh says nothing', async () =>
  {
    await writeFile(socketPath, '');

    const outcome = await new ValidateSocketOp(socketPath, 'bastion', answering({ exitCode: 255 })).run(io);

    expect(outcome).toEqual({ ok: true, value: { valid: false, status: 'dead', detail: 'ssh -O check exited with 255' } });
  });
});
