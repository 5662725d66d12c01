import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ShellResult, SSHBinary } from './fwdctl-internals.ts';
import { TearDownSocketOp } from './TearDownSocketOp.ts';
import { captureIO } from './testing/harness.ts';

function answering(reply: (socketPath: string) => Promise<Partial<ShellResult>>): SSHBinary & { calls: string[][] }
{
  const calls: string[][] = [];
  return {
    command: 'ssh',
    calls,
    run: async (command, args) =>
    {
      calls.push([command, ...args]);
      return { exitCode: 0, stdout: '', stderr: '', ...await reply(args[1] ?? '') };
    },
  };
}

async function exists(path: string): Promise<boolean>
{
  return stat(path).then(() => true, () => false);
}

describe('TearDownSocketOp', () =>
{
  const { io } = captureIO();
  let dir: string;
  let socketPath: string;

  beforeEach(async () =>
  {
    dir = await mkdtemp(join(tmpdir(), 'fwdctl-teardown-'));
    socketPath = join(dir, 'bastion');
  });

  afterEach(async () =>
  {
    await rm(dir, { recursive: true, force: true });
  });

  it('does nothing when there is no socket', async () =>
  {
    const ssh = answering(async () => ({}));

    const outcome = await new TearDownSocketOp(socketPath, 'bastion', ssh).run(io);

    expect(outcome).toEqual({ ok: true, value: { exitedCleanly: false, fileRemoved: false } });
    expect(ssh.calls).toEqual([]);
  });

  it('asks the master to exit and leaves nothing behind when ssh cleans up', async () =>
  {
    await writeFile(socketPath, '');
    const ssh = answering(async (path) =>
    {
      await rm(path);
      return {};
    });

    const outcome = await new TearDownSocketOp(socketPath, 'bastion', ssh).run(io);

    expect(outcome).toEqual({ ok: true, value: { exitedCleanly: true, fileRemoved: false } });
    expect(ssh.calls).toEqual([['ssh', '-S', socketPath, '-O', 'exit', 'bastion']]);
  });

  it('removes the file of a master that no longer answers', async () =>
  {
    await writeFile(socketPath, '');
    const ssh = answering(async () => ({ exitCode: 255, stderr: 'Control socket connect: Connection refused\n' }));

    const outcome = await new TearDownSocketOp(socketPath, 'bastion', ssh).run(io);

    expect(outcome).toEqual({ ok: true, value: { exitedCleanly: false, fileRemoved: true } });
    expect(await exists(socketPath)).toBe(false);
  });
});
