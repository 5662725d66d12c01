import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { classify, type HostState, ReconcileOp, remediation } from './Reconciler.ts';
import { createTestEnvironment, type TestEnvironment } from './testing/harness.ts';
import type { TunnelRecord } from './TunnelRecord.ts';

function record(localPort: number, hostId: string): TunnelRecord
{
  return { localPort, remote: { host: '127.0.0.1', port: 8080 }, hostId };
}

const CLASSIFICATIONS: [boolean, boolean, boolean, HostState][] = [
  [true, true, true, 'Healthy'],
  [true, false, false, 'StaleSocketMissing'],
  [true, true, false, 'StaleConnectionDead'],
  [false, true, false, 'OrphanChannel'],
  [false, true, true, 'OrphanChannel'],
  [false, false, false, 'Absent'],
];

describe('classify', () =>
{
  it.each(CLASSIFICATIONS)('records=%s handle=%s alive=%s is %s', (hasRecords, hasHandle, isAlive, state) =>
  {
    expect(classify(hasRecords, hasHandle, isAlive)).toBe(state);
  });
});

describe('remediation', () =>
{
  it('closes the channel only when a handle is left over', () =>
  {
    expect(remediation('Healthy')).toEqual({ closeChannel: false, dropRecords: false });
    expect(remediation('StaleSocketMissing')).toEqual({ closeChannel: false, dropRecords: true });
    expect(remediation('StaleConnectionDead')).toEqual({ closeChannel: true, dropRecords: true });
    expect(remediation('OrphanChannel')).toEqual({ closeChannel: true, dropRecords: true });
  });
});

describe('ReconcileOp', () =>
{
  let env: TestEnvironment;

  beforeEach(async () =>
  {
    env = await createTestEnvironment();
  });

  afterEach(async () =>
  {
    await env.cleanup();
  });

  it('leaves healthy hosts alone', async () =>
  {
    await env.registry.add(record(4000, 'bastion'));
    env.channels.open('bastion');

    const outcome = await new ReconcileOp(env.registry, env.channels).run(env.io);

    expect(outcome).toEqual({ ok: true, value: [] });
    expect(env.channels.calls).toEqual(['check bastion']);
    expect(await env.registry.records('bastion')).toHaveLength(1);
  });

  it('forgets records whose control channel is gone', async () =>
  {
    await env.registry.add(record(4000, 'bastion'));
    await env.registry.add(record(4001, 'bastion'));

    const outcome = await new ReconcileOp(env.registry, env.channels).run(env.io);

    expect(outcome).toEqual({
      ok: true,
      value: [{ hostId: 'bastion', state: 'StaleSocketMissing', droppedRecords: 2, channelClosed: false }],
    });
    expect(await env.registry.hosts()).toEqual([]);
    expect(env.channels.calls).toEqual([]);
  });

  it('closes a channel that no longer answers and forgets its records', async () =>
  {
    await env.registry.add(record(4000, 'bastion'));
    env.channels.open('bastion', false);

    const outcome = await new ReconcileOp(env.registry, env.channels).run(env.io);

    expect(outcome).toEqual({
      ok: true,
      value: [{ hostId: 'bastion', state: 'StaleConnectionDead', droppedRecords: 1, channelClosed: true }],
    });
    expect(env.channels.calls).toEqual(['check bastion', 'close bastion']);
    expect(await env.channels.handles()).toEqual([]);
    expect(await env.registry.listAll()).toEqual([]);
  });

  it('closes a channel that carries no recorded tunnels', async () =>
  {
    env.channels.open('web-1');

    const outcome = await new ReconcileOp(env.registry, env.channels).run(env.io);

    expect(outcome).toEqual({
      ok: true,
      value: [{ hostId: 'web-1', state: 'OrphanChannel', droppedRecords: 0, channelClosed: true }],
    });
    expect(env.channels.calls).toEqual(['close web-1']);
  });

  it('only looks at the hosts it is given', async () =>
  {
    await env.registry.add(record(4000, 'bastion'));
    env.channels.open('web-1');

    const outcome = await new ReconcileOp(env.registry, env.channels, ['bastion']).run(env.io);

    expect(outcome.ok && outcome.value.map((entry) => entry.hostId)).toEqual(['bastion']);
    expect(await env.channels.handles()).toEqual(['web-1']);
  });

  it('changes nothing on a second pass', async () =>
  {
    await env.registry.add(record(4000, 'bastion'));
    await env.registry.add(record(4001, 'db'));
    env.channels.open('bastion', false);
    env.channels.open('web-1');

    const first = await new ReconcileOp(env.registry, env.channels).run(env.io);
    const second = await new ReconcileOp(env.registry, env.channels).run(env.io);

    expect(first.ok && first.value.map((entry) => `${entry.hostId}:${entry.state}`)).toEqual([
      'bastion:StaleConnectionDead',
      'db:StaleSocketMissing',
      'web-1:OrphanChannel',
    ]);
    expect(second).toEqual({ ok: true, value: [] });
  });

  it('leaves every host either healthy or absent', async () =>
  {
    await env.registry.add(record(4000, 'bastion'));
    await env.registry.add(record(4001, 'db'));
    env.channels.open('bastion');
    env.channels.open('web-1');

    await new ReconcileOp(env.registry, env.channels).run(env.io);

    expect(await env.registry.hosts()).toEqual(['bastion']);
    expect(await env.channels.handles()).toEqual(['bastion']);
  });

  it('fails with CorruptRecord on an unreadable record file', async () =>
  {
    await mkdir(join(env.dir, 'tunnels'), { recursive: true });
    await writeFile(join(env.dir, 'tunnels', 'bastion'), 'garbage\n');

    const outcome = await new ReconcileOp(env.registry, env.channels).run(env.io);

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.failure).toBe('CorruptRecord');
  });
});
