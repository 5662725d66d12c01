import { afterEach, describe, expect, it } from 'vitest';
import { AddTunnelsOp } from './AddTunnelsOp.ts';
import { formatTunnelTable } from './format.ts';
import { createTestEnvironment, ScriptedListenerTable, type TestEnvironment } from './testing/harness.ts';
import { parseRemoteSocketSpec, type RemoteSocketSpec } from './TunnelRecord.ts';

function sockets(...specs: string[]): RemoteSocketSpec[]
{
  return specs.map((spec) =>
  {
    const parsed = parseRemoteSocketSpec(spec);
    if (!parsed)
    {
      throw new Error(`bad test socket ${spec}`);
    }
    return parsed;
  });
}

describe('AddTunnelsOp', () =>
{
  let env: TestEnvironment;

  afterEach(async () =>
  {
    await env.cleanup();
  });

  it('forwards a single socket from the default start port', async () =>
  {
    env = await createTestEnvironment();

    const outcome = await new AddTunnelsOp(env.services, { hostId: 'bastion', sockets: sockets('127.0.0.1:8080:web') }).run(env.io);

    const expected = { localPort: 4000, remote: { host: '127.0.0.1', port: 8080 }, hostId: 'bastion', label: 'web' };
    expect(outcome).toEqual({ ok: true, value: [expected] });
    expect(env.channels.calls).toEqual(['ensure bastion', 'forward bastion 4000']);
    expect(await env.registry.listAll()).toEqual([expected]);
    expect(outcome.ok && formatTunnelTable(outcome.value)).toBe(
      'LOCAL PORT  REMOTE SOCKET   HOST     LABEL\n'
      + '4000        127.0.0.1:8080  bastion  web\n',
    );
  });

  it('gives a batch the lowest free ports in order', async () =>
  {
    env = await createTestEnvironment({ table: new ScriptedListenerTable([4000, 4002]) });

    const outcome = await new AddTunnelsOp(env.services, {
      hostId: 'bastion',
      sockets: sockets('10.0.0.1:80', '10.0.0.1:81', '10.0.0.1:82'),
    }).run(env.io);

    expect(outcome.ok && outcome.value.map((record) => record.localPort)).toEqual([4001, 4003, 4004]);
    expect(env.channels.forwardsOf('bastion')).toEqual([4001, 4003, 4004]);
  });

  it('sees a port bound by someone else between allocations', async () =>
  {
    const table = new ScriptedListenerTable([], (read, bound) =>
    {
      if (read === 1)
      {
        bound.add(4001);
      }
    });
    env = await createTestEnvironment({ table });

    const outcome = await new AddTunnelsOp(env.services, {
      hostId: 'bastion',
      sockets: sockets('10.0.0.1:80', '10.0.0.1:81'),
    }).run(env.io);

    expect(outcome.ok && outcome.value.map((record) => record.localPort)).toEqual([4000, 4002]);
    expect(table.reads).toBe(2);
  });

  it('starts from the requested port', async () =>
  {
    env = await createTestEnvironment();

    const outcome = await new AddTunnelsOp(env.services, {
      hostId: 'bastion',
      startPort: 5000,
      sockets: sockets('10.0.0.1:80'),
    }).run(env.io);

    expect(outcome.ok && outcome.value[0].localPort).toBe(5000);
  });

  it('never hands out a port another host has recorded', async () =>
  {
    env = await createTestEnvironment();
    await env.registry.add({ localPort: 4000, remote: { host: '10.0.0.2', port: 22 }, hostId: 'web-1' });
    env.channels.open('web-1');

    const outcome = await new AddTunnelsOp(env.services, { hostId: 'bastion', sockets: sockets('10.0.0.1:80') }).run(env.io);

    expect(outcome.ok && outcome.value[0].localPort).toBe(4001);
    expect((await env.registry.listAll()).map((record) => `${record.localPort} ${record.hostId}`)).toEqual([
      '4001 bastion',
      '4000 web-1',
    ]);
  });

  it('rolls back the whole batch when a forward is rejected', async () =>
  {
    env = await createTestEnvironment();
    env.channels.rejectedPorts.add(4001);

    const outcome = await new AddTunnelsOp(env.services, {
      hostId: 'bastion',
      sockets: sockets('10.0.0.1:80', '10.0.0.1:81', '10.0.0.1:82'),
    }).run(env.io);

    expect(outcome).toEqual({
      ok: false,
      failure: 'ForwardRejected',
      debugData: 'bastion localhost:4001 -> 10.0.0.1:81: Port forwarding failed',
    });
    expect(env.channels.calls).toEqual([
      'ensure bastion',
      'forward bastion 4000',
      'forward bastion 4001',
      'cancel bastion 4000',
      'close bastion',
    ]);
    expect(await env.registry.listAll()).toEqual([]);
    expect(await env.channels.handles()).toEqual([]);
  });

  it('keeps a reused channel and its tunnels when a new forward is rejected', async () =>
  {
    env = await createTestEnvironment();
    const existing = { localPort: 4000, remote: { host: '10.0.0.1', port: 22 }, hostId: 'bastion' };
    await env.registry.add(existing);
    env.channels.open('bastion');
    env.channels.rejectedPorts.add(4001);

    const outcome = await new AddTunnelsOp(env.services, { hostId: 'bastion', sockets: sockets('10.0.0.1:80') }).run(env.io);

    expect(outcome.ok).toBe(false);
    expect(env.channels.calls).toEqual(['check bastion', 'ensure bastion', 'forward bastion 4001', 'check bastion']);
    expect(await env.registry.listAll()).toEqual([existing]);
    expect(await env.channels.handles()).toEqual(['bastion']);
  });

  it('fails without side effects when the host cannot be reached', async () =>
  {
    env = await createTestEnvironment();
    env.channels.unreachable.add('bastion');

    const outcome = await new AddTunnelsOp(env.services, { hostId: 'bastion', sockets: sockets('10.0.0.1:80') }).run(env.io);

    expect(outcome).toEqual({
      ok: false,
      failure: 'ConnectFailed',
      debugData: 'bastion: ConnectionRefused: ssh: connect to host bastion port 22: Connection refused',
    });
    expect(env.channels.calls).toEqual(['ensure bastion']);
    expect(await env.registry.listAll()).toEqual([]);
  });

  it('replaces a dead channel before forwarding', async () =>
  {
    env = await createTestEnvironment();
    await env.registry.add({ localPort: 4000, remote: { host: '10.0.0.1', port: 22 }, hostId: 'bastion' });
    env.channels.open('bastion', false);

    const outcome = await new AddTunnelsOp(env.services, { hostId: 'bastion', sockets: sockets('10.0.0.1:80') }).run(env.io);

    expect(outcome.ok && outcome.value.map((record) => record.localPort)).toEqual([4000]);
    expect(env.channels.calls).toEqual(['check bastion', 'close bastion', 'ensure bastion', 'forward bastion 4000']);
    expect((await env.registry.listAll()).map((record) => record.remote.port)).toEqual([80]);
  });

  it('fails with NoFreePort at the top of the range and closes the new channel', async () =>
  {
    env = await createTestEnvironment({ table: new ScriptedListenerTable([65535]) });

    const outcome = await new AddTunnelsOp(env.services, {
      hostId: 'bastion',
      startPort: 65535,
      sockets: sockets('10.0.0.1:80'),
    }).run(env.io);

    expect(outcome).toEqual({ ok: false, failure: 'NoFreePort', debugData: 'No free local port at or above 65535' });
    expect(env.channels.calls).toEqual(['ensure bastion', 'close bastion']);
  });
});
