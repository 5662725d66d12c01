import process from 'node:process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { main } from './main.ts';
import { USAGE } from './parseArgs.ts';
import { captureIO, createTestEnvironment, type TestEnvironment } from './testing/harness.ts';

describe('main', () =>
{
  let env: TestEnvironment;

  beforeEach(async () =>
  {
    env = await createTestEnvironment();
  });

  afterEach(async () =>
  {
    vi.restoreAllMocks();
    await env.cleanup();
  });

  it('prints the table of the tunnels it added', async () =>
  {
    const { io, output } = captureIO();

    const code = await main(['add', 'bastion', '127.0.0.1:8080:web'], { io, services: env.services });

    expect(code).toBe(0);
    expect(output()).toBe('LOCAL PORT  REMOTE SOCKET   HOST     LABEL\n4000        127.0.0.1:8080  bastion  web\n');
  });

  it('lists nothing on a fresh state directory', async () =>
  {
    const { io, output } = captureIO();

    expect(await main([], { io, services: env.services })).toBe(0);
    expect(output()).toBe('No active tunnels.\n');
  });

  it('prints results as JSON with --json', async () =>
  {
    const { io, output } = captureIO('json');

    expect(await main(['list', '--json'], { io, services: env.services })).toBe(0);
    expect(JSON.parse(output())).toEqual({ ok: true, result: [] });
  });

  it('exits 1 and reports the failure when the host cannot be reached', async () =>
  {
    env.channels.unreachable.add('bastion');
    const { io, output } = captureIO('json');

    const code = await main(['add', 'bastion', '10.0.0.1:80', '--json'], { io, services: env.services });

    expect(code).toBe(1);
    expect(JSON.parse(output())).toEqual({
      ok: false,
      failure: 'ConnectFailed',
      debugData: 'bastion: ConnectionRefused: ssh: connect to host bastion port 22: Connection refused',
    });
  });

  it('exits 0 when a host to kill is unknown', async () =>
  {
    const { io, output } = captureIO();

    expect(await main(['kill', 'ghost'], { io, services: env.services })).toBe(0);
    expect(output()).toBe('');
  });

  it('removes quietly on stdout', async () =>
  {
    const { io, output } = captureIO();
    await main(['add', 'bastion', '127.0.0.1:8080'], { io: captureIO().io, services: env.services });

    expect(await main(['remove', '4000'], { io, services: env.services })).toBe(0);
    expect(output()).toBe('');
    expect(await env.registry.listAll()).toEqual([]);
  });

  it('prints usage for help', async () =>
  {
    const { io, output } = captureIO();

    expect(await main(['help'], { io })).toBe(0);
    expect(output()).toBe(USAGE);
  });

  it('exits 1 with usage on bad arguments', async () =>
  {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    expect(await main(['frobnicate'], { io: captureIO().io })).toBe(1);
    expect(stderr).toHaveBeenCalledWith(`Unknown command "frobnicate"\n\n${USAGE}`);
  });

  it('exits 1 on invalid configuration', async () =>
  {
    expect(await main(['list'], { io: captureIO().io, env: { FWDCTL_START_PORT: 'many' } })).toBe(1);
  });
});
