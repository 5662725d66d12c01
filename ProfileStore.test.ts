import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileProfileStore } from './ProfileStore.ts';
import type { TunnelRecord } from './TunnelRecord.ts';

const records: TunnelRecord[] = [
  { localPort: 4001, remote: { host: '10.0.0.1', port: 9090 }, hostId: 'bastion' },
  { localPort: 4000, remote: { host: '127.0.0.1', port: 8080 }, hostId: 'bastion', label: 'web' },
];

describe('FileProfileStore', () =>
{
  let dir: string;
  let store: FileProfileStore;

  beforeEach(async () =>
  {
    dir = await mkdtemp(join(tmpdir(), 'fwdctl-profiles-'));
    store = new FileProfileStore(join(dir, 'profiles'));
  });

  afterEach(async () =>
  {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns undefined for an unknown profile', async () =>
  {
    expect(await store.read('dev')).toBeUndefined();
    expect(await store.exists('dev')).toBe(false);
  });

  it('keeps records in the order they were saved', async () =>
  {
    await store.write({ name: 'dev', records });

    expect(await store.read('dev')).toEqual({ name: 'dev', records });
    expect(await store.names()).toEqual(['dev']);
  });

  it('replaces an existing profile', async () =>
  {
    await store.write({ name: 'dev', records });
    await store.write({ name: 'dev', records: [records[1]] });

    expect((await store.read('dev'))?.records).toEqual([records[1]]);
  });

  it('does not confuse a dotted name with a hidden file', async () =>
  {
    await store.write({ name: '.env', records });

    expect(await store.exists('.env')).toBe(true);
    expect(await store.names()).toEqual(['.env']);
  });
});
