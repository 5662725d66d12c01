import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import process from 'node:process';
import type { Logger } from 'pino';
import { decodeListing, encodeKey } from './config.ts';
import { isErrnoException, unlinkIfPresent } from './fwdctl-internals.ts';
import { parseRecords, serializeRecords, type TunnelRecord } from './TunnelRecord.ts';

/**
 A record taken out of the registry, and how many its host still has.
 */
export interface RemovedRecord
{
  record: TunnelRecord;
  remaining: number;
}

/**
 Thrown by `add` when another record, on any host, already claims the port.
 */
export class PortClaimedError extends Error
{
  override readonly name = 'PortClaimedError';

  constructor(readonly localPort: number, readonly ownerHostId: string)
  {
    super(`Local port ${localPort} is already forwarded via ${ownerHostId}`);
  }
}

/**
 Durable set of tunnel records, one set per host.

 Local ports are unique across the whole registry, not just within a host.
 Every read may throw `CorruptRecordError`.
 */
export interface Registry
{
  /** Host ids that have a record set, including an empty one. */
  hosts(): Promise<string[]>;
  records(hostId: string): Promise<TunnelRecord[]>;
  add(record: TunnelRecord): Promise<void>;
  removeByLocalPort(localPort: number): Promise<RemovedRecord | undefined>;
  findByLocalPort(localPort: number): Promise<TunnelRecord | undefined>;
  /** Insertion order within a host, hosts in `hosts()` order. */
  listAll(): Promise<TunnelRecord[]>;
  /** Forget a host's record set entirely. Returns false if there was none. */
  dropHost(hostId: string): Promise<boolean>;
}

/**
 Registry kept as one text file per host under a directory.

 Files are replaced by rename, so a reader never sees half a file.
 */
export class FileRegistry implements Registry
{
  constructor(
    readonly dir: string,
    readonly logger?: Logger,
  )
  {}

  #path(hostId: string): string
  {
    return join(this.dir, encodeKey(hostId));
  }

  async hosts(): Promise<string[]>
  {
    let names: string[];
    try
    {
      names = await readdir(this.dir);
    }
    catch (error: unknown)
    {
      if (isErrnoException(error) && error.code === 'ENOENT')
      {
        return [];
      }
      throw error;
    }
    return decodeListing(this.dir, names, this.logger);
  }

  async records(hostId: string): Promise<TunnelRecord[]>
  {
    const path = this.#path(hostId);
    let content: string;
    try
    {
      content = await readFile(path, 'utf-8');
    }
    catch (error: unknown)
    {
      if (isErrnoException(error) && error.code === 'ENOENT')
      {
        return [];
      }
      throw error;
    }
    return parseRecords(content, path);
  }

  async #write(hostId: string, records: readonly TunnelRecord[]): Promise<void>
  {
    await mkdir(this.dir, { recursive: true });
    const path = this.#path(hostId);
    const temp = join(this.dir, `.${encodeKey(hostId)}.${process.pid}.tmp`);
    await writeFile(temp, serializeRecords(records), 'utf-8');
    await rename(temp, path);
  }

  async add(record: TunnelRecord): Promise<void>
  {
    const owner = await this.findByLocalPort(record.localPort);
    if (owner)
    {
      throw new PortClaimedError(record.localPort, owner.hostId);
    }
    const existing = await this.records(record.hostId);
    await this.#write(record.hostId, [...existing, record]);
  }

  async removeByLocalPort(localPort: number): Promise<RemovedRecord | undefined>
  {
    for (const hostId of await this.hosts())
    {
      const records = await this.records(hostId);
      const index = records.findIndex((record) => record.localPort === localPort);
      if (index === -1)
      {
        continue;
      }
      const [record] = records.splice(index, 1);
      await this.#write(hostId, records);
      return { record, remaining: records.length };
    }
    return undefined;
  }

  async findByLocalPort(localPort: number): Promise<TunnelRecord | undefined>
  {
    const all = await this.listAll();
    return all.find((record) => record.localPort === localPort);
  }

  async listAll(): Promise<TunnelRecord[]>
  {
    const all: TunnelRecord[] = [];
    for (const hostId of await this.hosts())
    {
      all.push(...await this.records(hostId));
    }
    return all;
  }

  async dropHost(hostId: string): Promise<boolean>
  {
    return unlinkIfPresent(this.#path(hostId));
  }
}
