import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import process from 'node:process';
import type { Logger } from 'pino';
import { decodeListing, encodeKey } from './config.ts';
import { isErrnoException } from './fwdctl-internals.ts';
import { parseRecords, serializeRecords, type TunnelRecord } from './TunnelRecord.ts';

/**
 A named, ordered snapshot of tunnel records. Holds data only; loading it
 re-requests every forward.
 */
export interface Profile
{
  name: string;
  records: TunnelRecord[];
}

export interface ProfileStore
{
  names(): Promise<string[]>;
  exists(name: string): Promise<boolean>;
  /** Undefined when there is no such profile; throws `CorruptRecordError`. */
  read(name: string): Promise<Profile | undefined>;
  /** Replaces any existing profile of the same name. */
  write(profile: Profile): Promise<void>;
}

export class FileProfileStore implements ProfileStore
{
  constructor(
    readonly dir: string,
    readonly logger?: Logger,
  )
  {}

  #path(name: string): string
  {
    return join(this.dir, encodeKey(name));
  }

  async names(): Promise<string[]>
  {
    try
    {
      const entries = await readdir(this.dir);
      return decodeListing(this.dir, entries, this.logger);
    }
    catch (error: unknown)
    {
      if (isErrnoException(error) && error.code === 'ENOENT')
      {
        return [];
      }
      throw error;
    }
  }

  async exists(name: string): Promise<boolean>
  {
    return (await this.names()).includes(name);
  }

  async read(name: string): Promise<Profile | undefined>
  {
    const path = this.#path(name);
    try
    {
      const content = await readFile(path, 'utf-8');
      return { name, records: parseRecords(content, path) };
    }
    catch (error: unknown)
    {
      if (isErrnoException(error) && error.code === 'ENOENT')
      {
        return undefined;
      }
      throw error;
    }
  }

  async write(profile: Profile): Promise<void>
  {
    await mkdir(this.dir, { recursive: true });
    const temp = join(this.dir, `.${encodeKey(profile.name)}.${process.pid}.tmp`);
    await writeFile(temp, serializeRecords(profile.records), 'utf-8');
    await rename(temp, this.#path(profile.name));
  }
}
