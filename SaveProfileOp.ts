import { failureOf, messageOf } from './errors.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { ReconcileOp } from './Reconciler.ts';
import type { Services } from './Services.ts';
import type { TunnelRecord } from './TunnelRecord.ts';

export interface SaveProfileResult
{
  saved: boolean;
  records: TunnelRecord[];
  notFound: number[];
}

export type SaveProfileFailure =
  | 'CorruptRecord'
  | 'UnknownError';

/**
 Snapshot the tunnels on the given local ports into a named profile.

 Unknown ports are skipped. Replacing an existing profile needs the user's
 consent; declining leaves it untouched.
 */
export class SaveProfileOp extends Op
{
  readonly name = 'SaveProfileOp';

  constructor(
    readonly services: Services,
    readonly profileName: string,
    readonly localPorts: readonly number[],
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<SaveProfileResult> | Failure<SaveProfileFailure>>
  {
    const { registry, channels, profiles, confirm } = this.services;
    try
    {
      const levelled = await new ReconcileOp(registry, channels).run(io);
      if (!levelled.ok)
      {
        return levelled;
      }

      const records: TunnelRecord[] = [];
      const notFound: number[] = [];
      for (const localPort of this.localPorts)
      {
        const record = await registry.findByLocalPort(localPort);
        if (record)
        {
          records.push(record);
        }
        else
        {
          this.warn(io, `No tunnel on local port ${localPort}, not saving it`);
          notFound.push(localPort);
        }
      }

      if (records.length === 0)
      {
        this.warn(io, `Nothing to save to profile "${this.profileName}"`);
        return this.succeed({ saved: false, records, notFound });
      }

      if (await profiles.exists(this.profileName))
      {
        const overwrite = await confirm(`Profile "${this.profileName}" already exists. Overwrite it?`);
        if (!overwrite)
        {
          this.warn(io, `Kept the existing profile "${this.profileName}"`);
          return this.succeed({ saved: false, records: [], notFound });
        }
      }

      await profiles.write({ name: this.profileName, records });
      this.info(io, `Saved ${records.length} tunnel${records.length === 1 ? '' : 's'} to profile "${this.profileName}"`);
      return this.succeed({ saved: true, records, notFound });
    }
    catch (error: unknown)
    {
      this.error(io, messageOf(error));
      return this.fail(failureOf(error) === 'CorruptRecord' ? 'CorruptRecord' : 'UnknownError', messageOf(error));
    }
  }
}
