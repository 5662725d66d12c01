import { failureOf, messageOf } from './errors.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import type { Profile } from './ProfileStore.ts';
import { ReconcileOp } from './Reconciler.ts';
import { RollbackTunnelsOp } from './RollbackTunnelsOp.ts';
import type { Services } from './Services.ts';
import { CorruptRecordError, describeRecord, type TunnelRecord } from './TunnelRecord.ts';

export interface LoadedProfile
{
  name: string;
  records: TunnelRecord[];
  /** Records whose local port was already taken. */
  skipped: TunnelRecord[];
}

export interface LoadProfilesResult
{
  loaded: LoadedProfile[];
  /** Profiles rolled back because one of their forwards was rejected. */
  failed: string[];
  notFound: string[];
}

export type LoadProfilesFailure =
  | 'ConnectFailed'
  | 'LockTimeout'
  | 'CorruptRecord'
  | 'UnknownError';

type ProfileOutcome =
  | { status: 'loaded'; profile: LoadedProfile }
  | { status: 'ForwardRejected' | 'ConnectFailed'; detail: string };

/**
 Re-establish the tunnels saved in each named profile, in order.

 Each profile loads all or nothing: a rejected forward rolls back what that
 profile already applied, and loading moves on to the next profile. A host
 that cannot be reached stops the whole command.
 */
export class LoadProfilesOp extends Op
{
  readonly name = 'LoadProfilesOp';

  constructor(
    readonly services: Services,
    readonly profileNames: readonly string[],
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<LoadProfilesResult> | Failure<LoadProfilesFailure>>
  {
    const { registry, channels, profiles } = this.services;
    const result: LoadProfilesResult = { loaded: [], failed: [], notFound: [] };
    try
    {
      const levelled = await new ReconcileOp(registry, channels).run(io);
      if (!levelled.ok)
      {
        return levelled;
      }

      for (const name of this.profileNames)
      {
        let profile: Profile | undefined;
        try
        {
          profile = await profiles.read(name);
        }
        catch (error: unknown)
        {
          if (!(error instanceof CorruptRecordError))
          {
            throw error;
          }
          this.warn(io, `Skipping profile "${name}": ${error.message}`);
          result.failed.push(name);
          continue;
        }
        if (!profile)
        {
          this.warn(io, `No saved profile named "${name}"`);
          result.notFound.push(name);
          continue;
        }

        const outcome = await this.#load(profile, io);
        if (outcome.status === 'loaded')
        {
          result.loaded.push(outcome.profile);
          continue;
        }
        if (outcome.status === 'ConnectFailed')
        {
          return this.fail('ConnectFailed', outcome.detail);
        }
        result.failed.push(name);
      }
      return this.succeed(result);
    }
    catch (error: unknown)
    {
      this.error(io, messageOf(error));
      const failure = failureOf(error);
      return this.fail(failure === 'NoFreePort' ? 'UnknownError' : failure, messageOf(error));
    }
  }

  async #load(profile: Profile, io?: IOContext): Promise<ProfileOutcome>
  {
    const { registry, allocator, locks } = this.services;
    const applied: TunnelRecord[] = [];
    const skipped: TunnelRecord[] = [];
    let committed = false;

    try
    {
      for (const record of profile.records)
      {
        const owner = await registry.findByLocalPort(record.localPort);
        if (owner || await allocator.isBound(record.localPort))
        {
          const by = owner ? ` by a tunnel via ${owner.hostId}` : '';
          this.warn(io, `Local port ${record.localPort} is already in use${by}, skipping ${describeRecord(record)}`);
          skipped.push(record);
          continue;
        }

        const failure = await locks.withLock(record.hostId, () => this.#establish(record, io));
        if (failure)
        {
          this.error(io, `Loading profile "${profile.name}" stopped at ${describeRecord(record)}: ${failure.detail}`);
          return failure;
        }
        applied.push(record);
      }
      committed = true;
      this.info(io, `Loaded profile "${profile.name}": ${applied.length} tunnel${applied.length === 1 ? '' : 's'}`);
      return { status: 'loaded', profile: { name: profile.name, records: applied, skipped } };
    }
    finally
    {
      if (!committed && applied.length > 0)
      {
        await this.#rollBack(applied, io);
      }
    }
  }

  /** Ensure, forward and persist one record. Resolves undefined on success. */
  async #establish(record: TunnelRecord, io?: IOContext): Promise<Exclude<ProfileOutcome, { status: 'loaded' }> | undefined>
  {
    const { registry, channels } = this.services;

    const channel = await channels.ensure(record.hostId, io);
    if (!channel.ok)
    {
      return { status: 'ConnectFailed', detail: `${record.hostId}: ${channel.debugData ?? channel.failure}` };
    }
    const forwarded = await channels.forward(record.hostId, record.localPort, record.remote, io);
    if (!forwarded.ok)
    {
      if (!channel.value.reused)
      {
        // the channel we just opened may carry nothing now
        const levelled = await new ReconcileOp(registry, channels, [record.hostId]).run(io);
        if (!levelled.ok)
        {
          this.warn(io, `Could not level ${record.hostId}: ${levelled.debugData ?? levelled.failure}`);
        }
      }
      return { status: 'ForwardRejected', detail: forwarded.debugData ?? forwarded.failure };
    }
    await registry.add(record);
    return undefined;
  }

  async #rollBack(applied: readonly TunnelRecord[], io?: IOContext): Promise<void>
  {
    const byHost = new Map<string, TunnelRecord[]>();
    for (const record of applied)
    {
      byHost.set(record.hostId, [...byHost.get(record.hostId) ?? [], record]);
    }
    for (const [hostId, records] of byHost)
    {
      const outcome = await this.services.locks.withLock(
        hostId,
        () => new RollbackTunnelsOp(this.services, records).run(io),
      );
      if (!outcome.ok)
      {
        this.warn(io, `Rolling back tunnels via ${hostId} was incomplete: ${outcome.debugData ?? outcome.failure}`);
      }
    }
  }
}
