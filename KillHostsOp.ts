import { failureOf, messageOf } from './errors.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { ReconcileOp } from './Reconciler.ts';
import type { Services } from './Services.ts';

export interface KillHostsResult
{
  killed: string[];
  notFound: string[];
}

export type KillHostsFailure =
  | 'LockTimeout'
  | 'CorruptRecord'
  | 'UnknownError';

/**
 Tear down every tunnel of the named hosts, whatever state they are in.
 */
export class KillHostsOp extends Op
{
  readonly name = 'KillHostsOp';

  constructor(
    readonly services: Services,
    readonly hostIds: readonly string[],
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<KillHostsResult> | Failure<KillHostsFailure>>
  {
    const { registry, channels, locks } = this.services;
    const result: KillHostsResult = { killed: [], notFound: [] };
    try
    {
      // the named hosts are torn down below regardless of their state
      const known = new Set([...await registry.hosts(), ...await channels.handles()]);
      const others = [...known].filter((hostId) => !this.hostIds.includes(hostId));
      const levelled = await new ReconcileOp(registry, channels, others).run(io);
      if (!levelled.ok)
      {
        return this.fail(levelled.failure, levelled.debugData);
      }

      for (const hostId of this.hostIds)
      {
        const killed = await locks.withLock(hostId, () => this.#kill(hostId, io));
        if (killed)
        {
          result.killed.push(hostId);
        }
        else
        {
          this.warn(io, `Unable to find connection to kill: ${hostId}`);
          result.notFound.push(hostId);
        }
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

  async #kill(hostId: string, io?: IOContext): Promise<boolean>
  {
    const { registry, channels } = this.services;
    const hasHandle = await channels.hasHandle(hostId);
    let closed = false;
    if (hasHandle)
    {
      const outcome = await channels.close(hostId, io);
      if (outcome.ok)
      {
        closed = true;
      }
      else
      {
        this.warn(io, `Could not close the control channel for ${hostId}: ${outcome.debugData ?? outcome.failure}`);
      }
    }
    const dropped = await registry.dropHost(hostId);
    if (closed || dropped)
    {
      this.info(io, `Killed all tunnels via ${hostId}`);
    }
    return hasHandle || dropped;
  }
}
