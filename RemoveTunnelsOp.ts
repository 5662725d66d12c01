import { failureOf, messageOf } from './errors.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { ReconcileOp } from './Reconciler.ts';
import type { Services } from './Services.ts';
import { describeRecord, type TunnelRecord } from './TunnelRecord.ts';

export interface RemoveTunnelsResult
{
  removed: TunnelRecord[];
  notFound: number[];
  /** Ports whose forward the channel would not cancel; their records stay. */
  failed: number[];
  /** Hosts whose last tunnel went, taking their channel with it. */
  closedHosts: string[];
}

export type RemoveTunnelsFailure =
  | 'LockTimeout'
  | 'CorruptRecord'
  | 'UnknownError';

/**
 Remove tunnels by local port. Unknown ports are warned about and skipped,
 and a tunnel is only forgotten once its forward is cancelled or its
 channel is gone.
 */
export class RemoveTunnelsOp extends Op
{
  readonly name = 'RemoveTunnelsOp';

  constructor(
    readonly services: Services,
    readonly localPorts: readonly number[],
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<RemoveTunnelsResult> | Failure<RemoveTunnelsFailure>>
  {
    const { registry, channels, locks } = this.services;
    const result: RemoveTunnelsResult = { removed: [], notFound: [], failed: [], closedHosts: [] };
    try
    {
      const levelled = await new ReconcileOp(registry, channels).run(io);
      if (!levelled.ok)
      {
        return this.fail(levelled.failure, levelled.debugData);
      }

      for (const localPort of this.localPorts)
      {
        const record = await registry.findByLocalPort(localPort);
        if (!record)
        {
          this.warn(io, `No tunnel on local port ${localPort}`);
          result.notFound.push(localPort);
          continue;
        }
        await locks.withLock(record.hostId, () => this.#remove(record, result, io));
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

  async #remove(record: TunnelRecord, result: RemoveTunnelsResult, io?: IOContext): Promise<void>
  {
    const { registry, channels } = this.services;

    const cancelled = await channels.cancel(record.hostId, record.localPort, record.remote, io);
    if (!cancelled.ok)
    {
      if (cancelled.failure === 'ForwardRejected')
      {
        // the forward may still be up, so the record has to stay
        this.warn(io, `Could not cancel ${describeRecord(record)}, keeping it: ${cancelled.debugData ?? cancelled.failure}`);
        result.failed.push(record.localPort);
        return;
      }
      this.log(io, `No control channel left for ${describeRecord(record)}, forgetting it`);
    }

    const removed = await registry.removeByLocalPort(record.localPort);
    if (!removed)
    {
      // removed by another process while we waited for the lock
      return;
    }
    result.removed.push(removed.record);
    this.info(io, `Removed ${describeRecord(removed.record)}`);

    if (removed.remaining === 0)
    {
      const closed = await channels.close(record.hostId, io);
      if (!closed.ok)
      {
        this.warn(io, `Could not close the control channel for ${record.hostId}: ${closed.debugData ?? closed.failure}`);
      }
      await registry.dropHost(record.hostId);
      result.closedHosts.push(record.hostId);
      this.info(io, `Closed control channel to ${record.hostId}: no tunnels left`);
    }
  }
}
