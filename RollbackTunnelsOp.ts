import { messageOf } from './errors.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { ReconcileOp } from './Reconciler.ts';
import type { Services } from './Services.ts';
import { describeRecord, type TunnelRecord } from './TunnelRecord.ts';

/**
 Undo forwards applied earlier in a failed batch: cancel each one, forget
 its record if it was persisted, and level the hosts involved so a channel
 left without tunnels is closed. A forward that refuses to be cancelled
 keeps its record.

 Best effort. Runs inside whatever host lock the caller holds.
 */
export class RollbackTunnelsOp extends Op
{
  readonly name = 'RollbackTunnelsOp';

  constructor(
    readonly services: Pick<Services, 'registry' | 'channels'>,
    readonly records: readonly TunnelRecord[],
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<number> | Failure<'UnknownError'>>
  {
    const { registry, channels } = this.services;
    let cancelled = 0;
    try
    {
      for (const record of [...this.records].reverse())
      {
        const outcome = await channels.cancel(record.hostId, record.localPort, record.remote, io);
        if (outcome.ok)
        {
          cancelled++;
        }
        else if (outcome.failure === 'ForwardRejected')
        {
          // still forwarding: a persisted record keeps describing it
          this.warn(io, `Could not cancel ${describeRecord(record)}: ${outcome.debugData ?? outcome.failure}`);
          continue;
        }
        const persisted = await registry.findByLocalPort(record.localPort);
        if (persisted && persisted.hostId === record.hostId)
        {
          await registry.removeByLocalPort(record.localPort);
        }
      }

      const hostIds = [...new Set(this.records.map((record) => record.hostId))];
      const levelled = await new ReconcileOp(registry, channels, hostIds).run(io);
      if (!levelled.ok)
      {
        return this.fail('UnknownError', levelled.debugData);
      }
      return this.succeed(cancelled);
    }
    catch (error: unknown)
    {
      this.error(io, `Rollback failed: ${messageOf(error)}`);
      return this.failWithUnknownError(error);
    }
  }
}
