import { failureOf, messageOf } from './errors.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { ReconcileOp } from './Reconciler.ts';
import type { Services } from './Services.ts';
import type { TunnelRecord } from './TunnelRecord.ts';

export type ListTunnelsFailure =
  | 'CorruptRecord'
  | 'UnknownError';

/**
 Every live tunnel, after a leveling pass so dead ones are not shown.
 */
export class ListTunnelsOp extends Op
{
  readonly name = 'ListTunnelsOp';

  constructor(readonly services: Pick<Services, 'registry' | 'channels'>)
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<TunnelRecord[]> | Failure<ListTunnelsFailure>>
  {
    const { registry, channels } = this.services;
    try
    {
      const levelled = await new ReconcileOp(registry, channels).run(io);
      if (!levelled.ok)
      {
        return levelled;
      }
      return this.succeed(await registry.listAll());
    }
    catch (error: unknown)
    {
      this.error(io, messageOf(error));
      return this.fail(failureOf(error) === 'CorruptRecord' ? 'CorruptRecord' : 'UnknownError', messageOf(error));
    }
  }
}
