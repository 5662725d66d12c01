import { failureOf, messageOf } from './errors.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { ReconcileOp } from './Reconciler.ts';
import { RollbackTunnelsOp } from './RollbackTunnelsOp.ts';
import type { Services } from './Services.ts';
import { describeRecord, formatRemoteSocket, type RemoteSocketSpec, type TunnelRecord } from './TunnelRecord.ts';

export interface AddTunnelsRequest
{
  hostId: string;
  /** First local port to try; the configured default when absent. */
  startPort?: number;
  sockets: readonly RemoteSocketSpec[];
}

export type AddTunnelsFailure =
  | 'ConnectFailed'
  | 'ForwardRejected'
  | 'NoFreePort'
  | 'LockTimeout'
  | 'CorruptRecord'
  | 'UnknownError';

/**
 Forward a batch of remote sockets through one host, all or nothing.

 Local ports are allocated lowest-first from the start port, each scan
 beginning one above the previous allocation and re-reading the listener
 table. Records are persisted only once every forward in the batch is up;
 a rejected forward rolls back the ones before it.
 */
export class AddTunnelsOp extends Op
{
  readonly name = 'AddTunnelsOp';

  constructor(
    readonly services: Services,
    readonly request: AddTunnelsRequest,
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<TunnelRecord[]> | Failure<AddTunnelsFailure>>
  {
    const { registry, channels, locks } = this.services;
    const { hostId } = this.request;
    try
    {
      const levelled = await new ReconcileOp(registry, channels, [hostId]).run(io);
      if (!levelled.ok)
      {
        return this.fail(levelled.failure, levelled.debugData);
      }
      return await locks.withLock(hostId, () => this.#establish(io));
    }
    catch (error: unknown)
    {
      const failure = failureOf(error);
      this.error(io, messageOf(error));
      return this.fail(failure, messageOf(error));
    }
  }

  async #establish(io?: IOContext): Promise<Success<TunnelRecord[]> | Failure<AddTunnelsFailure>>
  {
    const { registry, channels, allocator } = this.services;
    const { hostId, sockets } = this.request;

    const channel = await channels.ensure(hostId, io);
    if (!channel.ok)
    {
      const detail = channel.debugData ?? channel.failure;
      this.error(io, `Could not connect to ${hostId}: ${detail}`);
      return this.fail('ConnectFailed', `${hostId}: ${detail}`);
    }
    this.log(io, channel.value.reused ? `Reusing control channel to ${hostId}` : `Opened control channel to ${hostId}`);

    const claimed = new Set((await registry.listAll()).map((record) => record.localPort));
    const applied: TunnelRecord[] = [];
    let committed = false;
    let candidate = this.request.startPort ?? this.services.defaultStartPort;
    try
    {
      for (const spec of sockets)
      {
        const localPort = await allocator.nextFreePort(candidate, claimed);
        const record: TunnelRecord = spec.label === undefined
          ? { localPort, remote: spec.remote, hostId }
          : { localPort, remote: spec.remote, hostId, label: spec.label };

        const forwarded = await channels.forward(hostId, localPort, spec.remote, io);
        if (!forwarded.ok)
        {
          const detail = forwarded.debugData ?? forwarded.failure;
          this.error(io, `${hostId} rejected localhost:${localPort} -> ${formatRemoteSocket(spec.remote)}: ${detail}`);
          return this.fail('ForwardRejected', `${hostId} localhost:${localPort} -> ${formatRemoteSocket(spec.remote)}: ${detail}`);
        }
        applied.push(record);
        claimed.add(localPort);
        candidate = localPort + 1;
      }

      for (const record of applied)
      {
        await registry.add(record);
        this.info(io, `Forwarding ${describeRecord(record)}`);
      }
      committed = true;
      return this.succeed(applied);
    }
    finally
    {
      if (!committed)
      {
        await this.#rollBack(applied, io);
      }
    }
  }

  async #rollBack(applied: readonly TunnelRecord[], io?: IOContext): Promise<void>
  {
    const { registry, channels } = this.services;
    const outcome = applied.length > 0
      ? await new RollbackTunnelsOp(this.services, applied).run(io)
      : await new ReconcileOp(registry, channels, [this.request.hostId]).run(io);
    if (!outcome.ok)
    {
      this.warn(io, `Cleanup after the failed batch for ${this.request.hostId} was incomplete: ${outcome.debugData ?? outcome.failure}`);
    }
  }
}
