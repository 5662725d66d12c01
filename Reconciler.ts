import type { ControlChannelProvider } from './ControlChannel.ts';
import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import type { Registry } from './Registry.ts';
import { CorruptRecordError } from './TunnelRecord.ts';

/**
 How a host's recorded state compares with its live channel.

 - Healthy: records and a live channel
 - StaleSocketMissing: records, no channel handle
 - StaleConnectionDead: records, a handle whose channel does not answer
 - OrphanChannel: a handle, no records
 - Absent: neither
 */
export type HostState =
  | 'Healthy'
  | 'StaleSocketMissing'
  | 'StaleConnectionDead'
  | 'OrphanChannel'
  | 'Absent';

export function classify(hasRecords: boolean, hasHandle: boolean, isAlive: boolean): HostState
{
  if (hasRecords)
  {
    if (!hasHandle)
    {
      return 'StaleSocketMissing';
    }
    return isAlive ? 'Healthy' : 'StaleConnectionDead';
  }
  return hasHandle ? 'OrphanChannel' : 'Absent';
}

export interface Remediation
{
  closeChannel: boolean;
  dropRecords: boolean;
}

/**
 What has to happen to bring a host back to Healthy or Absent.
 */
export function remediation(state: HostState): Remediation
{
  switch (state)
  {
    case 'Healthy':
      return { closeChannel: false, dropRecords: false };
    case 'StaleSocketMissing':
      return { closeChannel: false, dropRecords: true };
    case 'StaleConnectionDead':
    case 'OrphanChannel':
      return { closeChannel: true, dropRecords: true };
    case 'Absent':
      // an empty record file may be left over from an interrupted remove
      return { closeChannel: false, dropRecords: true };
  }
}

export interface ReconcileEntry
{
  hostId: string;
  state: HostState;
  /** Records that were forgotten because their channel was gone. */
  droppedRecords: number;
  channelClosed: boolean;
}

export type ReconcileFailure =
  | 'CorruptRecord'
  | 'UnknownError';

const CLEANUP_REASONS: Partial<Record<HostState, string>> = {
  StaleSocketMissing: 'its control channel is gone',
  StaleConnectionDead: 'its control channel no longer answers',
  OrphanChannel: 'its control channel carries no recorded tunnels',
};

/**
 One leveling pass over the given hosts, or over every host that has
 records or a channel handle.

 Succeeds with an entry for every host whose state was not Healthy or
 Absent. Running it twice in a row changes nothing the second time.
 */
export class ReconcileOp extends Op
{
  readonly name = 'ReconcileOp';

  constructor(
    readonly registry: Registry,
    readonly channels: ControlChannelProvider,
    readonly hostIds?: readonly string[],
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<ReconcileEntry[]> | Failure<ReconcileFailure>>
  {
    try
    {
      const hostIds = this.hostIds ?? await this.#discover();
      const entries: ReconcileEntry[] = [];
      for (const hostId of hostIds)
      {
        const entry = await this.#level(hostId, io);
        if (entry)
        {
          entries.push(entry);
        }
      }
      return this.succeed(entries);
    }
    catch (error: unknown)
    {
      if (error instanceof CorruptRecordError)
      {
        this.error(io, error.message);
        return this.fail('CorruptRecord', error.message);
      }
      this.error(io, `Exception: ${error instanceof Error ? error.message : String(error)}`);
      return this.failWithUnknownError(error);
    }
  }

  async #discover(): Promise<string[]>
  {
    const hostIds = new Set([...await this.registry.hosts(), ...await this.channels.handles()]);
    return [...hostIds];
  }

  async #level(hostId: string, io?: IOContext): Promise<ReconcileEntry | undefined>
  {
    const records = await this.registry.records(hostId);
    const hasRecords = records.length > 0;
    const hasHandle = await this.channels.hasHandle(hostId);
    const isAlive = hasRecords && hasHandle && await this.channels.isAlive(hostId, io);
    const state = classify(hasRecords, hasHandle, isAlive);
    this.log(io, `${hostId}: ${state}`);

    const { closeChannel, dropRecords } = remediation(state);
    let channelClosed = false;
    if (closeChannel)
    {
      const closed = await this.channels.close(hostId, io);
      if (closed.ok)
      {
        channelClosed = true;
      }
      else
      {
        this.warn(io, `Could not close the control channel for ${hostId}: ${closed.debugData ?? closed.failure}`);
      }
    }
    if (dropRecords)
    {
      await this.registry.dropHost(hostId);
    }

    const reason = CLEANUP_REASONS[state];
    if (reason === undefined)
    {
      return undefined;
    }
    const dropped = hasRecords ? ` (${records.length} tunnel${records.length === 1 ? '' : 's'} forgotten)` : '';
    this.info(io, `Cleaned up ${hostId}: ${reason}${dropped}`);
    return { hostId, state, droppedRecords: records.length, channelClosed };
  }
}
