import type { IOContext } from './ops/IOContext.ts';
import type { Outcome } from './ops/Outcome.ts';
import type { RemoteSocket } from './TunnelRecord.ts';

/**
 A live control channel to one host.
 */
export interface ChannelHandle
{
  hostId: string;
  socketPath: string;
  /** False when `ensure` had to establish a new channel. */
  reused: boolean;
}

export interface CloseResult
{
  exitedCleanly: boolean;
  /** False when there was nothing to close. */
  hadHandle: boolean;
}

export type EnsureFailure = 'ConnectFailed';
export type ForwardFailure = 'ForwardRejected' | 'ChannelMissing';
export type CloseFailure = 'CloseFailed';

/**
 Persistent, multiplexed connections to remote hosts, keyed by host id.

 Every call blocks until the transport answers; timeouts are the
 transport's own.
 */
export interface ControlChannelProvider
{
  /** Host ids that currently have a channel handle, live or not. */
  handles(): Promise<string[]>;
  hasHandle(hostId: string): Promise<boolean>;
  /** Reuse the live channel for the host, or establish one. */
  ensure(hostId: string, io?: IOContext): Promise<Outcome<ChannelHandle, EnsureFailure>>;
  /** Non-destructive probe. False means the handle is unusable. */
  isAlive(hostId: string, io?: IOContext): Promise<boolean>;
  forward(hostId: string, localPort: number, remote: RemoteSocket, io?: IOContext): Promise<Outcome<true, ForwardFailure>>;
  cancel(hostId: string, localPort: number, remote: RemoteSocket, io?: IOContext): Promise<Outcome<true, ForwardFailure>>;
  /** Terminate the channel and discard its handle. */
  close(hostId: string, io?: IOContext): Promise<Outcome<CloseResult, CloseFailure>>;
}
