import { mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  ChannelHandle,
  CloseFailure,
  CloseResult,
  ControlChannelProvider,
  EnsureFailure,
  ForwardFailure,
} from './ControlChannel.ts';
import type { Logger } from 'pino';
import { decodeListing, encodeKey } from './config.ts';
import { defaultSSH, isErrnoException, type SSHBinary } from './fwdctl-internals.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Outcome } from './ops/Outcome.ts';
import { SSHCreateSocketOp } from './SSHCreateSocketOp.ts';
import { type ForwardAction, SSHForwardOp } from './SSHForwardOp.ts';
import { TearDownSocketOp } from './TearDownSocketOp.ts';
import type { RemoteSocket } from './TunnelRecord.ts';
import { ValidateSocketOp } from './ValidateSocketOp.ts';

export interface SSHControlChannelOptions
{
  socketsDir: string;
  connectTimeout?: number;
  serverAliveInterval?: number;
  ssh?: SSHBinary;
  logger?: Logger;
}

/**
 Control channels backed by OpenSSH control masters, one socket per host id
 under `socketsDir`.
 */
export class SSHControlChannel implements ControlChannelProvider
{
  readonly socketsDir: string;
  readonly connectTimeout: number;
  readonly serverAliveInterval: number;
  readonly ssh: SSHBinary;
  readonly logger?: Logger;

  constructor(options: SSHControlChannelOptions)
  {
    this.socketsDir = options.socketsDir;
    this.connectTimeout = options.connectTimeout ?? 10;
    this.serverAliveInterval = options.serverAliveInterval ?? 30;
    this.ssh = options.ssh ?? defaultSSH;
    this.logger = options.logger;
  }

  socketPath(hostId: string): string
  {
    return join(this.socketsDir, encodeKey(hostId));
  }

  async handles(): Promise<string[]>
  {
    try
    {
      const names = await readdir(this.socketsDir);
      return decodeListing(this.socketsDir, names, this.logger);
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

  async hasHandle(hostId: string): Promise<boolean>
  {
    return (await this.handles()).includes(hostId);
  }

  async ensure(hostId: string, io?: IOContext): Promise<Outcome<ChannelHandle, EnsureFailure>>
  {
    const socketPath = this.socketPath(hostId);
    const validation = await new ValidateSocketOp(socketPath, hostId, this.ssh).run(io);
    if (validation.ok && validation.value.valid)
    {
      return { ok: true, value: { hostId, socketPath, reused: true } };
    }
    if (validation.ok && validation.value.status === 'dead')
    {
      this.logger?.info(`Replacing dead control socket for ${hostId}: ${validation.value.detail}`);
      const teardown = await new TearDownSocketOp(socketPath, hostId, this.ssh).run(io);
      if (!teardown.ok)
      {
        return { ok: false, failure: 'ConnectFailed', debugData: `Stale socket ${socketPath} could not be removed: ${teardown.debugData ?? teardown.failure}` };
      }
    }

    await mkdir(this.socketsDir, { recursive: true });
    const created = await new SSHCreateSocketOp(
      hostId,
      socketPath,
      this.connectTimeout,
      this.serverAliveInterval,
      this.ssh,
    ).run(io);
    if (!created.ok)
    {
      return { ok: false, failure: 'ConnectFailed', debugData: `${created.failure}: ${created.debugData ?? ''}`.trim() };
    }
    return { ok: true, value: { hostId, socketPath, reused: false } };
  }

  async isAlive(hostId: string, io?: IOContext): Promise<boolean>
  {
    const validation = await new ValidateSocketOp(this.socketPath(hostId), hostId, this.ssh).run(io);
    return validation.ok && validation.value.valid;
  }

  forward(hostId: string, localPort: number, remote: RemoteSocket, io?: IOContext): Promise<Outcome<true, ForwardFailure>>
  {
    return this.#forwardOp('forward', hostId, localPort, remote, io);
  }

  cancel(hostId: string, localPort: number, remote: RemoteSocket, io?: IOContext): Promise<Outcome<true, ForwardFailure>>
  {
    return this.#forwardOp('cancel', hostId, localPort, remote, io);
  }

  async #forwardOp(
    action: ForwardAction,
    hostId: string,
    localPort: number,
    remote: RemoteSocket,
    io?: IOContext,
  ): Promise<Outcome<true, ForwardFailure>>
  {
    const outcome = await new SSHForwardOp(action, this.socketPath(hostId), hostId, localPort, remote, this.ssh).run(io);
    if (outcome.ok)
    {
      return outcome;
    }
    if (outcome.failure === 'SocketNotFound')
    {
      return { ok: false, failure: 'ChannelMissing', debugData: outcome.debugData };
    }
    return { ok: false, failure: 'ForwardRejected', debugData: outcome.debugData };
  }

  async close(hostId: string, io?: IOContext): Promise<Outcome<CloseResult, CloseFailure>>
  {
    const outcome = await new TearDownSocketOp(this.socketPath(hostId), hostId, this.ssh).run(io);
    if (!outcome.ok)
    {
      return { ok: false, failure: 'CloseFailed', debugData: outcome.debugData };
    }
    return {
      ok: true,
      value: {
        exitedCleanly: outcome.value.exitedCleanly,
        hadHandle: outcome.value.exitedCleanly || outcome.value.fileRemoved,
      },
    };
  }
}
