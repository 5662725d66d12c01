import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { defaultSSH, pathExists, type SSHBinary } from './fwdctl-internals.ts';
import { formatRemoteSocket, type RemoteSocket } from './TunnelRecord.ts';

export type ForwardAction = 'forward' | 'cancel';

export type SSHForwardFailure =
  | 'SocketNotFound'
  | 'ForwardRejected'
  | 'UnknownError';

/**
 The `-L` argument for a local forward. IPv6 hosts keep their brackets.
 */
export function localForwardSpec(localPort: number, remote: RemoteSocket): string
{
  return `${localPort}:${formatRemoteSocket(remote)}`;
}

/**
 Add or cancel one local forward on an existing control socket.

 Uses `ssh -O forward` / `ssh -O cancel`, so the master connection is never
 re-established: without a socket this fails with SocketNotFound instead of
 opening a fresh connection.
 */
export class SSHForwardOp extends Op
{
  readonly name = 'SSHForwardOp';

  constructor(
    readonly action: ForwardAction,
    readonly socketPath: string,
    readonly host: string,
    readonly localPort: number,
    readonly remote: RemoteSocket,
    readonly ssh: SSHBinary = defaultSSH,
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<true> | Failure<SSHForwardFailure>>
  {
    try
    {
      if (!(await pathExists(this.socketPath)))
      {
        return this.fail('SocketNotFound', `Control socket does not exist: ${this.socketPath}`);
      }

      const spec = localForwardSpec(this.localPort, this.remote);
      this.log(io, `${this.action} -L ${spec} on ${this.host}`);

      const result = await this.ssh.run(this.ssh.command, [
        '-S',
        this.socketPath,
        '-O',
        this.action,
        '-L',
        spec,
        this.host,
      ]);

      if (result.exitCode === 0)
      {
        return this.succeed(true);
      }

      const stderr = result.stderr.trim();
      if (stderr.includes('No such file') || stderr.includes('Connection refused'))
      {
        return this.fail('SocketNotFound', stderr);
      }
      return this.fail('ForwardRejected', stderr === '' ? `Exit code ${result.exitCode}` : stderr);
    }
    catch (error: unknown)
    {
      this.error(io, `Exception: ${error instanceof Error ? error.message : String(error)}`);
      return this.failWithUnknownError(error);
    }
  }
}
