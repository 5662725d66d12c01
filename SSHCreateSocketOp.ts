import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { defaultSSH, type SSHBinary } from './fwdctl-internals.ts';

/**
 Information about an SSH control socket.
 */
export interface SocketInfo
{
  path: string;
  host: string;
  createdAt: string;
}

export type SSHCreateSocketFailure =
  | 'AuthenticationFailed'
  | 'HostNotFound'
  | 'HostKeyVerificationFailed'
  | 'ConnectionRefused'
  | 'Timeout'
  | 'UnknownError';

/**
 Map ssh's stderr to the reason a master connection could not be made.
 */
export function classifyConnectError(stderr: string): SSHCreateSocketFailure
{
  if (stderr.includes('REMOTE HOST IDENTIFICATION HAS CHANGED') || stderr.includes('Host key verification failed'))
  {
    return 'HostKeyVerificationFailed';
  }
  if (stderr.includes('Permission denied') || stderr.includes('Authentication failed'))
  {
    return 'AuthenticationFailed';
  }
  if (stderr.includes('Could not resolve hostname') || stderr.includes('Name or service not known'))
  {
    return 'HostNotFound';
  }
  if (stderr.includes('Connection refused'))
  {
    return 'ConnectionRefused';
  }
  if (stderr.includes('Operation timed out') || stderr.includes('Connection timed out'))
  {
    return 'Timeout';
  }
  return 'UnknownError';
}

/**
 Create a new SSH control socket in master mode.

 This establishes a persistent background connection that forwards are
 later added to and cancelled from, without authenticating again.
 `ExitOnForwardFailure` makes a forward that cannot bind fail loudly
 instead of being dropped with a warning.
 */
export class SSHCreateSocketOp extends Op
{
  readonly name = 'SSHCreateSocketOp';

  constructor(
    readonly host: string,
    readonly socketPath: string,
    readonly connectTimeout = 10,
    readonly serverAliveInterval = 30,
    readonly ssh: SSHBinary = defaultSSH,
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<SocketInfo> | Failure<SSHCreateSocketFailure>>
  {
    try
    {
      this.log(io, `Creating control socket at ${this.socketPath} for ${this.host}`);

      const result = await this.ssh.run(this.ssh.command, [
        '-M',
        '-S',
        this.socketPath,
        '-fN',
        '-o',
        `ConnectTimeout=${this.connectTimeout}`,
        '-o',
        `ServerAliveInterval=${this.serverAliveInterval}`,
        '-o',
        'StrictHostKeyChecking=accept-new',
        '-o',
        'ExitOnForwardFailure=yes',
        this.host,
      ]);

      if (result.exitCode === 0)
      {
        this.log(io, 'Socket created successfully');
        return this.succeed({
          path: this.socketPath,
          host: this.host,
          createdAt: new Date().toISOString(),
        });
      }

      const stderr = result.stderr.trim();
      this.error(io, `ssh failed with exit code ${result.exitCode}: ${stderr}`);
      const reason = classifyConnectError(stderr);
      return this.fail(reason, reason === 'UnknownError' ? `Exit code ${result.exitCode}: ${stderr}` : stderr);
    }
    catch (error: unknown)
    {
      this.error(io, `Exception: ${error instanceof Error ? error.message : String(error)}`);
      return this.failWithUnknownError(error);
    }
  }
}
