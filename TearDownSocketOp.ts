import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { messageOf } from './errors.ts';
import { defaultSSH, pathExists, type SSHBinary, unlinkIfPresent } from './fwdctl-internals.ts';

export interface TearDownResult
{
  exitedCleanly: boolean;
  fileRemoved: boolean;
}

export type TearDownSocketFailure =
  | 'RemoveFailed'
  | 'UnknownError';

/**
 Take a control socket down: ask its master to exit, which drops every
 forward on it, then delete the socket file if ssh left one behind.

 A master that does not answer is not an error. The op succeeds once no
 socket file remains.
 */
export class TearDownSocketOp extends Op
{
  readonly name = 'TearDownSocketOp';

  constructor(
    readonly socketPath: string,
    readonly host: string,
    readonly ssh: SSHBinary = defaultSSH,
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<TearDownResult> | Failure<TearDownSocketFailure>>
  {
    try
    {
      if (!(await pathExists(this.socketPath)))
      {
        this.log(io, `No control socket at ${this.socketPath}, nothing to tear down`);
        return this.succeed({ exitedCleanly: false, fileRemoved: false });
      }

      const exitedCleanly = await this.#requestExit(io);

      let fileRemoved: boolean;
      try
      {
        fileRemoved = await unlinkIfPresent(this.socketPath);
      }
      catch (error: unknown)
      {
        this.error(io, `Could not remove ${this.socketPath}: ${messageOf(error)}`);
        return this.fail('RemoveFailed', `${this.socketPath}: ${messageOf(error)}`);
      }

      this.log(io, fileRemoved ? `Removed ${this.socketPath}` : `ssh removed ${this.socketPath} itself`);
      return this.succeed({ exitedCleanly, fileRemoved });
    }
    catch (error: unknown)
    {
      this.error(io, `Exception: ${messageOf(error)}`);
      return this.failWithUnknownError(error);
    }
  }

  async #requestExit(io?: IOContext): Promise<boolean>
  {
    const result = await this.ssh.run(this.ssh.command, ['-S', this.socketPath, '-O', 'exit', this.host]);
    if (result.exitCode === 0)
    {
      this.log(io, `Master for ${this.host} exited`);
      return true;
    }
    this.log(io, `No master answered the exit request for ${this.host}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    return false;
  }
}
