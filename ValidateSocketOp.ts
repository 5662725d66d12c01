import { Op } from './ops/Op.ts';
import type { IOContext } from './ops/IOContext.ts';
import type { Failure, Success } from './ops/Outcome.ts';
import { defaultSSH, pathExists, type SSHBinary } from './fwdctl-internals.ts';

/**
 What `ssh -O check` found behind a control socket. A dead socket carries
 what ssh said about it.
 */
export type ValidationResult =
  | { valid: true; status: 'alive'; pid?: number }
  | { valid: false; status: 'dead'; detail: string }
  | { valid: false; status: 'not-found' };

export type ValidateSocketFailure = 'UnknownError';

const MASTER_RUNNING = /Master running \(pid=(\d+)\)/;

/**
 Pid of the master process from the `-O check` reply, if ssh gave one.
 */
export function masterPid(stderr: string): number | undefined
{
  const match = MASTER_RUNNING.exec(stderr);
  return match ? Number(match[1]) : undefined;
}

/**
 Whether an SSH control socket can carry forwards right now. A missing socket
 file is a result, not a failure; ssh is only asked when the file is there.
 */
export class ValidateSocketOp extends Op
{
  readonly name = 'ValidateSocketOp';

  constructor(
    readonly socketPath: string,
    readonly host: string,
    readonly ssh: SSHBinary = defaultSSH,
  )
  {
    super();
  }

  async run(io?: IOContext): Promise<Success<ValidationResult> | Failure<ValidateSocketFailure>>
  {
    try
    {
      if (!(await pathExists(this.socketPath)))
      {
        this.log(io, `No control socket at ${this.socketPath}`);
        return this.succeed<ValidationResult>({ valid: false, status: 'not-found' });
      }

      const result = await this.ssh.run(this.ssh.command, ['-S', this.socketPath, '-O', 'check', this.host]);
      if (result.exitCode === 0)
      {
        const pid = masterPid(result.stderr);
        this.log(io, pid === undefined ? `Master for ${this.host} answers` : `Master for ${this.host} answers (pid ${pid})`);
        return this.succeed<ValidationResult>(pid === undefined ? { valid: true, status: 'alive' } : { valid: true, status: 'alive', pid });
      }

      const detail = result.stderr.trim() || `ssh -O check exited with ${result.exitCode}`;
      this.log(io, `Master for ${this.host} is gone: ${detail}`);
      return this.succeed<ValidationResult>({ valid: false, status: 'dead', detail });
    }
    catch (error: unknown)
    {
      this.error(io, `Exception: ${error instanceof Error ? error.message : String(error)}`);
      return this.failWithUnknownError(error);
    }
  }
}
