/**
 Shared internals for running external commands (ssh, lsof).

 Ops take a `CommandRunner` so tests can stand in for the real binaries.
 */
import { Buffer } from 'node:buffer';
import { spawn } from 'node:child_process';
import { stat, unlink } from 'node:fs/promises';

/**
 Result of running a shell command with string output.
 */
export interface ShellResult
{
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<ShellResult>;

/**
 Run a command and capture its output as strings.

 Never rejects: a command that cannot be spawned resolves with exit code 127
 and the spawn error as stderr.
 */
export const runCommand: CommandRunner = (command, args) =>
{
  return new Promise((resolve) =>
  {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    proc.on('close', (code) =>
    {
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdoutChunks).toString(),
        stderr: Buffer.concat(stderrChunks).toString(),
      });
    });

    proc.on('error', (err) =>
    {
      resolve({
        exitCode: 127,
        stdout: '',
        stderr: err.message,
      });
    });
  });
};

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException
{
  return error instanceof Error && 'code' in error;
}

/**
 The ssh binary to invoke and how to run it.
 */
export interface SSHBinary
{
  command: string;
  run: CommandRunner;
}

export const defaultSSH: SSHBinary = { command: 'ssh', run: runCommand };

/**
 Delete a file. Returns false when it was already gone.
 */
export async function unlinkIfPresent(path: string): Promise<boolean>
{
  try
  {
    await unlink(path);
    return true;
  }
  catch (error: unknown)
  {
    if (isErrnoException(error) && error.code === 'ENOENT')
    {
      return false;
    }
    throw error;
  }
}

/**
 Whether anything exists at `path`. Errors other than ENOENT propagate.
 */
export async function pathExists(path: string): Promise<boolean>
{
  try
  {
    await stat(path);
    return true;
  }
  catch (error: unknown)
  {
    if (isErrnoException(error) && error.code === 'ENOENT')
    {
      return false;
    }
    throw error;
  }
}
