import process from 'node:process';
import { createInterface } from 'node:readline/promises';
import type { Logger } from 'pino';
import type { Confirm } from './Services.ts';

export interface ConfirmOptions
{
  /** Answer yes without asking (--yes). */
  assumeYes: boolean;
  /** Whether someone is there to answer; defaults to stdin being a terminal. */
  interactive?: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  logger?: Logger;
}

export function isYes(answer: string): boolean
{
  return /^y(es)?$/i.test(answer.trim());
}

/**
 A yes/no prompt on the terminal. Without a terminal every question is
 answered no, so nothing is overwritten unattended.
 */
export function createConfirm(options: ConfirmOptions): Confirm
{
  const interactive = options.interactive ?? process.stdin.isTTY === true;
  return async (question) =>
  {
    if (options.assumeYes)
    {
      return true;
    }
    if (!interactive)
    {
      options.logger?.warn(`${question} No terminal to ask, answering no (use --yes to overwrite)`);
      return false;
    }
    const rl = createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stderr,
    });
    try
    {
      return isYes(await rl.question(`${question} [y/N] `));
    }
    finally
    {
      rl.close();
    }
  };
}
