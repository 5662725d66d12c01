import type { Logger } from 'pino';
import process from 'node:process';
import { createLogger } from '../logger.ts';

export type IOMode = 'interactive' | 'json';

/**
 Everything an op needs to talk to the outside world.
 */
export interface IOContext
{
  readonly mode: IOMode;
  readonly logger: Logger;
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
}

let defaultIO: IOContext | undefined;

export function createIO(mode: IOMode, logger: Logger): IOContext
{
  return {
    mode,
    logger,
    stdin: process.stdin,
    stdout: process.stdout,
  };
}

/**
 The context ops fall back to when `run()` is called without one.
 */
export function getDefaultIO(): IOContext
{
  defaultIO ??= createIO('interactive', createLogger());
  return defaultIO;
}
