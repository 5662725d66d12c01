import pino, { type Level, type Logger } from 'pino';
import pretty from 'pino-pretty';
import process from 'node:process';

export interface LoggerOptions
{
  level?: Level | 'silent';
  /** Plain JSON lines instead of pretty output. */
  json?: boolean;
}

/**
 Logs go to stderr so stdout stays clean for listings and `--json` output.
 */
export function createLogger(options: LoggerOptions = {}): Logger
{
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const json = options.json ?? process.env.NODE_ENV === 'production';

  if (json)
  {
    return pino({ level }, pino.destination({ fd: 2, sync: true }));
  }
  return pino(
    { level },
    pretty({
      colorize: process.stderr.isTTY ?? false,
      destination: 2,
      sync: true,
      ignore: 'pid,hostname,time',
      messageFormat: '{if op}[{op}] {end}{msg}',
      hideObject: true,
    }),
  );
}

export function createSilentLogger(): Logger
{
  return pino({ level: 'silent' });
}
