import { createServer } from 'node:net';
import type { Logger } from 'pino';
import { type CommandRunner, runCommand } from './fwdctl-internals.ts';
import { MAX_PORT } from './TunnelRecord.ts';

/**
 Source of the ports currently bound on this machine.
 */
export interface ListenerTable
{
  /** Snapshot of listening TCP ports, taken at call time. */
  listening(): Promise<ReadonlySet<number>>;
}

/**
 Pull the port out of lsof's NAME column: `*:5173`, `127.0.0.1:3000`,
 `[::1]:8080`, optionally followed by ` (LISTEN)`.
 */
export function parseLsofListeners(output: string): Set<number>
{
  const ports = new Set<number>();
  const lines = output.split('\n').slice(1); // header
  for (const line of lines)
  {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 9)
    {
      continue;
    }
    const match = /:(\d+)$/.exec(parts[8]);
    if (match)
    {
      ports.add(Number(match[1]));
    }
  }
  return ports;
}

/**
 Listener table read from `lsof -nP -iTCP -sTCP:LISTEN`.
 */
export class LsofListenerTable implements ListenerTable
{
  constructor(readonly run: CommandRunner = runCommand) {}

  async listening(): Promise<ReadonlySet<number>>
  {
    const result = await this.run('lsof', ['-nP', '-iTCP', '-sTCP:LISTEN']);
    // lsof exits 1 when nothing matched
    if (result.exitCode === 0 || (result.exitCode === 1 && result.stdout.trim() === '' && result.stderr.trim() === ''))
    {
      return parseLsofListeners(result.stdout);
    }
    throw new Error(`lsof failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
  }
}

/**
 Try to bind the port on loopback. Used when there is no listener table.
 */
export function isPortBindable(port: number, host = '127.0.0.1'): Promise<boolean>
{
  return new Promise((resolve) =>
  {
    const server = createServer();
    server.once('error', () => resolve(false));
    server.listen({ port, host, exclusive: true }, () =>
    {
      server.close(() => resolve(true));
    });
  });
}

export class NoFreePortError extends Error
{
  override readonly name = 'NoFreePortError';

  constructor(readonly startingFrom: number)
  {
    super(`No free local port at or above ${startingFrom}`);
  }
}

/**
 Lowest-available port allocation against live listener state: the
 listener table first, then a bind probe for each candidate it lets through.

 Deterministic: the same listener table always yields the same port, so a
 batch of forwards gets consecutive ports where it can.
 */
export class PortAllocator
{
  #tableUsable = true;

  constructor(
    readonly table: ListenerTable,
    readonly probe: (port: number) => Promise<boolean> = isPortBindable,
    readonly logger?: Logger,
  ) {}

  /**
   Smallest port `>= startingFrom` that is not listening right now, cannot be
   bound by someone else, and is not in `claimed`.

   @throws NoFreePortError when the scan runs past 65535
   */
  async nextFreePort(startingFrom: number, claimed: ReadonlySet<number> = new Set()): Promise<number>
  {
    const listening = await this.#snapshot();
    for (let port = Math.max(startingFrom, 1); port <= MAX_PORT; port++)
    {
      if (claimed.has(port) || await this.#inUse(port, listening))
      {
        continue;
      }
      return port;
    }
    throw new NoFreePortError(startingFrom);
  }

  /**
   Whether the port is listening right now.
   */
  async isBound(port: number): Promise<boolean>
  {
    return this.#inUse(port, await this.#snapshot());
  }

  /**
   The table only shows the sockets lsof may see, which without root are
   our own. A port missing from it is confirmed free with a bind probe.
   */
  async #inUse(port: number, listening: ReadonlySet<number> | undefined): Promise<boolean>
  {
    if (listening?.has(port))
    {
      return true;
    }
    return !(await this.probe(port));
  }

  /** Undefined once the table has failed; from then on only the probe decides. */
  async #snapshot(): Promise<ReadonlySet<number> | undefined>
  {
    if (!this.#tableUsable)
    {
      return undefined;
    }
    try
    {
      return await this.table.listening();
    }
    catch (error: unknown)
    {
      this.logger?.warn(`Listener table unavailable, probing ports instead: ${error instanceof Error ? error.message : String(error)}`);
      this.#tableUsable = false;
      return undefined;
    }
  }
}
