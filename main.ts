import process from 'node:process';
import { AddTunnelsOp } from './AddTunnelsOp.ts';
import { ConfigError, loadConfig } from './config.ts';
import { formatTunnelTable } from './format.ts';
import { KillHostsOp } from './KillHostsOp.ts';
import { ListTunnelsOp } from './ListTunnelsOp.ts';
import { LoadProfilesOp } from './LoadProfilesOp.ts';
import { createLogger } from './logger.ts';
import { createIO, type IOContext } from './ops/IOContext.ts';
import type { Outcome } from './ops/Outcome.ts';
import { type Command, type Options, parseArgs, USAGE } from './parseArgs.ts';
import { createConfirm } from './prompts.ts';
import { RemoveTunnelsOp } from './RemoveTunnelsOp.ts';
import { SaveProfileOp } from './SaveProfileOp.ts';
import { createServices, type Services } from './Services.ts';

export interface MainOverrides
{
  env?: NodeJS.ProcessEnv;
  io?: IOContext;
  /** Built from the environment when absent. */
  services?: Services;
}

function print(io: IOContext, text: string): void
{
  io.stdout.write(text);
}

function printJSON(io: IOContext, value: unknown): void
{
  print(io, `${JSON.stringify(value, null, 2)}\n`);
}

/**
 Report a finished op and pick the exit code: 0 unless it failed.
 */
function settle<T>(
  io: IOContext,
  outcome: Outcome<T, string>,
  render: (value: T) => string | undefined,
): number
{
  if (io.mode === 'json')
  {
    printJSON(io, outcome.ok
      ? { ok: true, result: outcome.value }
      : { ok: false, failure: outcome.failure, debugData: outcome.debugData });
    return outcome.ok ? 0 : 1;
  }
  if (!outcome.ok)
  {
    io.logger.error(`Failed: ${outcome.failure}${outcome.debugData ? ` (${outcome.debugData})` : ''}`);
    return 1;
  }
  const text = render(outcome.value);
  if (text !== undefined)
  {
    print(io, text);
  }
  return 0;
}

async function execute(command: Exclude<Command, { kind: 'help' }>, services: Services, io: IOContext): Promise<number>
{
  switch (command.kind)
  {
    case 'add':
    {
      const outcome = await new AddTunnelsOp(services, command).run(io);
      return settle(io, outcome, formatTunnelTable);
    }
    case 'list':
    {
      const outcome = await new ListTunnelsOp(services).run(io);
      return settle(io, outcome, formatTunnelTable);
    }
    case 'remove':
      return settle(io, await new RemoveTunnelsOp(services, command.localPorts).run(io), () => undefined);
    case 'kill':
      return settle(io, await new KillHostsOp(services, command.hostIds).run(io), () => undefined);
    case 'save':
      return settle(io, await new SaveProfileOp(services, command.profileName, command.localPorts).run(io), () => undefined);
    case 'load':
    {
      const outcome = await new LoadProfilesOp(services, command.profileNames).run(io);
      return settle(io, outcome, (result) =>
      {
        const records = result.loaded.flatMap((profile) => profile.records);
        return records.length > 0 ? formatTunnelTable(records) : undefined;
      });
    }
  }
}

function createDefaultIO(options: Readonly<Options>): IOContext
{
  const logger = createLogger({
    level: options.verbose ? 'debug' : undefined,
    json: options.json ? true : undefined,
  });
  return createIO(options.json ? 'json' : 'interactive', logger);
}

/**
 Run one fwdctl command and return the process exit code.
 */
export async function main(argv: readonly string[], overrides: MainOverrides = {}): Promise<number>
{
  const parsed = parseArgs(argv);
  if (!parsed.ok)
  {
    process.stderr.write(`${parsed.debugData ?? parsed.failure}\n\n${USAGE}`);
    return 1;
  }
  const { command, options } = parsed.value;
  const io = overrides.io ?? createDefaultIO(options);

  if (command.kind === 'help')
  {
    print(io, USAGE);
    return 0;
  }

  let services = overrides.services;
  if (!services)
  {
    try
    {
      const config = loadConfig(overrides.env);
      services = createServices(
        config,
        io.logger,
        createConfirm({ assumeYes: options.yes, logger: io.logger }),
      );
    }
    catch (error: unknown)
    {
      if (error instanceof ConfigError)
      {
        io.logger.error(error.message);
        return 1;
      }
      throw error;
    }
  }

  return execute(command, services, io);
}
