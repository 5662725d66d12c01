import { parseArgs as parseNodeArgs } from 'node:util';
import type { Outcome } from './ops/Outcome.ts';
import { parsePort, parseRemoteSocketSpec, type RemoteSocketSpec } from './TunnelRecord.ts';

export type Command =
  | { kind: 'add'; hostId: string; startPort?: number; sockets: RemoteSocketSpec[] }
  | { kind: 'list' }
  | { kind: 'remove'; localPorts: number[] }
  | { kind: 'kill'; hostIds: string[] }
  | { kind: 'save'; profileName: string; localPorts: number[] }
  | { kind: 'load'; profileNames: string[] }
  | { kind: 'help' };

export type Options = {
  json: boolean;
  verbose: boolean;
  /** Answer yes to overwrite questions. */
  yes: boolean;
};

export interface ParsedArgs
{
  command: Command;
  options: Readonly<Options>;
}

export type ParseArgsFailure =
  | 'MissingArgument'
  | 'InvalidArgument'
  | 'UnknownCommand';

export const USAGE = `Usage: fwdctl <command> [options]

Commands:
  add <host> [<startPort>] <remoteSocket...>   forward remote sockets (host:port[:label]) through <host>
  list                                         show active tunnels (default)
  remove <localPort...>                        remove tunnels by local port
  kill <host...>                               close every tunnel through the given hosts
  save <name> <localPort...>                   save tunnels to a named profile
  load <name...>                               re-establish the tunnels of saved profiles
  help                                         show this message

Options:
  -p, --port <n>   first local port to try for add (default $FWDCTL_START_PORT or 4000)
  -y, --yes        overwrite an existing profile without asking
  -j, --json       print results as JSON
  -v, --verbose    log every step
`;

type Parsed = Outcome<Command, ParseArgsFailure>;

function missing(message: string): Parsed
{
  return { ok: false, failure: 'MissingArgument', debugData: message };
}

function invalid(message: string): Parsed
{
  return { ok: false, failure: 'InvalidArgument', debugData: message };
}

function isValidName(name: string): boolean
{
  return name !== '' && !/[\t\r\n/]/.test(name);
}

function parsePorts(args: readonly string[]): number[] | string
{
  const ports: number[] = [];
  for (const arg of args)
  {
    const port = parsePort(arg);
    if (port === undefined)
    {
      return arg;
    }
    ports.push(port);
  }
  return ports;
}

function parseAdd(args: readonly string[], portOption: string | undefined): Parsed
{
  if (args.length === 0)
  {
    return missing('add needs a host');
  }
  const [hostId, ...rest] = args;
  if (!isValidName(hostId))
  {
    return invalid(`Invalid host "${hostId}"`);
  }

  let startPort: number | undefined;
  let socketArgs = rest;
  if (rest.length > 0 && /^\d+$/.test(rest[0]))
  {
    startPort = parsePort(rest[0]);
    if (startPort === undefined)
    {
      return invalid(`Invalid start port "${rest[0]}"`);
    }
    socketArgs = rest.slice(1);
  }
  if (portOption !== undefined)
  {
    startPort = parsePort(portOption);
    if (startPort === undefined)
    {
      return invalid(`Invalid start port "${portOption}"`);
    }
  }

  if (socketArgs.length === 0)
  {
    return missing('add needs at least one remote socket (host:port[:label])');
  }
  const sockets: RemoteSocketSpec[] = [];
  for (const arg of socketArgs)
  {
    const spec = parseRemoteSocketSpec(arg);
    if (!spec)
    {
      return invalid(`Invalid remote socket "${arg}", expected host:port[:label]`);
    }
    sockets.push(spec);
  }
  return {
    ok: true,
    value: startPort === undefined ? { kind: 'add', hostId, sockets } : { kind: 'add', hostId, startPort, sockets },
  };
}

function parseCommand(name: string, args: readonly string[], portOption: string | undefined): Parsed
{
  switch (name)
  {
    case 'add':
      return parseAdd(args, portOption);
    case 'list':
      return { ok: true, value: { kind: 'list' } };
    case 'help':
      return { ok: true, value: { kind: 'help' } };
    case 'remove':
    {
      if (args.length === 0)
      {
        return missing('remove needs at least one local port');
      }
      const localPorts = parsePorts(args);
      if (typeof localPorts === 'string')
      {
        return invalid(`Invalid local port "${localPorts}"`);
      }
      return { ok: true, value: { kind: 'remove', localPorts } };
    }
    case 'save':
    {
      if (args.length === 0)
      {
        return missing('save needs a profile name');
      }
      const [profileName, ...portArgs] = args;
      if (!isValidName(profileName))
      {
        return invalid(`Invalid profile name "${profileName}"`);
      }
      if (portArgs.length === 0)
      {
        return missing('save needs at least one local port');
      }
      const localPorts = parsePorts(portArgs);
      if (typeof localPorts === 'string')
      {
        return invalid(`Invalid local port "${localPorts}"`);
      }
      return { ok: true, value: { kind: 'save', profileName, localPorts } };
    }
    case 'kill':
    case 'load':
    {
      if (args.length === 0)
      {
        return missing(name === 'kill' ? 'kill needs at least one host' : 'load needs at least one profile name');
      }
      const bad = args.find((arg) => !isValidName(arg));
      if (bad !== undefined)
      {
        return invalid(`Invalid ${name === 'kill' ? 'host' : 'profile name'} "${bad}"`);
      }
      return name === 'kill'
        ? { ok: true, value: { kind: 'kill', hostIds: [...args] } }
        : { ok: true, value: { kind: 'load', profileNames: [...args] } };
    }
    default:
      return { ok: false, failure: 'UnknownCommand', debugData: `Unknown command "${name}"` };
  }
}

function tokenize(args: readonly string[])
{
  return parseNodeArgs({
    args: [...args],
    options: {
      port: { type: 'string', short: 'p' },
      yes: { type: 'boolean', short: 'y', default: false },
      json: { type: 'boolean', short: 'j', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

/**
 Parse CLI args into a command. With no command, lists tunnels.
 */
export function parseArgs(args: readonly string[]): Outcome<ParsedArgs, ParseArgsFailure>
{
  let parsed: ReturnType<typeof tokenize>;
  try
  {
    parsed = tokenize(args);
  }
  catch (error: unknown)
  {
    return { ok: false, failure: 'InvalidArgument', debugData: error instanceof Error ? error.message : String(error) };
  }

  const { values, positionals } = parsed;
  const options: Options = {
    json: values.json ?? false,
    verbose: values.verbose ?? false,
    yes: values.yes ?? false,
  };
  if (values.help)
  {
    return { ok: true, value: { command: { kind: 'help' }, options } };
  }

  const [name = 'list', ...rest] = positionals;
  if (values.port !== undefined && name !== 'add')
  {
    return { ok: false, failure: 'InvalidArgument', debugData: '--port only applies to add' };
  }
  const command = parseCommand(name, rest, values.port);
  if (!command.ok)
  {
    return command;
  }
  return { ok: true, value: { command: command.value, options } };
}
