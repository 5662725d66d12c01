/**
 A remote endpoint as seen from the far side of a control channel.
 */
export interface RemoteSocket
{
  host: string;
  port: number;
}

/**
 One local port forwarded to one remote socket through one host's channel.
 */
export interface TunnelRecord
{
  localPort: number;
  remote: RemoteSocket;
  hostId: string;
  label?: string;
}

/**
 A remote socket as requested on the command line: `host:port[:label]`.
 */
export interface RemoteSocketSpec
{
  remote: RemoteSocket;
  label?: string;
}

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

const FIELD_SEPARATOR = '\t';
const FIELD_COUNT = 4;

/**
 Thrown when a registry or profile file holds a line that is not a record.
 */
export class CorruptRecordError extends Error
{
  override readonly name = 'CorruptRecordError';

  constructor(
    readonly source: string,
    readonly lineNumber: number,
    readonly reason: string,
  )
  {
    super(`${source}:${lineNumber}: ${reason}`);
  }
}

export function isValidPort(port: number): boolean
{
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

/**
 Parse a decimal port number, or return undefined.
 */
export function parsePort(text: string): number | undefined
{
  if (!/^\d+$/.test(text))
  {
    return undefined;
  }
  const port = Number(text);
  return isValidPort(port) ? port : undefined;
}

export function formatRemoteSocket(remote: RemoteSocket): string
{
  return remote.host.includes(':') ? `[${remote.host}]:${remote.port}` : `${remote.host}:${remote.port}`;
}

/**
 Split `host:port` (or `[v6]:port`) into its parts. Returns the unparsed rest
 after the port, so callers can pick up a trailing `:label`.
 */
function splitRemoteSocket(text: string): { remote: RemoteSocket; rest: string } | undefined
{
  const match = text.startsWith('[')
    ? /^\[([^\]]+)\]:(\d+)(.*)$/.exec(text)
    : /^([^:\s]+):(\d+)(.*)$/.exec(text);
  if (!match)
  {
    return undefined;
  }
  const [, host, portText, rest] = match;
  const port = parsePort(portText);
  if (port === undefined)
  {
    return undefined;
  }
  return { remote: { host, port }, rest };
}

export function parseRemoteSocket(text: string): RemoteSocket | undefined
{
  const parsed = splitRemoteSocket(text);
  return parsed && parsed.rest === '' ? parsed.remote : undefined;
}

/**
 Parse `host:port[:label]` as given to `add`.
 */
export function parseRemoteSocketSpec(text: string): RemoteSocketSpec | undefined
{
  const parsed = splitRemoteSocket(text);
  if (!parsed)
  {
    return undefined;
  }
  if (parsed.rest === '')
  {
    return { remote: parsed.remote };
  }
  if (!parsed.rest.startsWith(':'))
  {
    return undefined;
  }
  const label = parsed.rest.slice(1);
  if (/[\t\r\n]/.test(label))
  {
    return undefined;
  }
  return label === '' ? { remote: parsed.remote } : { remote: parsed.remote, label };
}

export function serializeRecord(record: TunnelRecord): string
{
  return [
    String(record.localPort),
    formatRemoteSocket(record.remote),
    record.hostId,
    record.label ?? '',
  ].join(FIELD_SEPARATOR);
}

export function parseRecord(line: string, source: string, lineNumber: number): TunnelRecord
{
  const fields = line.split(FIELD_SEPARATOR);
  if (fields.length !== FIELD_COUNT)
  {
    throw new CorruptRecordError(source, lineNumber, `expected ${FIELD_COUNT} fields, found ${fields.length}`);
  }
  const [portText, remoteText, hostId, label] = fields;

  const localPort = parsePort(portText);
  if (localPort === undefined)
  {
    throw new CorruptRecordError(source, lineNumber, `invalid local port "${portText}"`);
  }
  const remote = parseRemoteSocket(remoteText);
  if (!remote)
  {
    throw new CorruptRecordError(source, lineNumber, `invalid remote socket "${remoteText}"`);
  }
  if (hostId === '')
  {
    throw new CorruptRecordError(source, lineNumber, 'empty host id');
  }
  return label === '' ? { localPort, remote, hostId } : { localPort, remote, hostId, label };
}

/**
 Serialize records one per line, with a trailing newline when non-empty.
 */
export function serializeRecords(records: readonly TunnelRecord[]): string
{
  return records.map((record) => `${serializeRecord(record)}\n`).join('');
}

export function parseRecords(content: string, source: string): TunnelRecord[]
{
  const records: TunnelRecord[] = [];
  content.split('\n').forEach((line, index) =>
  {
    if (line.trim() === '')
    {
      return;
    }
    records.push(parseRecord(line, source, index + 1));
  });
  return records;
}

export function describeRecord(record: TunnelRecord): string
{
  const label = record.label ? ` (${record.label})` : '';
  return `localhost:${record.localPort} -> ${formatRemoteSocket(record.remote)} via ${record.hostId}${label}`;
}
