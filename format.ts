import { formatRemoteSocket, type TunnelRecord } from './TunnelRecord.ts';

const HEADERS = ['LOCAL PORT', 'REMOTE SOCKET', 'HOST', 'LABEL'];

/**
 Render records as a left-aligned table, columns two spaces apart.
 */
export function formatTunnelTable(records: readonly TunnelRecord[]): string
{
  if (records.length === 0)
  {
    return 'No active tunnels.\n';
  }
  const rows = [
    HEADERS,
    ...records.map((record) => [
      String(record.localPort),
      formatRemoteSocket(record.remote),
      record.hostId,
      record.label ?? '',
    ]),
  ];
  const widths = HEADERS.map((_, column) => Math.max(...rows.map((row) => row[column].length)));
  return rows
    .map((row) => row.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd())
    .map((line) => `${line}\n`)
    .join('');
}
