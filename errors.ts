import { LockTimeoutError } from './HostLock.ts';
import { NoFreePortError } from './PortAllocator.ts';
import { CorruptRecordError } from './TunnelRecord.ts';

export type CommonFailure =
  | 'CorruptRecord'
  | 'LockTimeout'
  | 'NoFreePort'
  | 'UnknownError';

/**
 Name the failure an exception escaping an op stands for.
 */
export function failureOf(error: unknown): CommonFailure
{
  if (error instanceof CorruptRecordError)
  {
    return 'CorruptRecord';
  }
  if (error instanceof LockTimeoutError)
  {
    return 'LockTimeout';
  }
  if (error instanceof NoFreePortError)
  {
    return 'NoFreePort';
  }
  return 'UnknownError';
}

export function messageOf(error: unknown): string
{
  return error instanceof Error ? error.message : String(error);
}
