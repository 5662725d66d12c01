import { homedir } from 'node:os';
import { join } from 'node:path';
import process from 'node:process';
import type { Logger } from 'pino';
import { z } from 'zod';

/**
 Where fwdctl keeps its state, and how it talks to ssh.
 */
export interface Config
{
  homeDir: string;
  socketsDir: string;
  tunnelsDir: string;
  profilesDir: string;
  locksDir: string;
  defaultStartPort: number;
  sshCommand: string;
  connectTimeout: number;
  serverAliveInterval: number;
  lockTimeoutMs: number;
}

export class ConfigError extends Error
{
  override readonly name = 'ConfigError';
}

const port = z.coerce.number().int().min(1).max(65535);
const seconds = z.coerce.number().int().positive();

const envSchema = z.object({
  FWDCTL_HOME: z.string().min(1).optional(),
  FWDCTL_START_PORT: port.default(4000),
  FWDCTL_SSH: z.string().min(1).default('ssh'),
  FWDCTL_CONNECT_TIMEOUT: seconds.default(10),
  FWDCTL_SERVER_ALIVE_INTERVAL: seconds.default(30),
  FWDCTL_LOCK_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
});

/**
 Build the configuration from environment variables. Empty variables count
 as unset.

 @throws ConfigError naming the offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config
{
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success)
  {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? parsed.error.message}`);
  }
  const values = parsed.data;
  const homeDir = values.FWDCTL_HOME ?? join(homedir(), '.fwdctl');

  return {
    homeDir,
    socketsDir: join(homeDir, 'sockets'),
    tunnelsDir: join(homeDir, 'tunnels'),
    profilesDir: join(homeDir, 'profiles'),
    locksDir: join(homeDir, 'locks'),
    defaultStartPort: values.FWDCTL_START_PORT,
    sshCommand: values.FWDCTL_SSH,
    connectTimeout: values.FWDCTL_CONNECT_TIMEOUT,
    serverAliveInterval: values.FWDCTL_SERVER_ALIVE_INTERVAL,
    lockTimeoutMs: values.FWDCTL_LOCK_TIMEOUT_MS,
  };
}

/**
 File name for a host id or profile name. Reversible, so directory listings
 map back to names.
 */
export function encodeKey(key: string): string
{
  return encodeURIComponent(key).replace(/\./g, '%2E');
}

/**
 Inverse of `encodeKey`, or undefined for a name it could not have produced.
 */
export function decodeKey(fileName: string): string | undefined
{
  try
  {
    return decodeURIComponent(fileName);
  }
  catch (error: unknown)
  {
    if (error instanceof URIError)
    {
      return undefined;
    }
    throw error;
  }
}

/**
 Names behind the entries of a state directory, sorted by file name. Dotfiles
 are temp files; other entries that do not decode are skipped with a warning.
 */
export function decodeListing(dir: string, fileNames: readonly string[], logger?: Logger): string[]
{
  const keys: string[] = [];
  for (const fileName of [...fileNames].sort())
  {
    if (fileName.startsWith('.'))
    {
      continue;
    }
    const key = decodeKey(fileName);
    if (key === undefined)
    {
      logger?.warn(`Ignoring stray file ${fileName} in ${dir}`);
      continue;
    }
    keys.push(key);
  }
  return keys;
}
