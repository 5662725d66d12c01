import type { Logger } from 'pino';
import type { Config } from './config.ts';
import type { ControlChannelProvider } from './ControlChannel.ts';
import { FileHostLocker, type HostLocker } from './HostLock.ts';
import { LsofListenerTable, PortAllocator } from './PortAllocator.ts';
import { FileProfileStore, type ProfileStore } from './ProfileStore.ts';
import { FileRegistry, type Registry } from './Registry.ts';
import { SSHControlChannel } from './SSHControlChannel.ts';
import { defaultSSH } from './fwdctl-internals.ts';

/**
 Ask the user a yes/no question. Resolves false when nobody can answer.
 */
export type Confirm = (question: string) => Promise<boolean>;

/**
 Everything the tunnel commands work against.
 */
export interface Services
{
  registry: Registry;
  profiles: ProfileStore;
  channels: ControlChannelProvider;
  allocator: PortAllocator;
  locks: HostLocker;
  confirm: Confirm;
  defaultStartPort: number;
}

export function createServices(config: Config, logger: Logger, confirm: Confirm): Services
{
  return {
    registry: new FileRegistry(config.tunnelsDir, logger),
    profiles: new FileProfileStore(config.profilesDir, logger),
    channels: new SSHControlChannel({
      socketsDir: config.socketsDir,
      connectTimeout: config.connectTimeout,
      serverAliveInterval: config.serverAliveInterval,
      ssh: { ...defaultSSH, command: config.sshCommand },
      logger,
    }),
    allocator: new PortAllocator(new LsofListenerTable(), undefined, logger),
    locks: new FileHostLocker(config.locksDir, config.lockTimeoutMs),
    confirm,
    defaultStartPort: config.defaultStartPort,
  };
}
