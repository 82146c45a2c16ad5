import type { StoragePort } from '@/ports/StoragePort';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import type { ConfigPort } from '@/ports/ConfigPort';
import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { ConfigRepository } from '@/application/config/configRepository';
import { LibraryRegistry } from '@/application/library/libraryRegistry';

export type RuntimePorts = {
  storage: StoragePort;
  config: ConfigPort;
  libraries: LibraryRegistry;
};

export function createRuntimePorts(
  dataDir: string,
  deps: { storage?: StoragePort } = {},
): RuntimePorts {
  const storage = deps.storage ?? new StorageAdapter();
  const configRepository = new ConfigRepository(storage, dataDir);
  return {
    storage,
    config: new ConfigAdapter(configRepository),
    libraries: new LibraryRegistry(dataDir, storage),
  };
}
