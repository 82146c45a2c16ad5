import type { ConfigPort } from '@/ports/ConfigPort';
import type { ConfigRepository } from '@/application/config/configRepository';

export class ConfigAdapter implements ConfigPort {
  constructor(private readonly repository: ConfigRepository) {}

  public load(): ReturnType<ConfigPort['load']> {
    return this.repository.load();
  }
}
