/**
 * @file packages/gateway/src/infrastructure/config/config-service.ts
 * @description Exposes the validated hub configuration through the container.
 */

import { inject, singleton } from 'tsyringe';
import { loadConfig, type HubConfig } from '../../config.js';
import { Logger } from '../../logger.js';

/**
 * Encapsulates config service behavior.
 */
@singleton()
export class ConfigService {
  private config: HubConfig | null = null;

  constructor(@inject(Logger) private logger: Logger) {}

  /**
   * Replaces the loaded configuration, used by bootstrap and tests.
   * @param config - Validated configuration.
   */
  public use(config: HubConfig): this {
    this.config = config;
    return this;
  }

  /**
   * Executes load.
   * @returns The load result.
   */
  public load(): HubConfig {
    try {
      this.config = loadConfig();
      return this.config;
    } catch (err) {
      this.logger.error({ err }, 'Failed to load config');
      throw err;
    }
  }

  /**
   * Executes get.
   * @param key - Key.
   * @returns The get result.
   */
  public get<K extends keyof HubConfig>(key: K): HubConfig[K] {
    return this.getFullConfig()[key];
  }

  /**
   * Retrieves full config.
   * @returns The get full config result.
   */
  public getFullConfig(): HubConfig {
    return this.config ?? this.load();
  }
}
