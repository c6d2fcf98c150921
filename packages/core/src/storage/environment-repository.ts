/**
 * Environment records persisted as JSON in the key/value store
 * @module @tidewater/core/storage/environment-repository
 */

import {
  createServiceLogger,
  validateEnvironment,
  type Environment,
  type Logger,
} from '@tidewater/shared';
import type { KeyValueStore } from './kv-store.js';

export const ENVIRONMENT_KEY_PREFIX = 'environments/';

export function environmentKey(environmentId: string): string {
  return `${ENVIRONMENT_KEY_PREFIX}${environmentId}`;
}

export class EnvironmentRepository {
  private readonly store: KeyValueStore;
  private readonly logger: Logger;

  constructor(store: KeyValueStore, logger?: Logger) {
    this.store = store;
    this.logger = logger ?? createServiceLogger({ component: 'environment-repository' });
  }

  async get(environmentId: string): Promise<Environment | undefined> {
    const raw = await this.store.get(environmentKey(environmentId));
    return raw === undefined ? undefined : this.decode(environmentKey(environmentId), raw);
  }

  async put(environment: Environment): Promise<void> {
    await this.store.put(environmentKey(environment.id), JSON.stringify(environment));
  }

  async delete(environmentId: string): Promise<boolean> {
    return this.store.delete(environmentKey(environmentId));
  }

  /**
   * All decodable records. Corrupt records are logged and skipped.
   */
  async list(): Promise<Environment[]> {
    const entries = await this.store.list(ENVIRONMENT_KEY_PREFIX);
    const environments: Environment[] = [];
    for (const { key, value } of entries) {
      const environment = this.decode(key, value);
      if (environment) {
        environments.push(environment);
      }
    }
    return environments;
  }

  private decode(key: string, raw: string): Environment | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Skipping unparsable environment record', {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }

    const result = validateEnvironment(parsed);
    if (!result.valid) {
      this.logger.warn('Skipping invalid environment record', { key, details: result.error.details });
      return undefined;
    }
    return result.value;
  }
}
