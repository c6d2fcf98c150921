/**
 * Edge agent credential verification
 *
 * Agents present a shared key in `tunnel:hello`; the environment record keeps
 * only its SHA-256 digest (`edgeKeyHash`).
 *
 * @module @tidewater/server/services/edge-key-verifier
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import {
  createServiceLogger,
  type CredentialCheck,
  type CredentialVerifier,
  type Logger,
} from '@tidewater/shared';
import type { EnvironmentRegistry } from '@tidewater/core';

/**
 * Digest stored in `Environment.edgeKeyHash` for an agent key
 */
export function hashEdgeKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

export class EdgeKeyVerifier implements CredentialVerifier {
  private readonly logger: Logger;

  constructor(
    private readonly registry: EnvironmentRegistry,
    logger?: Logger,
  ) {
    this.logger = logger ?? createServiceLogger({ component: 'edge-key-verifier' });
  }

  async verify(environmentId: string, token: string): Promise<CredentialCheck> {
    const environment = this.registry.get(environmentId);
    if (!environment?.edgeKeyHash) {
      this.logger.debug('No edge key on record', { environmentId });
      return { valid: false, reason: 'no edge key configured for environment' };
    }

    const expected = Buffer.from(environment.edgeKeyHash, 'hex');
    const presented = Buffer.from(hashEdgeKey(token), 'hex');
    if (expected.length !== presented.length || !timingSafeEqual(expected, presented)) {
      return { valid: false, reason: 'edge key mismatch' };
    }
    return { valid: true };
  }
}
