/**
 * Registry of live reverse tunnels, at most one per environment
 * @module @tidewater/core/stores/tunnel-store
 */

import { computed, shallowReactive, type ComputedRef } from '@vue/reactivity';
import {
  createServiceLogger,
  type Logger,
  type MuxChannel,
  type TunnelState,
  type TunnelSummary,
} from '@tidewater/shared';

/**
 * A tunnel as held by the store. The server that created it owns the
 * transport; `close` asks it to tear everything down.
 */
export interface Tunnel {
  readonly tunnelId: string;
  readonly environmentId: string;
  readonly channel: MuxChannel;
  readonly establishedAt: Date;
  lastHeartbeatAt: Date;
  state: TunnelState;
  readonly remoteAddress?: string;
  readonly agentVersion?: string;
  close(reason: string): void;
}

// ============================================================================
// Store
// ============================================================================

export class TunnelStore {
  private readonly tunnels = shallowReactive(new Map<string, Tunnel>());
  private readonly logger: Logger;

  readonly count: ComputedRef<number> = computed(() => this.tunnels.size);

  readonly environmentIds: ComputedRef<string[]> = computed(() => [...this.tunnels.keys()].sort());

  constructor(logger?: Logger) {
    this.logger = logger ?? createServiceLogger({ component: 'tunnel-store' });
  }

  /**
   * Active tunnel for an environment, if any
   */
  get(environmentId: string): Tunnel | undefined {
    const tunnel = this.tunnels.get(environmentId);
    return tunnel && tunnel.state === 'active' ? tunnel : undefined;
  }

  has(environmentId: string): boolean {
    return this.get(environmentId) !== undefined;
  }

  list(): Tunnel[] {
    return [...this.tunnels.values()];
  }

  /**
   * Install `tunnel` as the environment's tunnel. Any previous tunnel is
   * marked closing, removed and closed before the new one becomes visible.
   * Returns the superseded tunnel.
   */
  install(tunnel: Tunnel): Tunnel | undefined {
    const previous = this.tunnels.get(tunnel.environmentId);
    if (previous === tunnel) {
      return undefined;
    }

    if (previous) {
      previous.state = 'closing';
      this.tunnels.delete(previous.environmentId);
      this.logger.info('Replacing tunnel', {
        environmentId: tunnel.environmentId,
        previousTunnelId: previous.tunnelId,
        tunnelId: tunnel.tunnelId,
      });
      previous.close('superseded by a newer handshake');
    }

    tunnel.state = 'active';
    this.tunnels.set(tunnel.environmentId, tunnel);
    return previous;
  }

  /**
   * Remove `tunnel` if it is still the installed one. Returns false when a
   * newer tunnel has taken its place, so callers know not to flip status.
   */
  retire(environmentId: string, tunnel: Tunnel): boolean {
    tunnel.state = 'closing';
    if (this.tunnels.get(environmentId) !== tunnel) {
      return false;
    }
    this.tunnels.delete(environmentId);
    return true;
  }

  /**
   * Close and drop every tunnel
   */
  closeAll(reason: string): void {
    const tunnels = [...this.tunnels.values()];
    this.tunnels.clear();
    for (const tunnel of tunnels) {
      tunnel.state = 'closing';
      tunnel.close(reason);
    }
  }

  summarize(tunnel: Tunnel): TunnelSummary {
    return {
      tunnelId: tunnel.tunnelId,
      environmentId: tunnel.environmentId,
      state: tunnel.state,
      establishedAt: tunnel.establishedAt.toISOString(),
      lastActivityAt: tunnel.channel.lastActivityAt.toISOString(),
      lastHeartbeatAt: tunnel.lastHeartbeatAt.toISOString(),
      remoteAddress: tunnel.remoteAddress,
      agentVersion: tunnel.agentVersion,
      openStreams: tunnel.channel.openStreams,
    };
  }

  summaries(): TunnelSummary[] {
    return this.list().map((tunnel) => this.summarize(tunnel));
  }
}
