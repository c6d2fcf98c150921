/**
 * Local dialing for tunnel sub-connections
 * @module @tidewater/agent/dialer
 */

import net from 'node:net';
import { pipeline } from 'node:stream/promises';
import type { Duplex } from 'node:stream';
import { formatTunnelTarget, parseTunnelTarget, toError, type TunnelTarget } from '@tidewater/shared';

/**
 * Opens a connection to a target in the agent's network
 */
export type Dialer = (target: TunnelTarget, timeoutMs: number) => Promise<Duplex>;

/**
 * Connect over TCP or a Unix socket / named pipe. Rejects on error or when the
 * connection is not established within `timeoutMs`.
 */
export const dialTarget: Dialer = (target, timeoutMs) =>
  new Promise<Duplex>((resolve, reject) => {
    // Half-open so the backend's end does not cut off what the peer still sends
    const socket =
      target.kind === 'tcp'
        ? net.connect({ host: target.host, port: target.port, allowHalfOpen: true })
        : net.connect({ path: target.path, allowHalfOpen: true });

    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`connect to ${formatTunnelTarget(target)} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      resolve(socket);
    });
    const onError = (error: Error): void => {
      clearTimeout(timer);
      reject(error);
    };
    socket.once('error', onError);
  });

/**
 * Which targets incoming sub-connections may open. An empty list allows any.
 */
export class TargetPolicy {
  private readonly allowed: Set<string>;

  constructor(allowedTargets: readonly string[] = []) {
    this.allowed = new Set();
    for (const raw of allowedTargets) {
      const parsed = parseTunnelTarget(raw);
      if (!parsed) {
        throw new TypeError(`Invalid allowed target: ${raw}`);
      }
      this.allowed.add(formatTunnelTarget(parsed));
    }
  }

  permits(target: TunnelTarget): boolean {
    return this.allowed.size === 0 || this.allowed.has(formatTunnelTarget(target));
  }
}

/**
 * Copy bytes both ways with half-close: each side's end is forwarded as the
 * other's end. Settles once both directions have finished; an error in either
 * destroys both. Resolves with the first error, if any.
 */
export async function splice(local: Duplex, remote: Duplex): Promise<Error | undefined> {
  const results = await Promise.allSettled([pipeline(local, remote), pipeline(remote, local)]);
  local.destroy();
  remote.destroy();
  const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  return failure ? toError(failure.reason) : undefined;
}
