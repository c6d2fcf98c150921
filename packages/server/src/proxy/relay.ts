/**
 * Bidirectional byte relay for upgraded connections
 * @module @tidewater/server/proxy/relay
 */

import type { Duplex } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { toError } from '@tidewater/shared';

function isAbort(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'AbortError') return true;
  return 'code' in error && (error.code === 'ABORT_ERR' || error.code === 'ERR_STREAM_PREMATURE_CLOSE');
}

/**
 * Pipe `client` and `upstream` into each other until either side closes or
 * `signal` fires. Both directions share one abort controller, so the first to
 * settle stops the other. Resolves with the first failure that was not caused
 * by the shutdown itself.
 */
export async function relayBidirectional(
  client: Duplex,
  upstream: Duplex,
  signal?: AbortSignal,
): Promise<Error | undefined> {
  const controller = new AbortController();
  const stop = (): void => controller.abort();

  signal?.addEventListener('abort', stop, { once: true });
  if (signal?.aborted) {
    stop();
  }

  try {
    const outcomes = await Promise.allSettled([
      pipeline(client, upstream, { signal: controller.signal }).finally(stop),
      pipeline(upstream, client, { signal: controller.signal }).finally(stop),
    ]);

    for (const outcome of outcomes) {
      if (outcome.status === 'rejected' && !isAbort(outcome.reason)) {
        return toError(outcome.reason);
      }
    }
    return undefined;
  } finally {
    signal?.removeEventListener('abort', stop);
    client.destroy();
    upstream.destroy();
  }
}
