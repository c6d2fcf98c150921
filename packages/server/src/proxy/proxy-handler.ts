/**
 * Per-environment proxy handler
 * @module @tidewater/server/proxy/proxy-handler
 *
 * Forwards plain HTTP calls with http-proxy and relays protocol upgrades over
 * the transport chosen for the environment. Responses stream through
 * unchanged.
 */

import http, {
  type ClientRequest,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type OutgoingHttpHeaders,
  type ServerResponse,
} from 'node:http';
import https from 'node:https';
import type { Duplex } from 'node:stream';
import httpProxy from 'http-proxy';
import {
  ErrorCode,
  ProxyError,
  TidewaterError,
  createServiceLogger,
  isTidewaterError,
  toError,
  type Environment,
  type Logger,
} from '@tidewater/shared';
import type { Transport, TransportVariant } from './transport-builder.js';
import { relayBidirectional } from './relay.js';

type ProxyServer = httpProxy<IncomingMessage, ServerResponse>;

/** Socket errors meaning the backend could not be reached at all */
const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED',
  'ENOENT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EACCES',
]);

/** Caller headers never forwarded to a backend */
const STRIPPED_HEADERS = new Set(['authorization', 'cookie', 'host']);

/** Largest refused-upgrade body relayed back to the client */
const MAX_REFUSAL_BODY = 64 * 1024;

/**
 * Map a transport failure to the proxy error taxonomy. Tunnel and proxy
 * errors pass through untouched.
 */
export function toProxyError(environmentId: string, error: unknown): TidewaterError {
  if (isTidewaterError(error)) {
    return error;
  }
  const cause = toError(error);
  if ('code' in cause && typeof cause.code === 'string' && UNREACHABLE_CODES.has(cause.code)) {
    return ProxyError.environmentUnreachable(environmentId, cause.code, cause);
  }
  return ProxyError.upstreamProtocolError(environmentId, cause.message, cause);
}

function cancelled(environmentId: string): TidewaterError {
  return new TidewaterError('Request cancelled', ErrorCode.CANCELLED, {
    resourceType: 'environment',
    resourceId: environmentId,
  });
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function statusLine(res: IncomingMessage): string {
  return `HTTP/1.1 ${res.statusCode ?? 502} ${res.statusMessage ?? ''}`.trimEnd();
}

/**
 * Serialize a backend response head as received, for writing onto a raw socket
 */
export function formatResponseHead(res: IncomingMessage): string {
  const lines = [statusLine(res)];
  for (let i = 0; i + 1 < res.rawHeaders.length; i += 2) {
    lines.push(`${res.rawHeaders[i]}: ${res.rawHeaders[i + 1]}`);
  }
  return `${lines.join('\r\n')}\r\n\r\n`;
}

export interface EnvironmentProxyHandlerOptions {
  environment: Environment;
  transport: Transport;
  /** Idle time allowed on a forwarded call before it is aborted */
  requestTimeoutMs?: number;
  logger?: Logger;
}

export class EnvironmentProxyHandler {
  readonly environmentId: string;
  private readonly environment: Environment;
  private readonly transport: Transport;
  private readonly proxy: ProxyServer;
  private readonly logger: Logger;
  private readonly outbound = new WeakMap<IncomingMessage, (proxyReq: ClientRequest) => void>();
  private disposed = false;

  constructor(options: EnvironmentProxyHandlerOptions) {
    this.environment = options.environment;
    this.environmentId = options.environment.id;
    this.transport = options.transport;
    this.logger = (options.logger ?? createServiceLogger({ component: 'proxy-handler' })).child({
      environmentId: this.environmentId,
      transport: this.transport.variant,
    });

    this.proxy = httpProxy.createProxyServer({
      target: this.transport.target,
      agent: this.transport.agent,
      changeOrigin: true,
      xfwd: false,
      proxyTimeout: options.requestTimeoutMs ?? 60_000,
    });

    this.proxy.on('proxyReq', (proxyReq, req) => {
      proxyReq.removeHeader('authorization');
      proxyReq.removeHeader('cookie');
      for (const [name, value] of Object.entries(this.credentialHeaders())) {
        proxyReq.setHeader(name, value);
      }
      this.outbound.get(req)?.(proxyReq);
    });

    this.proxy.on('error', (error) => {
      this.logger.warn('Unhandled proxy error', { error: error.message });
    });
  }

  get variant(): TransportVariant {
    return this.transport.variant;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Forward a plain HTTP call. Settles once the response has been fully
   * written or the client went away. Rejects only while nothing has been
   * sent, so the caller can still answer with an error.
   */
  async forward(req: IncomingMessage, res: ServerResponse, path: string, signal?: AbortSignal): Promise<void> {
    this.transport.preflight();
    if (signal?.aborted) {
      throw cancelled(this.environmentId);
    }

    req.url = path;

    await new Promise<void>((resolve, reject) => {
      let upstream: ClientRequest | undefined;
      let settled = false;

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        this.outbound.delete(req);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onAbort = (): void => {
        upstream?.destroy();
        if (res.headersSent) {
          res.destroy();
          finish();
        } else {
          finish(cancelled(this.environmentId));
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.outbound.set(req, (proxyReq) => {
        upstream = proxyReq;
      });

      res.once('close', () => {
        if (!res.writableFinished) {
          upstream?.destroy();
        }
        finish();
      });

      this.proxy.web(req, res, {}, (error) => {
        const mapped = toProxyError(this.environmentId, error);
        this.logger.debug('Forwarded call failed', { path, error: mapped.message });
        if (res.headersSent) {
          res.destroy(mapped);
          finish();
        } else {
          finish(mapped);
        }
      });
    });
  }

  /**
   * Issue the upgrade request over the same transport and, once the backend
   * switches protocols, relay bytes until either side closes or `signal`
   * aborts. A refused upgrade is relayed to the client before rejecting.
   */
  async upgrade(
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
    path: string,
    signal?: AbortSignal,
  ): Promise<void> {
    this.transport.preflight();
    if (signal?.aborted) {
      throw cancelled(this.environmentId);
    }

    const requested = headerValue(req.headers.upgrade) ?? '';
    const upstreamReq = this.request(req.method ?? 'GET', path, this.upstreamHeaders(req.headers));

    const [res, upstreamSocket, upstreamHead] = await new Promise<[IncomingMessage, Duplex, Buffer]>(
      (resolve, reject) => {
        const onAbort = (): void => {
          upstreamReq.destroy();
          reject(cancelled(this.environmentId));
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        upstreamReq.once('upgrade', (response, upstreamSocket, upstreamHead) => {
          signal?.removeEventListener('abort', onAbort);
          resolve([response, upstreamSocket, upstreamHead]);
        });
        upstreamReq.once('response', (response) => {
          signal?.removeEventListener('abort', onAbort);
          const status = response.statusCode ?? 502;
          this.relayRefusal(response, socket).then(
            () => reject(ProxyError.upgradeFailed(this.environmentId, `backend answered ${status}`, status)),
            reject,
          );
        });
        upstreamReq.once('error', (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(toProxyError(this.environmentId, error));
        });
        upstreamReq.end();
      },
    );

    const granted = headerValue(res.headers.upgrade) ?? '';
    if (granted.toLowerCase() !== requested.toLowerCase()) {
      socket.end(formatResponseHead(res));
      upstreamSocket.destroy();
      throw ProxyError.upgradeFailed(
        this.environmentId,
        `backend switched to "${granted}" instead of "${requested}"`,
        res.statusCode,
      );
    }

    socket.write(formatResponseHead(res));
    if (upstreamHead.length > 0) {
      socket.write(upstreamHead);
    }
    if (head.length > 0) {
      upstreamSocket.write(head);
    }

    this.logger.debug('Upgrade established', { path, protocol: granted });
    const failure = await relayBidirectional(socket, upstreamSocket, signal);
    if (failure) {
      this.logger.debug('Upgraded session ended with error', { path, error: failure.message });
    } else {
      this.logger.debug('Upgraded session closed', { path });
    }
  }

  /**
   * Lightweight liveness call over the same transport. Resolves with the
   * round-trip latency in milliseconds.
   */
  async probe(signal: AbortSignal): Promise<number> {
    this.transport.preflight();
    const path = this.transport.api === 'docker' ? '/_ping' : '/version';
    const started = Date.now();

    await new Promise<void>((resolve, reject) => {
      const req = this.request('GET', path, { ...this.credentialHeaders() }, signal);
      req.once('response', (res) => {
        res.resume();
        const status = res.statusCode ?? 0;
        if (status >= 200 && status < 300) {
          resolve();
        } else {
          reject(ProxyError.upstreamProtocolError(this.environmentId, `probe answered ${status}`));
        }
      });
      req.once('error', (error) => {
        reject(
          signal.aborted
            ? ProxyError.environmentUnreachable(this.environmentId, 'probe timed out', error)
            : toProxyError(this.environmentId, error),
        );
      });
      req.end();
    });

    return Date.now() - started;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.proxy.removeAllListeners();
    this.transport.dispose();
    this.logger.debug('Proxy handler disposed');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private credentialHeaders(): Record<string, string> {
    const credentials = this.environment.connection.credentials;
    const headers: Record<string, string> = { ...credentials?.headers };
    if (credentials?.bearerToken) {
      headers.authorization = `Bearer ${credentials.bearerToken}`;
    }
    return headers;
  }

  private upstreamHeaders(incoming: IncomingHttpHeaders): OutgoingHttpHeaders {
    const headers: OutgoingHttpHeaders = {};
    for (const [name, value] of Object.entries(incoming)) {
      if (value !== undefined && !STRIPPED_HEADERS.has(name)) {
        headers[name] = value;
      }
    }
    return { ...headers, ...this.credentialHeaders() };
  }

  private request(method: string, path: string, headers: OutgoingHttpHeaders, signal?: AbortSignal): ClientRequest {
    const { target, agent } = this.transport;
    const options: http.RequestOptions = {
      protocol: target.protocol,
      host: target.host,
      port: target.port,
      socketPath: target.socketPath,
      agent,
      method,
      path,
      headers,
      signal,
    };
    return target.protocol === 'https:' ? https.request(options) : http.request(options);
  }

  /**
   * Write a non-101 backend answer to the client socket and close it
   */
  private async relayRefusal(res: IncomingMessage, socket: Duplex): Promise<void> {
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of res) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      if (size + buffer.length > MAX_REFUSAL_BODY) {
        chunks.push(buffer.subarray(0, MAX_REFUSAL_BODY - size));
        size = MAX_REFUSAL_BODY;
        res.destroy();
        break;
      }
      chunks.push(buffer);
      size += buffer.length;
    }

    const lines = [statusLine(res)];
    for (let i = 0; i + 1 < res.rawHeaders.length; i += 2) {
      const name = res.rawHeaders[i] ?? '';
      const lower = name.toLowerCase();
      if (lower !== 'transfer-encoding' && lower !== 'content-length' && lower !== 'connection') {
        lines.push(`${name}: ${res.rawHeaders[i + 1]}`);
      }
    }
    lines.push(`Content-Length: ${size}`, 'Connection: close');

    socket.end(Buffer.concat([Buffer.from(`${lines.join('\r\n')}\r\n\r\n`), ...chunks]));
  }
}
