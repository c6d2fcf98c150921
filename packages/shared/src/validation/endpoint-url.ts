/**
 * Endpoint URL and tunnel target parsing
 * @module @tidewater/shared/validation/endpoint-url
 */

/**
 * A parsed endpoint address
 */
export type EndpointAddress =
  | { protocol: 'unix'; socketPath: string }
  | { protocol: 'npipe'; socketPath: string }
  | { protocol: 'tcp' | 'http' | 'https'; host: string; port: number };

const DEFAULT_PORTS: Record<'tcp' | 'http' | 'https', number> = {
  tcp: 2375,
  http: 80,
  https: 443,
};

/**
 * Parse an endpoint URL. Returns null for unsupported protocols or malformed input.
 *
 * `npipe:////./pipe/docker_engine` maps to the Windows pipe path
 * `\\.\pipe\docker_engine`.
 */
export function parseEndpointUrl(url: string): EndpointAddress | null {
  const trimmed = url.trim();

  if (trimmed.startsWith('unix://')) {
    const socketPath = trimmed.slice('unix://'.length);
    return socketPath.length > 0 ? { protocol: 'unix', socketPath } : null;
  }

  if (trimmed.startsWith('npipe://')) {
    const raw = trimmed.slice('npipe://'.length);
    if (raw.length === 0) return null;
    const socketPath = raw.startsWith('//') ? raw.replace(/\//g, '\\') : raw;
    return { protocol: 'npipe', socketPath };
  }

  const match = /^(tcp|http|https):\/\/([^/:]+|\[[^\]]+\])(?::(\d+))?\/?$/.exec(trimmed);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }

  const protocol = match[1];
  if (protocol !== 'tcp' && protocol !== 'http' && protocol !== 'https') {
    return null;
  }

  const port = match[3] !== undefined ? Number.parseInt(match[3], 10) : DEFAULT_PORTS[protocol];
  if (port < 1 || port > 65535) {
    return null;
  }

  return { protocol, host: match[2].replace(/^\[|\]$/g, ''), port };
}

/**
 * A place a tunnel sub-connection opens to, inside the agent's network
 */
export type TunnelTarget =
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'socket'; path: string };

/**
 * Parse a tunnel target: `tcp://host:port`, `host:port`, `unix:///path` or `npipe:///path`
 */
export function parseTunnelTarget(target: string): TunnelTarget | null {
  const trimmed = target.trim();

  if (trimmed.startsWith('unix://') || trimmed.startsWith('npipe://')) {
    const address = parseEndpointUrl(trimmed);
    return address && (address.protocol === 'unix' || address.protocol === 'npipe')
      ? { kind: 'socket', path: address.socketPath }
      : null;
  }

  const bare = trimmed.startsWith('tcp://') ? trimmed.slice('tcp://'.length) : trimmed;
  const match = /^([^/:]+|\[[^\]]+\]):(\d+)$/.exec(bare);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return null;
  }

  const port = Number.parseInt(match[2], 10);
  if (port < 1 || port > 65535) {
    return null;
  }

  return { kind: 'tcp', host: match[1].replace(/^\[|\]$/g, ''), port };
}

/**
 * Render a tunnel target back to its canonical string form
 */
export function formatTunnelTarget(target: TunnelTarget): string {
  return target.kind === 'socket'
    ? `unix://${target.path}`
    : `tcp://${target.host.includes(':') ? `[${target.host}]` : target.host}:${target.port}`;
}
