/**
 * Endpoint Commands
 *
 * Read-only views of registered environments and active tunnels.
 * @module @tidewater/cli/commands/endpoints
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { isRecord, toError } from '@tidewater/shared';
import { createApiClient, type ApiClient } from '../api-client.js';
import { error, getOutputFormat, keyValue, relativeTime, statusBadge, table } from '../output.js';

// ============================================================================
// Response parsing
// ============================================================================

export interface EnvironmentRow {
  id: string;
  name: string;
  kind: string;
  edge: boolean;
  status: string;
  lastProbeAt: string | null;
}

export interface TunnelRow {
  tunnelId: string;
  environmentId: string;
  state: string;
  establishedAt: string;
  lastHeartbeatAt: string;
  openStreams: number;
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function nullableString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' ? value : null;
}

function listField(body: unknown, key: string): Record<string, unknown>[] {
  if (!isRecord(body)) {
    throw new Error('Unexpected response from control plane');
  }
  const list = body[key];
  if (!Array.isArray(list)) {
    throw new Error(`Response is missing "${key}"`);
  }
  return list.filter(isRecord);
}

export function parseEnvironments(body: unknown): EnvironmentRow[] {
  return listField(body, 'environments').map((item) => ({
    id: stringField(item, 'id'),
    name: stringField(item, 'name'),
    kind: stringField(item, 'kind'),
    edge: item.edge === true,
    status: stringField(item, 'status') || 'unknown',
    lastProbeAt: nullableString(item, 'lastProbeAt'),
  }));
}

export function parseTunnels(body: unknown): TunnelRow[] {
  return listField(body, 'tunnels').map((item) => ({
    tunnelId: stringField(item, 'tunnelId'),
    environmentId: stringField(item, 'environmentId'),
    state: stringField(item, 'state'),
    establishedAt: stringField(item, 'establishedAt'),
    lastHeartbeatAt: stringField(item, 'lastHeartbeatAt'),
    openStreams: typeof item.openStreams === 'number' ? item.openStreams : 0,
  }));
}

// ============================================================================
// Handlers
// ============================================================================

interface ConnectionOptions {
  apiUrl?: string;
  token?: string;
}

function clientFor(command: Command): ApiClient {
  const opts = command.optsWithGlobals();
  const connection: ConnectionOptions = {
    apiUrl: typeof opts.apiUrl === 'string' ? opts.apiUrl : undefined,
    token: typeof opts.token === 'string' ? opts.token : undefined,
  };
  return createApiClient(connection);
}

async function listHandler(_options: unknown, command: Command): Promise<void> {
  try {
    const environments = parseEnvironments(await clientFor(command).get('/api/endpoints'));
    table(environments, [
      { key: 'id', header: 'ID' },
      { key: 'name', header: 'NAME' },
      { key: 'kind', header: 'KIND' },
      { key: 'status', header: 'STATUS', format: (_value, row) => statusBadge(row.status) },
      {
        key: 'lastProbeAt',
        header: 'LAST PROBE',
        format: (_value, row) => (row.lastProbeAt ? relativeTime(row.lastProbeAt) : chalk.gray('never')),
      },
    ]);
  } catch (err) {
    error(`Failed to list environments: ${toError(err).message}`);
    process.exit(1);
  }
}

async function statusHandler(environmentId: string, _options: unknown, command: Command): Promise<void> {
  try {
    const body = await clientFor(command).get(`/api/endpoints/${encodeURIComponent(environmentId)}/status`);
    if (getOutputFormat() === 'json' || !isRecord(body)) {
      console.log(JSON.stringify(body, null, 2));
      return;
    }

    console.log(`${chalk.bold(stringField(body, 'name') || environmentId)}  ${statusBadge(stringField(body, 'status'))}`);
    console.log();
    keyValue({
      ID: body.id,
      Kind: body.kind,
      Edge: body.edge,
      'Last probe': body.lastProbeAt,
      'Last change': body.lastStatusChangeAt,
    });

    const probe = body.probe;
    if (isRecord(probe)) {
      console.log();
      console.log(chalk.bold('Probe'));
      keyValue({
        Failures: probe.consecutiveFailures,
        Latency: typeof probe.lastProbeLatencyMs === 'number' ? `${probe.lastProbeLatencyMs}ms` : null,
        'Last error': probe.lastError,
      });
    }

    const tunnel = body.tunnel;
    if (isRecord(tunnel)) {
      console.log();
      console.log(chalk.bold('Tunnel'));
      keyValue({
        ID: tunnel.tunnelId,
        State: tunnel.state,
        Established: tunnel.establishedAt,
        'Open streams': tunnel.openStreams,
        Agent: tunnel.agentVersion,
      });
    }
  } catch (err) {
    error(`Failed to get environment status: ${toError(err).message}`);
    process.exit(1);
  }
}

async function tunnelsHandler(_options: unknown, command: Command): Promise<void> {
  try {
    const tunnels = parseTunnels(await clientFor(command).get('/api/tunnels'));
    table(tunnels, [
      { key: 'environmentId', header: 'ENVIRONMENT' },
      { key: 'tunnelId', header: 'TUNNEL' },
      { key: 'state', header: 'STATE', format: (_value, row) => statusBadge(row.state) },
      { key: 'openStreams', header: 'STREAMS' },
      { key: 'lastHeartbeatAt', header: 'HEARTBEAT', format: (_value, row) => relativeTime(row.lastHeartbeatAt) },
    ]);
  } catch (err) {
    error(`Failed to list tunnels: ${toError(err).message}`);
    process.exit(1);
  }
}

// ============================================================================
// Commands
// ============================================================================

export function createEndpointsCommand(): Command {
  const endpoints = new Command('endpoints')
    .description('Inspect registered environments')
    .option('-t, --token <token>', 'API token (default: TIDEWATER_API_TOKEN)');

  endpoints
    .command('list')
    .alias('ls')
    .description('List environments and their status')
    .action(listHandler);

  endpoints
    .command('status <environmentId>')
    .description('Show probe and tunnel details for an environment')
    .action(statusHandler);

  return endpoints;
}

export function createTunnelsCommand(): Command {
  return new Command('tunnels')
    .description('List active agent tunnels')
    .option('-t, --token <token>', 'API token (default: TIDEWATER_API_TOKEN)')
    .action(tunnelsHandler);
}
