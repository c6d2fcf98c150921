/**
 * Agent Command
 *
 * Runs the edge agent next to a Docker daemon or Kubernetes API.
 * @module @tidewater/cli/commands/agent
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ValidationError, parseDuration, toError, type ValidationErrorDetail } from '@tidewater/shared';
import type { EdgeAgentConfig } from '@tidewater/agent';
import { error, info, success, warn } from '../output.js';

export interface AgentOptions {
  server?: string;
  environment?: string;
  edgeKey?: string;
  allow?: string[];
  dialTimeout?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Build the agent configuration from flags, falling back to
 * TIDEWATER_SERVER_URL, TIDEWATER_ENVIRONMENT_ID and EDGE_KEY.
 */
export function toAgentConfig(options: AgentOptions, env: Env = process.env): EdgeAgentConfig {
  const serverUrl = options.server ?? env.TIDEWATER_SERVER_URL;
  const environmentId = options.environment ?? env.TIDEWATER_ENVIRONMENT_ID;
  const edgeKey = options.edgeKey ?? env.EDGE_KEY;

  if (!serverUrl || !environmentId || !edgeKey) {
    const missing: ValidationErrorDetail[] = [];
    if (!serverUrl) missing.push(...ValidationError.required('server').details);
    if (!environmentId) missing.push(...ValidationError.required('environment').details);
    if (!edgeKey) missing.push(...ValidationError.required('edgeKey').details);
    throw ValidationError.multiple(missing);
  }
  if (!/^wss?:\/\//.test(serverUrl)) {
    throw ValidationError.invalidFormat('server', 'ws:// or wss:// URL', serverUrl);
  }

  const config: EdgeAgentConfig = {
    serverUrl,
    environmentId,
    edgeKey,
    allowedTargets: options.allow,
  };

  if (options.dialTimeout !== undefined) {
    const timeout = parseDuration(options.dialTimeout);
    if (timeout === null || timeout <= 0) {
      throw ValidationError.invalidFormat('dialTimeout', 'duration such as 10s', options.dialTimeout);
    }
    config.dialTimeoutMs = timeout;
  }

  return config;
}

async function agentHandler(options: AgentOptions): Promise<void> {
  let config: EdgeAgentConfig;
  try {
    config = toAgentConfig(options);
  } catch (err) {
    error(toError(err).message);
    process.exit(1);
  }

  const { EdgeAgent } = await import('@tidewater/agent');
  const agent = new EdgeAgent(config);

  agent.on((event, data) => {
    switch (event) {
      case 'connected':
        success(`Tunnel established for ${chalk.cyan(config.environmentId)}`);
        break;
      case 'disconnected':
        warn('Tunnel closed');
        break;
      case 'rejected':
        error('Handshake rejected', data);
        break;
      case 'reconnecting':
        info('Reconnecting…');
        break;
    }
  });

  const shutdown = async (signal: string): Promise<void> => {
    console.log(chalk.yellow(`\nReceived ${signal}, stopping agent…`));
    await agent.stop();
    process.exit(0);
  };
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  info(`Connecting to ${chalk.cyan(config.serverUrl)}…`);
  try {
    await agent.start();
  } catch (err) {
    const fatal = agent.getFatalRejection();
    if (fatal) {
      error(`Agent stopped: ${fatal.message}`);
      process.exit(1);
    }
    // Retriable failures keep reconnecting in the background
    warn(`First connection failed: ${toError(err).message}`);
  }
}

export function createAgentCommand(): Command {
  return new Command('agent')
    .description('Run the edge agent: dial out to the tunnel server and serve sub-connections')
    .option('-s, --server <url>', 'Tunnel server URL (ws://host:8000)')
    .option('-e, --environment <id>', 'Environment id registered on the control plane')
    .option('-k, --edge-key <key>', 'Edge key for the environment')
    .option('--allow <targets...>', 'Targets sub-connections may open (default: any)')
    .option('--dial-timeout <duration>', 'Local connect timeout (default: 10s)')
    .action(agentHandler);
}
