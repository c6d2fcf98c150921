#!/usr/bin/env node
/**
 * Tidewater CLI
 *
 * Runs the control plane or the edge agent, and inspects a running control
 * plane over its HTTP API.
 * @module @tidewater/cli
 */

import { Command } from 'commander';
import { isOutputFormat, setOutputFormat } from './output.js';
import {
  createAgentCommand,
  createEndpointsCommand,
  createServeCommand,
  createTunnelsCommand,
} from './commands/index.js';

const VERSION = '0.1.0';

const DESCRIPTION = `
Tidewater

Reverse proxy for Docker and Kubernetes APIs, reached directly or through
agent tunnels.

Commands:
  serve       Run the control plane
  agent       Run the edge agent
  endpoints   Inspect environments (list, status)
  tunnels     List active tunnels

Examples:
  $ tidewater serve -H unix:///var/run/docker.sock
  $ tidewater agent -s ws://control:8000 -e edge-1 -k $EDGE_KEY
  $ tidewater endpoints list
`;

function createProgram(): Command {
  const program = new Command();

  program
    .name('tidewater')
    .version(VERSION, '-v, --version', 'Display CLI version')
    .description(DESCRIPTION)
    .option('-o, --output <format>', 'Output format: json, table', 'table')
    .option('--api-url <url>', 'Control plane URL (default: TIDEWATER_API_URL or http://127.0.0.1:9000)')
    .option('--no-color', 'Disable colored output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      const format: unknown = opts.output;
      if (!isOutputFormat(format)) {
        throw new Error(`Unknown output format: ${String(format)}`);
      }
      setOutputFormat(format);

      if (opts.color === false) {
        process.env.FORCE_COLOR = '0';
      }
    });

  program.addCommand(createServeCommand());
  program.addCommand(createAgentCommand());
  program.addCommand(createEndpointsCommand());
  program.addCommand(createTunnelsCommand());

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof Error) {
      console.error('Error:', err.message);
    }
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
