/**
 * CLI Commands
 * @module @tidewater/cli/commands
 */

export { createServeCommand, toServeOverrides, type ServeOptions } from './serve.js';
export { createAgentCommand, toAgentConfig, type AgentOptions } from './agent.js';
export {
  createEndpointsCommand,
  createTunnelsCommand,
  parseEnvironments,
  parseTunnels,
  type EnvironmentRow,
  type TunnelRow,
} from './endpoints.js';
