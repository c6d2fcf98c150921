/**
 * Edge agent
 * @module @tidewater/agent
 */

export {
  EdgeAgent,
  DEFAULT_RECONNECT_POLICY,
  computeBackoff,
  isFatalRejection,
  type EdgeAgentConfig,
  type EdgeAgentEvent,
  type EdgeAgentEventHandler,
  type AgentState,
  type ReconnectPolicy,
} from './edge-agent.js';

export { TargetPolicy, dialTarget, splice, type Dialer } from './dialer.js';
