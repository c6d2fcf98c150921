/**
 * Installs a tunnel whose agent side lives in the same process and dials TCP
 * targets directly
 */

import net from 'node:net';
import { pipeline } from 'node:stream/promises';
import { MuxChannel, parseTunnelTarget } from '@tidewater/shared';
import type { Tunnel, TunnelStore } from '@tidewater/core';

export interface TunnelPair {
  tunnel: Tunnel;
  server: MuxChannel;
  agent: MuxChannel;
  /** Sub-connections the agent side has accepted */
  accepted: string[];
}

export function installTunnel(tunnels: TunnelStore, environmentId: string): TunnelPair {
  const accepted: string[] = [];
  const peers: { agent?: MuxChannel } = {};

  const server = new MuxChannel({
    role: 'server',
    environmentId,
    send: (frame) => setImmediate(() => peers.agent?.receive(frame)),
  });

  const agent = new MuxChannel({
    role: 'agent',
    environmentId,
    send: (frame) => setImmediate(() => server.receive(frame)),
    onIncoming: (incoming) => {
      const target = parseTunnelTarget(incoming.target);
      if (!target || target.kind !== 'tcp') {
        incoming.reject('PROTOCOL_ERROR', `unsupported target ${incoming.target}`);
        return;
      }
      const socket = net.connect({ host: target.host, port: target.port, allowHalfOpen: true });
      socket.once('error', (error) => incoming.reject('DIAL_FAILED', error.message));
      socket.once('connect', () => {
        const stream = incoming.accept();
        if (!stream) {
          socket.destroy();
          return;
        }
        accepted.push(incoming.target);
        void Promise.allSettled([pipeline(socket, stream), pipeline(stream, socket)]).then(() => {
          socket.destroy();
          stream.destroy();
        });
      });
    },
  });
  peers.agent = agent;

  const tunnel: Tunnel = {
    tunnelId: `tunnel-${environmentId}`,
    environmentId,
    channel: server,
    establishedAt: new Date(),
    lastHeartbeatAt: new Date(),
    state: 'active',
    close: (reason) => {
      server.close(reason);
      agent.close(reason);
    },
  };
  tunnels.install(tunnel);

  return { tunnel, server, agent, accepted };
}
