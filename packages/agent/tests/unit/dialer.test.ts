/**
 * Unit tests for local dialing and byte splicing
 */

import { describe, it, expect, afterEach } from 'vitest';
import net from 'node:net';

import { TargetPolicy, dialTarget, splice } from '../../src/dialer.js';

const servers: net.Server[] = [];

function listen(server: net.Server): Promise<number> {
  servers.push(server);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

/** Replies with everything it received, upper-cased, once the client ends */
function upperCaseServer(): net.Server {
  return net.createServer({ allowHalfOpen: true }, (socket) => {
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('end', () => socket.end(Buffer.concat(chunks).toString().toUpperCase()));
  });
}

async function closedPort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve()))),
  );
});

describe('TargetPolicy', () => {
  it('allows anything when empty', () => {
    const policy = new TargetPolicy();
    expect(policy.permits({ kind: 'tcp', host: '10.0.0.5', port: 2375 })).toBe(true);
    expect(policy.permits({ kind: 'socket', path: '/var/run/docker.sock' })).toBe(true);
  });

  it('matches normalized targets', () => {
    const policy = new TargetPolicy(['127.0.0.1:2375', 'tcp://kube.local:6443']);

    expect(policy.permits({ kind: 'tcp', host: '127.0.0.1', port: 2375 })).toBe(true);
    expect(policy.permits({ kind: 'tcp', host: 'kube.local', port: 6443 })).toBe(true);
    expect(policy.permits({ kind: 'tcp', host: '127.0.0.1', port: 2376 })).toBe(false);
    expect(policy.permits({ kind: 'socket', path: '/var/run/docker.sock' })).toBe(false);
  });

  it('rejects entries it cannot parse', () => {
    expect(() => new TargetPolicy(['docker'])).toThrow('Invalid allowed target: docker');
  });
});

describe('dialTarget', () => {
  it('connects over TCP', async () => {
    const port = await listen(net.createServer((socket) => socket.end()));

    const socket = await dialTarget({ kind: 'tcp', host: '127.0.0.1', port }, 1000);
    expect(socket.destroyed).toBe(false);
    socket.destroy();
  });

  it('rejects when nothing listens', async () => {
    const port = await closedPort();

    await expect(dialTarget({ kind: 'tcp', host: '127.0.0.1', port }, 1000)).rejects.toThrow(/ECONNREFUSED/);
  });
});

describe('splice', () => {
  it('forwards both directions with half-close', async () => {
    const backendPort = await listen(upperCaseServer());

    let spliced: Promise<Error | undefined> | undefined;
    const frontPort = await listen(
      net.createServer({ allowHalfOpen: true }, (socket) => {
        spliced = dialTarget({ kind: 'tcp', host: '127.0.0.1', port: backendPort }, 1000).then((backend) =>
          splice(socket, backend),
        );
      }),
    );

    const reply = await new Promise<string>((resolve, reject) => {
      const client = net.connect({ host: '127.0.0.1', port: frontPort, allowHalfOpen: true });
      const chunks: Buffer[] = [];
      client.on('data', (chunk: Buffer) => chunks.push(chunk));
      client.on('end', () => {
        client.destroy();
        resolve(Buffer.concat(chunks).toString());
      });
      client.on('error', reject);
      client.end('tidewater');
    });

    expect(reply).toBe('TIDEWATER');
    await expect(spliced).resolves.toBeUndefined();
  });

  it('reports a reset on either side', async () => {
    const backendPort = await listen(net.createServer((socket) => socket.resetAndDestroy()));

    let spliced: Promise<Error | undefined> | undefined;
    const frontPort = await listen(
      net.createServer({ allowHalfOpen: true }, (socket) => {
        spliced = dialTarget({ kind: 'tcp', host: '127.0.0.1', port: backendPort }, 1000).then((backend) =>
          splice(socket, backend),
        );
      }),
    );

    await new Promise<void>((resolve) => {
      const client = net.connect({ host: '127.0.0.1', port: frontPort });
      client.on('error', () => resolve());
      client.on('close', () => resolve());
    });

    const failure = await spliced;
    expect(failure).toBeInstanceOf(Error);
  });
});
