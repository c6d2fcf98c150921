/**
 * Unit tests for the multiplexed tunnel channel
 */

import { describe, it, expect, afterEach } from 'vitest';

import { MuxChannel, type IncomingStream, type IncomingStreamHandler } from '../../src/tunnel/mux-channel.js';
import type { TunnelStream } from '../../src/tunnel/tunnel-stream.js';
import {
  CloseFlag,
  FrameType,
  STREAM_WINDOW_BYTES,
  decodeFrame,
  decodeStreamError,
  encodeClose,
  encodeFrame,
  encodeOpen,
} from '../../src/tunnel/frames.js';
import { ErrorCode, isTidewaterError } from '../../src/errors/base-error.js';

const channels: MuxChannel[] = [];

function createPair(agentHandler?: IncomingStreamHandler, serverHandler?: IncomingStreamHandler) {
  let server: MuxChannel | undefined;
  let agent: MuxChannel | undefined;
  server = new MuxChannel({
    role: 'server',
    environmentId: 'edge-1',
    send: (frame) => setImmediate(() => agent?.receive(frame)),
    onIncoming: serverHandler,
  });
  agent = new MuxChannel({
    role: 'agent',
    send: (frame) => setImmediate(() => server?.receive(frame)),
    onIncoming: agentHandler,
  });
  channels.push(server, agent);
  return { server, agent };
}

function echo(errors: Error[] = []): IncomingStreamHandler {
  return (incoming) => {
    const stream = incoming.accept();
    if (!stream) return;
    stream.on('error', (error) => errors.push(error));
    stream.on('data', (chunk: Buffer) => stream.write(chunk));
    stream.on('end', () => stream.end());
  };
}

function readAll(stream: TunnelStream): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => resolve(Buffer.concat(chunks).toString()));
    stream.on('error', reject);
  });
}

function errorCodeOf(error: unknown): ErrorCode | undefined {
  return isTidewaterError(error) ? error.code : undefined;
}

afterEach(() => {
  for (const channel of channels.splice(0)) {
    channel.close('test done');
  }
});

describe('MuxChannel', () => {
  it('round-trips data over a server-opened stream', async () => {
    const { server } = createPair(echo());

    const stream = await server.connect('tcp://127.0.0.1:2375');
    const reply = readAll(stream);
    stream.end('hello');

    expect(await reply).toBe('hello');
    expect(stream.streamId).toBe(1);
  });

  it('holds writes until the open is acknowledged', async () => {
    const { server } = createPair((incoming) => {
      setTimeout(() => echo()(incoming), 20);
    });

    const stream = server.open('tcp://127.0.0.1:2375');
    const reply = readAll(stream);
    stream.write('early ');
    stream.end('bird');

    expect(stream.isAcknowledged).toBe(false);
    expect(await reply).toBe('early bird');
  });

  it('refuses peer opens without a handler', async () => {
    const { server } = createPair();

    const error = await server.connect('tcp://127.0.0.1:2375').catch((e: unknown) => e);
    expect(errorCodeOf(error)).toBe(ErrorCode.SUB_CONNECTION_FAILED);
    expect(error instanceof Error && error.message).toBe(
      'Sub-connection 1 failed: POLICY_DENIED: peer-initiated streams are not accepted',
    );
  });

  it('surfaces dial failures from the agent', async () => {
    const { server } = createPair((incoming) => incoming.reject('DIAL_FAILED', 'connection refused'));

    const error = await server.connect('tcp://127.0.0.1:1').catch((e: unknown) => e);
    expect(error instanceof Error && error.message).toBe('Sub-connection 1 failed: DIAL_FAILED: connection refused');
  });

  it('times out opens that are never acknowledged', async () => {
    const { server } = createPair(() => undefined);

    const error = await server.connect('tcp://127.0.0.1:2375', { timeoutMs: 30 }).catch((e: unknown) => e);
    expect(errorCodeOf(error)).toBe(ErrorCode.TUNNEL_DIAL_TIMEOUT);
    expect(server.openStreams).toBe(0);
  });

  it('cancels one stream without disturbing its siblings', async () => {
    const agentErrors: Error[] = [];
    const { server } = createPair(echo(agentErrors));

    const doomed = await server.connect('tcp://127.0.0.1:2375');
    const survivor = await server.connect('tcp://127.0.0.1:2375');
    const doomedClosed = new Promise((resolve) => doomed.once('close', resolve));

    doomed.destroy();
    await doomedClosed;

    const reply = readAll(survivor);
    survivor.end('still here');
    expect(await reply).toBe('still here');
    expect(server.isClosed).toBe(false);
    expect(agentErrors.map((e) => e.message)).toEqual(['Sub-connection 1 failed: reset by peer']);
  });

  it('fails every open stream when the channel closes', async () => {
    const { server } = createPair(echo());
    const stream = await server.connect('tcp://127.0.0.1:2375');
    const failure = new Promise<unknown>((resolve) => stream.once('error', resolve));

    server.close('heartbeat lost');

    expect(errorCodeOf(await failure)).toBe(ErrorCode.TUNNEL_LOST);
    expect(server.openStreams).toBe(0);
  });

  it('gives agent-opened streams even ids', async () => {
    const seen: number[] = [];
    const { agent } = createPair(undefined, (incoming) => {
      seen.push(incoming.streamId);
      echo()(incoming);
    });

    const stream = await agent.connect('tcp://10.0.0.1:80');
    const reply = readAll(stream);
    stream.end('ping');

    expect(await reply).toBe('ping');
    expect(seen).toEqual([2]);
  });

  it('answers data for unknown streams with UNKNOWN_STREAM', () => {
    const sent: Buffer[] = [];
    const channel = new MuxChannel({ role: 'server', send: (frame) => sent.push(frame) });
    channels.push(channel);

    channel.receive(encodeFrame(FrameType.DATA, 4, Buffer.from('x')));

    const frame = sent[0] ? decodeFrame(sent[0]) : null;
    expect(frame?.type).toBe(FrameType.ERROR);
    expect(frame?.streamId).toBe(4);
    expect(frame && decodeStreamError(frame.payload).code).toBe('UNKNOWN_STREAM');
  });

  it('rejects opens with the wrong id parity', () => {
    const sent: Buffer[] = [];
    const channel = new MuxChannel({ role: 'server', send: (frame) => sent.push(frame), onIncoming: echo() });
    channels.push(channel);

    channel.receive(encodeOpen(3, 'tcp://127.0.0.1:1'));

    const frame = sent[0] ? decodeFrame(sent[0]) : null;
    expect(frame && decodeStreamError(frame.payload).code).toBe('PROTOCOL_ERROR');
  });

  it('stops a writer at the window while the reader is paused', async () => {
    const accepted: TunnelStream[] = [];
    const { server } = createPair((incoming) => {
      const stream = incoming.accept();
      if (stream) accepted.push(stream);
    });
    const stream = await server.connect('tcp://127.0.0.1:2375');
    const mib = Buffer.alloc(1024 * 1024, 1);
    for (let i = 0; i < 32; i++) stream.write(mib);
    stream.end();

    await new Promise((resolve) => setTimeout(resolve, 50));
    const [reader] = accepted;
    if (!reader) throw new Error('stream was not accepted');

    expect(reader.readableLength).toBe(STREAM_WINDOW_BYTES);
    expect(stream.availableCredit).toBe(0);
    expect(stream.writableLength).toBe(32 * 1024 * 1024);

    let received = 0;
    reader.on('data', (chunk: Buffer) => {
      received += chunk.length;
    });
    await new Promise((resolve) => reader.once('end', resolve));
    expect(received).toBe(32 * 1024 * 1024);
  });

  it('resets a stream whose peer overruns the window', async () => {
    const sent: Buffer[] = [];
    const errors: Error[] = [];
    const channel = new MuxChannel({
      role: 'agent',
      send: (frame) => sent.push(frame),
      onIncoming: (incoming) => {
        incoming.accept()?.on('error', (error) => errors.push(error));
      },
    });
    channels.push(channel);

    channel.receive(encodeOpen(1, 'tcp://127.0.0.1:2375'));
    channel.receive(encodeFrame(FrameType.DATA, 1, Buffer.alloc(STREAM_WINDOW_BYTES + 1)));

    expect(sent.map((frame) => [...frame])).toEqual([
      [FrameType.OPEN_ACK, 0, 0, 0, 1],
      [FrameType.CLOSE, 0, 0, 0, 1, CloseFlag.RST],
    ]);
    expect(channel.openStreams).toBe(0);
    await new Promise((resolve) => setImmediate(resolve));
    expect(errors.map((error) => error.message)).toEqual(['Sub-connection 1 failed: flow control window exceeded']);
  });

  it('drops malformed frames and keeps serving the channel', () => {
    const sent: Buffer[] = [];
    const channel = new MuxChannel({
      role: 'agent',
      send: (frame) => sent.push(frame),
      onIncoming: (incoming) => {
        incoming.accept();
      },
    });
    channels.push(channel);

    channel.receive(Buffer.from([FrameType.DATA, 0]));
    channel.receive(Buffer.from([99, 0, 0, 0, 1]));
    expect(sent).toEqual([]);
    expect(channel.isClosed).toBe(false);

    channel.receive(encodeOpen(1, 'tcp://127.0.0.1:2375'));
    expect(sent.map((frame) => [...frame])).toEqual([[FrameType.OPEN_ACK, 0, 0, 0, 1]]);
    expect(channel.openStreams).toBe(1);
  });

  it('forgets a peer open cancelled before the handler settles', () => {
    const sent: Buffer[] = [];
    const waiting: IncomingStream[] = [];
    const channel = new MuxChannel({
      role: 'server',
      send: (frame) => sent.push(frame),
      onIncoming: (incoming) => waiting.push(incoming),
    });
    channels.push(channel);

    channel.receive(encodeOpen(2, 'tcp://127.0.0.1:2375'));
    expect(channel.pendingOpens).toBe(1);

    channel.receive(encodeClose(2, CloseFlag.RST));
    expect(channel.pendingOpens).toBe(0);
    expect(waiting[0]?.accept()).toBeNull();
    expect(sent).toEqual([]);
  });
});
