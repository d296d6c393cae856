import { connect, type Socket } from 'node:net';
import { pino } from 'pino';
import { afterEach, describe, expect, it } from 'vitest';

import { MemoryAccessStore } from '../src/access/memoryStore.js';
import { OfflineValidator } from '../src/access/offlineValidator.js';
import { ByteAccumulator } from '../src/protocol/byteAccumulator.js';
import { FrameCodec } from '../src/protocol/codec.js';
import { formatMessage, parseMessage } from '../src/protocol/message.js';
import { AccessCoordinator } from '../src/session/accessCoordinator.js';
import { TurnstileServer } from '../src/session/turnstileServer.js';
import { TurnstileController } from '../src/turnstile/controller.js';
import { TurnstileStateMachine } from '../src/turnstile/stateMachine.js';

const silent = pino({ level: 'silent' });
const codec = new FrameCodec();

const open: { server?: TurnstileServer; turnstiles?: TurnstileController; sockets: Socket[] } = { sockets: [] };

afterEach(async () => {
  open.sockets.splice(0).forEach((socket) => socket.destroy());
  open.turnstiles?.close();
  await open.server?.close();
  open.server = undefined;
  open.turnstiles = undefined;
});

const startServer = async (maxConnections = 4) => {
  const store = MemoryAccessStore.fromSeed({
    users: [{ registration: 'T100' }],
    cards: [{ cardNumber: 'ABC123', registration: 'T100' }]
  });
  const turnstiles = new TurnstileController(new TurnstileStateMachine(), silent);
  const coordinator = new AccessCoordinator({ validator: new OfflineValidator(store), turnstiles, logger: silent });
  const server = new TurnstileServer({
    host: '127.0.0.1',
    port: 0,
    maxConnections,
    idleTimeoutMs: 0,
    session: { codec, coordinator, turnstiles, maxConsecutiveErrors: 5 },
    logger: silent
  });
  open.server = server;
  open.turnstiles = turnstiles;
  const address = await server.listen();
  return { server, port: address.port };
};

const dial = (port: number): Promise<Socket> =>
  new Promise((resolve, reject) => {
    const socket = connect(port, '127.0.0.1', () => resolve(socket));
    socket.once('error', reject);
    open.sockets.push(socket);
  });

const nextResponse = (socket: Socket): Promise<string> =>
  new Promise((resolve, reject) => {
    const buffer = new ByteAccumulator();
    const onData = (chunk: Buffer) => {
      buffer.append(chunk);
      const result = codec.decode(buffer);
      if (result.kind === 'frame') {
        socket.off('data', onData);
        resolve(formatMessage(result.message));
      } else if (result.kind === 'error') {
        socket.off('data', onData);
        reject(result.error);
      }
    };
    socket.on('data', onData);
  });

const waitFor = async (condition: () => boolean): Promise<void> => {
  for (let attempt = 0; attempt < 100 && !condition(); attempt += 1) {
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
};

describe('TurnstileServer', () => {
  it('answers an access request sent in two TCP writes', async () => {
    const { port } = await startServer();
    const socket = await dial(port);
    const request = codec.encode(parseMessage('01+REON+000+0]ABC123]10/05/2025 12:46:06]2]1]'));

    const response = nextResponse(socket);
    socket.write(request.subarray(0, 10));
    await new Promise((resolve) => setTimeout(resolve, 20));
    socket.write(request.subarray(10));

    expect(await response).toBe('01+REON+00+6]5]Acesso liberado]');
  });

  it('serves several readers at once', async () => {
    const { server, port } = await startServer();
    const first = await dial(port);
    const second = await dial(port);
    await waitFor(() => server.connectionCount === 2);

    const firstResponse = nextResponse(first);
    const secondResponse = nextResponse(second);
    first.write(codec.encode(parseMessage('01+REON+000+0]ABC123]10/05/2025 12:46:06]1]1]')));
    second.write(codec.encode(parseMessage('02+REON+000+0]NOPE01]10/05/2025 12:46:06]1]1]')));

    expect(await firstResponse).toBe('01+REON+00+5]5]Acesso liberado]');
    expect(await secondResponse).toBe('02+REON+00+30]0]Cartao nao cadastrado]');
    expect(server.connectionCount).toBe(2);
  });

  it('refuses connections over the limit', async () => {
    const { server, port } = await startServer(1);
    await dial(port);
    await waitFor(() => server.connectionCount === 1);

    const extra = await dial(port);
    const closed = new Promise<void>((resolve) => extra.once('close', () => resolve()));
    extra.on('error', () => undefined);

    await closed;
    expect(server.connectionCount).toBe(1);
  });

  it('forgets a reader once it disconnects', async () => {
    const { server, port } = await startServer();
    const socket = await dial(port);
    await waitFor(() => server.connectionCount === 1);

    socket.end();
    await waitFor(() => server.connectionCount === 0);
    expect(server.connectionCount).toBe(0);
  });
});
