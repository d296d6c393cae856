import { pino } from 'pino';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { MemoryAccessStore } from '../src/access/memoryStore.js';
import { OfflineValidator } from '../src/access/offlineValidator.js';
import { ByteAccumulator } from '../src/protocol/byteAccumulator.js';
import { FrameCodec } from '../src/protocol/codec.js';
import { DeviceId } from '../src/protocol/deviceId.js';
import { formatMessage, parseMessage } from '../src/protocol/message.js';
import { AccessCoordinator, type DecisionEvent } from '../src/session/accessCoordinator.js';
import { DeviceSession, type SessionTransport } from '../src/session/deviceSession.js';
import { TurnstileController } from '../src/turnstile/controller.js';
import { TurnstileStateMachine } from '../src/turnstile/stateMachine.js';
import type { AccessRequest } from '../src/types.js';

const silent = pino({ level: 'silent' });
const codec = new FrameCodec();
const frame = (text: string): Buffer => codec.encode(parseMessage(text));

const REQUEST_TIME = '10/05/2025 12:46:06';

const controllers: TurnstileController[] = [];

afterEach(() => {
  controllers.splice(0).forEach((controller) => controller.close());
});

const harness = (options: { maxConsecutiveErrors?: number; onDecision?: (event: DecisionEvent) => void } = {}) => {
  const store = MemoryAccessStore.fromSeed({
    users: [
      { registration: 'T100', name: 'Ana' },
      { registration: 'T200', name: 'Rui' }
    ],
    cards: [
      { cardNumber: 'ABC123', registration: 'T100' },
      { cardNumber: 'DEF456', registration: 'T200' }
    ]
  });
  const machine = new TurnstileStateMachine();
  const turnstiles = new TurnstileController(machine, silent);
  controllers.push(turnstiles);
  const events: DecisionEvent[] = [];
  const coordinator = new AccessCoordinator({
    validator: new OfflineValidator(store),
    turnstiles,
    onDecision: (event) => {
      events.push(event);
      options.onDecision?.(event);
    },
    logger: silent
  });

  const written: Buffer[] = [];
  const transport: SessionTransport = { write: (bytes) => written.push(bytes), close: vi.fn() };
  const session = new DeviceSession(transport, {
    codec,
    coordinator,
    turnstiles,
    maxConsecutiveErrors: options.maxConsecutiveErrors ?? 3,
    logger: silent
  });

  const responses = (): string[] => {
    const buffer = new ByteAccumulator();
    written.forEach((bytes) => buffer.append(bytes));
    const texts: string[] = [];
    for (let result = codec.decode(buffer); result.kind === 'frame'; result = codec.decode(buffer)) {
      texts.push(formatMessage(result.message));
    }
    return texts;
  };

  return { store, machine, turnstiles, coordinator, events, transport, session, responses };
};

describe('DeviceSession', () => {
  it('answers a valid card with the grant for its direction and tracks the rotation', async () => {
    const { machine, session, responses, store } = harness();

    session.receive(frame(`01+REON+000+0]abc123]${REQUEST_TIME}]1]1]`));
    await session.drain();

    expect(responses()).toEqual(['01+REON+00+5]5]Acesso liberado]']);
    expect(machine.state(DeviceId.of(1))).toBe('WAITING_ROTATION');
    expect(store.listAccessLogs()).toHaveLength(1);

    session.receive(frame(`01+REON+000+80]]${REQUEST_TIME}]1]0]`));
    session.receive(frame(`01+REON+000+81]]${REQUEST_TIME}]1]0]`));
    await session.drain();

    expect(machine.state(DeviceId.of(1))).toBe('IDLE');
    expect(machine.history(DeviceId.of(1)).map((record) => record.event)).toEqual([
      'GRANT',
      'WAITING',
      'COMPLETED',
      'RESET'
    ]);
    expect(session.stats).toEqual({ framesReceived: 3, framesSent: 1, protocolErrors: 0, skippedBytes: 0 });
  });

  it('denies an unknown card and leaves the turnstile idle', async () => {
    const { machine, session, responses } = harness();

    session.receive(frame(`02+REON+000+0]999999]${REQUEST_TIME}]2]1]`));
    await session.drain();

    expect(responses()).toEqual(['02+REON+00+30]0]Cartao nao cadastrado]']);
    expect(machine.state(DeviceId.of(2))).toBe('IDLE');
  });

  it('answers a malformed access request with a plain denial', async () => {
    const { session, responses, events } = harness();

    session.receive(frame(`03+REON+000+0]abc123]${REQUEST_TIME}]`));
    session.receive(frame('03+REON+000+0]abc123]99/99/2025 00:00:00]1]1]'));
    await session.drain();

    expect(responses()).toEqual(['03+REON+00+30]0]Acesso negado]', '03+REON+00+30]0]Acesso negado]']);
    expect(events).toEqual([]);
  });

  it('keeps responses in request order across a burst', async () => {
    const { session, responses } = harness();

    session.receive(
      Buffer.concat([
        frame(`04+REON+000+0]NOPE01]${REQUEST_TIME}]1]1]`),
        frame(`05+REON+000+0]ABC123]${REQUEST_TIME}]0]1]`)
      ])
    );
    await session.drain();

    expect(responses()).toEqual(['04+REON+00+30]0]Cartao nao cadastrado]', '05+REON+00+1]5]Acesso liberado]']);
  });

  it('closes the connection after too many consecutive bad frames', () => {
    const { session, transport } = harness({ maxConsecutiveErrors: 3 });
    const corrupted = Buffer.from(frame('01+REON+RQ'));
    corrupted[2] = 0x39;

    session.receive(Buffer.concat([corrupted, corrupted]));
    expect(session.isClosed).toBe(false);
    session.receive(corrupted);

    expect(session.isClosed).toBe(true);
    expect(transport.close).toHaveBeenCalledWith('too many consecutive protocol errors');
    expect(session.stats.protocolErrors).toBe(3);
  });

  it('resets the error streak on a good frame', () => {
    const { session, transport } = harness({ maxConsecutiveErrors: 2 });
    const corrupted = Buffer.from(frame('01+REON+RQ'));
    corrupted[2] = 0x39;

    session.receive(Buffer.concat([corrupted, frame('01+REON+RQ'), corrupted]));

    expect(session.isClosed).toBe(false);
    expect(transport.close).not.toHaveBeenCalled();
  });

  it('counts bytes skipped between frames', () => {
    const { session } = harness();
    session.receive(Buffer.concat([Buffer.from('junk', 'ascii'), frame('01+REON+RQ')]));
    expect(session.stats.skippedBytes).toBe(4);
  });

  it('survives a status that does not fit the turnstile state', async () => {
    const { machine, session, responses } = harness();

    session.receive(frame(`01+REON+000+81]]${REQUEST_TIME}]1]0]`));
    await session.drain();

    expect(machine.state(DeviceId.of(1))).toBe('IDLE');
    expect(responses()).toEqual([]);
  });

  it('does not answer management traffic or decisions echoed by a device', async () => {
    const { session, responses } = harness();

    session.receive(Buffer.concat([frame('01+REON+RC]1]'), frame('01+REON+00+1]5]x]'), frame('01+REON+RQ')]));
    await session.drain();

    expect(responses()).toEqual([]);
    expect(session.stats.framesReceived).toBe(3);
  });

  it('serialises a web request and a device frame for the same turnstile', async () => {
    const { machine, coordinator, session, responses, store } = harness();

    const web = coordinator.handle(
      DeviceId.of(1),
      { credential: 'DEF456', timestamp: new Date('2025-05-10T12:46:00Z'), direction: 'ENTRY', readerType: 'CARD' },
      'web'
    );
    session.receive(frame(`01+REON+000+0]ABC123]${REQUEST_TIME}]1]1]`));
    await session.drain();

    expect(formatMessage((await web).response)).toBe('01+REON+00+5]5]Acesso liberado]');
    expect(responses()).toEqual(['01+REON+00+5]5]Acesso liberado]']);
    expect(machine.history(DeviceId.of(1)).map((record) => record.event)).toEqual([
      'GRANT',
      'TIMEOUT',
      'RESET',
      'GRANT'
    ]);
    expect(store.listAccessLogs().filter((log) => log.granted)).toHaveLength(2);
  });

  it('answers with a denial when handling the request fails', async () => {
    const { session, responses } = harness({
      onDecision: () => {
        throw new Error('history unavailable');
      }
    });

    session.receive(frame(`01+REON+000+0]ABC123]${REQUEST_TIME}]1]1]`));
    await session.drain();

    expect(responses()).toEqual(['01+REON+00+30]0]Acesso negado]']);
  });

  it('ignores input after close', async () => {
    const { session, responses } = harness();
    session.close();
    session.receive(frame(`01+REON+000+0]abc123]${REQUEST_TIME}]1]1]`));
    await session.drain();
    expect(responses()).toEqual([]);
  });
});

describe('AccessCoordinator', () => {
  it('denies when the validator fails and reports the event', async () => {
    const { turnstiles } = harness();
    const events: DecisionEvent[] = [];
    const coordinator = new AccessCoordinator({
      validator: { validate: () => Promise.reject(new Error('store down')) },
      turnstiles,
      onDecision: (event) => events.push(event),
      logger: silent
    });

    const outcome = await coordinator.handle(
      DeviceId.of(9),
      { credential: 'ABC123', timestamp: new Date('2025-05-10T12:00:00Z'), direction: 'ENTRY', readerType: 'CARD' },
      'web'
    );

    expect(outcome.decision).toEqual({
      decision: 'DENIED',
      reason: 'VALIDATION_ERROR',
      displayMessage: 'Acesso negado',
      source: 'offline'
    });
    expect(events).toEqual([
      {
        deviceId: '09',
        credential: 'ABC123',
        direction: 'ENTRY',
        readerType: 'CARD',
        source: 'web',
        decision: 'DENIED',
        reason: 'VALIDATION_ERROR',
        displayMessage: 'Acesso negado',
        decidedBy: null,
        response: '09+REON+00+30]0]Acesso negado]',
        timestamp: '2025-05-10T12:00:00.000Z'
      }
    ]);
  });

  it('closes a stale rotation before granting again', async () => {
    const { machine, turnstiles } = harness();
    const coordinator = new AccessCoordinator({
      validator: {
        validate: async (request) => ({
          decision: 'GRANTED',
          displayMessage: 'Acesso liberado',
          direction: request.direction,
          readerType: request.readerType,
          source: 'online'
        })
      },
      turnstiles,
      responseOptions: { grantDisplaySeconds: 7 },
      logger: silent
    });
    const device = DeviceId.of(1);
    const request: AccessRequest = {
      credential: 'ABC123',
      timestamp: new Date('2025-05-10T12:00:00Z'),
      direction: 'EXIT',
      readerType: 'CARD'
    };

    await coordinator.handle(device, request, 'device');
    const second = await coordinator.handle(device, request, 'device');

    expect(formatMessage(second.response)).toBe('01+REON+00+6]7]Acesso liberado]');
    expect(machine.history(device).map((record) => record.event)).toEqual(['GRANT', 'TIMEOUT', 'RESET', 'GRANT']);
  });
});
