import type { Server } from 'node:http';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { buildAccessResponse } from '../src/protocol/accessPayloads.js';
import type { DeviceId } from '../src/protocol/deviceId.js';
import type { AccessOutcome, DecisionEvent } from '../src/session/accessCoordinator.js';
import type { AccessRequest } from '../src/types.js';
import { buildHistoryRecorder, createWebApp, startWebInterface, type WebInterfaceConfig } from '../src/webServer.js';

const baseConfig: WebInterfaceConfig = {
  enabled: true,
  port: 0,
  basePath: '/gateway',
  apiKey: 'test-secret',
  historySize: 2
};

const grant = async (deviceId: DeviceId, request: AccessRequest): Promise<AccessOutcome> => {
  const decision = {
    decision: 'GRANTED' as const,
    displayMessage: 'Acesso liberado',
    direction: request.direction,
    readerType: request.readerType,
    source: 'offline' as const
  };
  return { decision, response: buildAccessResponse(deviceId, decision) };
};

const event = (credential: string): DecisionEvent => ({
  deviceId: '01',
  credential,
  direction: 'ENTRY',
  readerType: 'CARD',
  decision: 'GRANTED',
  displayMessage: 'Acesso liberado',
  decidedBy: 'offline',
  response: '01+REON+00+5]5]Acesso liberado]',
  timestamp: '2025-05-10T12:00:00.000Z',
  source: 'device'
});

let server: Server | undefined;

afterEach(async () => {
  if (server) {
    const current = server;
    server = undefined;
    await new Promise<void>((resolve) => current.close(() => resolve()));
  }
});

const serve = async (deps: Parameters<typeof createWebApp>[1], config: WebInterfaceConfig = baseConfig) => {
  const web = createWebApp(config, deps);
  const listening = await new Promise<Server>((resolve) => {
    const started = web.app.listen(0, '127.0.0.1', () => resolve(started));
  });
  server = listening;
  const address = listening.address();
  const port = address !== null && typeof address === 'object' ? address.port : 0;
  return { ...web, url: `http://127.0.0.1:${port}` };
};

const authorized = { authorization: 'Bearer test-secret', 'content-type': 'application/json' };

describe('web test interface', () => {
  it('answers health checks without a key', async () => {
    const { url } = await serve({ simulate: grant, listTurnstiles: () => [] });

    const response = await fetch(`${url}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('requires the API key under the base path', async () => {
    const { url } = await serve({ simulate: grant, listTurnstiles: () => [] });

    const response = await fetch(`${url}/gateway/api/history`);
    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ error: 'UNAUTHENTICATED' });
  });

  it('simulates an access request through the coordinator', async () => {
    const simulate = vi.fn(grant);
    const { url } = await serve({ simulate, listTurnstiles: () => [] });

    const response = await fetch(`${url}/gateway/api/simulate`, {
      method: 'POST',
      headers: authorized,
      body: JSON.stringify({
        deviceId: '7',
        credential: ' ABC123 ',
        direction: 'EXIT',
        timestamp: '2025-05-10T12:00:00Z'
      })
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      decision: {
        decision: 'GRANTED',
        displayMessage: 'Acesso liberado',
        direction: 'EXIT',
        readerType: 'CARD',
        source: 'offline'
      },
      response: '07+REON+00+6]5]Acesso liberado]'
    });
    const [deviceId, request] = simulate.mock.calls[0] ?? [];
    expect(deviceId?.value).toBe(7);
    expect(request).toEqual({
      credential: 'ABC123',
      timestamp: new Date('2025-05-10T12:00:00Z'),
      direction: 'EXIT',
      readerType: 'CARD'
    });
  });

  it.each([
    [{ deviceId: 1, credential: 'ABC123', direction: 'UP' }, 'INVALID_REQUEST'],
    [{ deviceId: 100, credential: 'ABC123' }, 'INVALID_MESSAGE_FORMAT'],
    [{ deviceId: 1, credential: 'AB' }, 'INVALID_FIELD_FORMAT']
  ])('rejects %j with %s', async (body, error) => {
    const simulate = vi.fn(grant);
    const { url } = await serve({ simulate, listTurnstiles: () => [] });

    const response = await fetch(`${url}/gateway/api/simulate`, {
      method: 'POST',
      headers: authorized,
      body: JSON.stringify(body)
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({ error });
    expect(simulate).not.toHaveBeenCalled();
  });

  it('reports a failing simulation as a server error', async () => {
    const { url } = await serve({
      simulate: () => Promise.reject(new Error('store down')),
      listTurnstiles: () => []
    });

    const response = await fetch(`${url}/gateway/api/simulate`, {
      method: 'POST',
      headers: authorized,
      body: JSON.stringify({ deviceId: 1, credential: 'ABC123' })
    });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'SIMULATION_FAILED' });
  });

  it('lists turnstiles and the most recent decisions first', async () => {
    const since = new Date('2025-05-10T12:00:00Z');
    const { url, recordEvent } = await serve({
      simulate: grant,
      listTurnstiles: () => [{ deviceId: '01', state: 'WAITING_ROTATION', since, transitions: 1 }]
    });
    recordEvent(event('A1'));
    recordEvent(event('B2'));
    recordEvent(event('C3'));

    const turnstiles = await fetch(`${url}/gateway/api/turnstiles`, { headers: authorized });
    expect(await turnstiles.json()).toEqual({
      turnstiles: [{ deviceId: '01', state: 'WAITING_ROTATION', since: '2025-05-10T12:00:00.000Z', transitions: 1 }]
    });

    const history = await fetch(`${url}/gateway/api/history`, { headers: authorized });
    const body: unknown = await history.json();
    expect(body).toMatchObject({ events: [{ credential: 'C3' }, { credential: 'B2' }] });
  });

  it('stays off unless enabled', async () => {
    expect(await startWebInterface({ ...baseConfig, enabled: false }, { simulate: grant, listTurnstiles: () => [] })).toBeNull();
  });

  it('starts and stops a listener when enabled', async () => {
    const controller = await startWebInterface(baseConfig, { simulate: grant, listTurnstiles: () => [] });
    expect(controller?.port).toBeGreaterThan(0);
    await controller?.close();
  });
});

describe('buildHistoryRecorder', () => {
  it('keeps the newest events up to the limit', () => {
    const history: DecisionEvent[] = [];
    const record = buildHistoryRecorder(history, 2);
    record(event('A1'));
    record(event('B2'));
    record(event('C3'));

    expect(history.map((entry) => entry.credential)).toEqual(['C3', 'B2']);
  });
});
