import express from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';

import { TurnstileGatewayError } from './errors.js';
import { logger } from './logger.js';
import { validateCredential } from './protocol/accessPayloads.js';
import { DeviceId } from './protocol/deviceId.js';
import { formatMessage } from './protocol/message.js';
import type { AccessOutcome, DecisionEvent } from './session/accessCoordinator.js';
import type { TurnstileSnapshot } from './turnstile/stateMachine.js';
import type { AccessRequest } from './types.js';

export interface WebInterfaceConfig {
  enabled: boolean;
  port: number;
  basePath: string;
  apiKey?: string;
  historySize: number;
}

export interface WebInterfaceController {
  recordEvent: (event: DecisionEvent) => void;
  close: () => Promise<void>;
  port: number;
}

export interface WebInterfaceDeps {
  simulate: (deviceId: DeviceId, request: AccessRequest) => Promise<AccessOutcome>;
  listTurnstiles: () => TurnstileSnapshot[];
}

const SimulationSchema = z.object({
  deviceId: z.coerce.number().int(),
  credential: z.string().trim().min(1),
  direction: z.enum(['ENTRY', 'EXIT', 'UNKNOWN']).default('UNKNOWN'),
  readerType: z.enum(['CARD', 'BIOMETRIC', 'KEYPAD']).default('CARD'),
  timestamp: z.string().datetime({ offset: true }).optional()
});

export const buildHistoryRecorder = (history: DecisionEvent[], limit: number) => {
  return (event: DecisionEvent): void => {
    history.unshift(event);
    if (history.length > limit) {
      history.length = limit;
    }
  };
};

/**
 * Builds the HTTP test interface without listening, so it can be mounted or
 * exercised directly.
 */
export const createWebApp = (config: WebInterfaceConfig, deps: WebInterfaceDeps) => {
  const history: DecisionEvent[] = [];
  const recordEvent = buildHistoryRecorder(history, config.historySize);

  const app = express();
  app.disable('x-powered-by');
  app.set('trust proxy', 1);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  const router = express.Router();
  router.use(express.json({ limit: '64kb' }));

  const ensureApiKey: express.RequestHandler = (req, res, next) => {
    if (!config.apiKey || req.get('authorization') === `Bearer ${config.apiKey}`) {
      next();
      return;
    }

    res.status(401).json({ error: 'UNAUTHENTICATED' });
  };

  router.use('/api', ensureApiKey);

  router.get('/api/turnstiles', (_req, res) => {
    res.json({ turnstiles: deps.listTurnstiles() });
  });

  router.get('/api/history', (_req, res) => {
    res.json({ events: history });
  });

  router.post('/api/simulate', async (req, res, next) => {
    const parsed = SimulationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'INVALID_REQUEST', details: parsed.error.issues.map((issue) => issue.message) });
      return;
    }

    const body = parsed.data;
    let deviceId: DeviceId;
    let request: AccessRequest;
    try {
      deviceId = DeviceId.of(body.deviceId);
      request = {
        credential: validateCredential(body.credential),
        timestamp: body.timestamp ? new Date(body.timestamp) : new Date(),
        direction: body.direction,
        readerType: body.readerType
      };
    } catch (error) {
      if (error instanceof TurnstileGatewayError) {
        res.status(400).json({ error: error.code, message: error.message });
        return;
      }
      next(error);
      return;
    }

    try {
      const outcome = await deps.simulate(deviceId, request);
      res.json({ decision: outcome.decision, response: formatMessage(outcome.response) });
    } catch (error) {
      logger.error({ err: error, deviceId: deviceId.toString() }, 'Simulated access request failed');
      res.status(500).json({ error: 'SIMULATION_FAILED' });
    }
  });

  app.use(config.basePath, router);

  return { app, recordEvent, history };
};

export const startWebInterface = async (
  config: WebInterfaceConfig,
  deps: WebInterfaceDeps
): Promise<WebInterfaceController | null> => {
  if (!config.enabled) {
    return null;
  }

  const { app, recordEvent } = createWebApp(config, deps);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app
      .listen(config.port, '0.0.0.0', () => {
        resolve(listening);
      })
      .on('error', (error) => {
        reject(error);
      });
  });

  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : config.port;
  logger.info({ port, basePath: config.basePath }, 'Web test interface listening');

  return {
    recordEvent,
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      })
  };
};
