import { createAccessValidator } from './access/validator.js';
import { MemoryAccessStore } from './access/memoryStore.js';
import { PgAccessStore } from './access/pgStore.js';
import { config } from './config.js';
import { asQueryable, closeDatabase, initDatabase } from './db.js';
import { logger } from './logger.js';
import { integrityCheckByName } from './protocol/checksum.js';
import { FrameCodec } from './protocol/codec.js';
import { AccessCoordinator } from './session/accessCoordinator.js';
import { TurnstileServer } from './session/turnstileServer.js';
import { TurnstileController } from './turnstile/controller.js';
import { TurnstileStateMachine } from './turnstile/stateMachine.js';
import type { AccessStore } from './types.js';
import { startWebInterface, type WebInterfaceController } from './webServer.js';

const createStore = async (): Promise<AccessStore> => {
  if (config.store.driver === 'memory') {
    const store = config.store.seedFile
      ? await MemoryAccessStore.fromFile(config.store.seedFile)
      : new MemoryAccessStore();
    logger.warn({ seedFile: config.store.seedFile }, 'Using in-memory access store; access logs are not persisted');
    return store;
  }

  const pool = await initDatabase(config.db);
  return new PgAccessStore(asQueryable(pool));
};

let webInterfaceController: WebInterfaceController | null = null;

const start = async (): Promise<void> => {
  const store = await createStore();
  const validator = createAccessValidator(config.validation, { store });

  const machine = TurnstileStateMachine.builder()
    .rotationTimeoutMs(config.turnstile.rotationTimeoutMs)
    .historyLimit(config.turnstile.historyLimit)
    .build();
  const turnstiles = new TurnstileController(machine);

  const coordinator = new AccessCoordinator({
    validator,
    turnstiles,
    responseOptions: {
      grantDisplaySeconds: config.protocol.grantDisplaySeconds,
      denyDisplaySeconds: config.protocol.denyDisplaySeconds
    },
    onDecision: (event) => webInterfaceController?.recordEvent(event)
  });

  const codec = new FrameCodec({
    integrityCheck: integrityCheckByName(config.protocol.integrityCheck),
    maxFrameSize: config.protocol.maxFrameSize
  });

  const server = new TurnstileServer({
    host: config.server.host,
    port: config.server.port,
    maxConnections: config.server.maxConnections,
    idleTimeoutMs: config.server.idleTimeoutMs,
    session: {
      codec,
      coordinator,
      turnstiles,
      maxConsecutiveErrors: config.server.maxConsecutiveErrors
    }
  });

  try {
    webInterfaceController = await startWebInterface(config.webInterface, {
      simulate: (deviceId, request) => coordinator.handle(deviceId, request, 'web'),
      listTurnstiles: () => machine.snapshot()
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start web test interface');
    throw error;
  }

  await server.listen();
  logger.info(
    { mode: config.validation.mode, store: config.store.driver, integrityCheck: config.protocol.integrityCheck },
    'Turnstile gateway started'
  );

  const gracefulShutdown = (): void => {
    logger.info('Shutting down turnstile gateway');
    turnstiles.close();

    const closing: Promise<void>[] = [
      server.close().catch((error) => {
        logger.error({ err: error }, 'Error closing turnstile server');
      }),
      closeDatabase().catch((error) => {
        logger.error({ err: error }, 'Error closing database pool');
      })
    ];
    if (webInterfaceController) {
      closing.push(
        webInterfaceController.close().catch((error) => {
          logger.error({ err: error }, 'Error closing web test interface');
        })
      );
    }

    void Promise.all(closing).then(() => process.exit(0));
  };

  process.on('SIGINT', gracefulShutdown);
  process.on('SIGTERM', gracefulShutdown);
};

start().catch((error) => {
  logger.error({ err: error }, 'Failed to start turnstile gateway');
  process.exit(1);
});
