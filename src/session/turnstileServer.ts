import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import type { Logger } from 'pino';

import { logger as rootLogger } from '../logger.js';
import { DeviceSession, type DeviceSessionOptions } from './deviceSession.js';

export interface TurnstileServerOptions {
  host: string;
  port: number;
  maxConnections: number;
  idleTimeoutMs: number;
  session: Omit<DeviceSessionOptions, 'logger'>;
  logger?: Logger;
}

/** TCP listener for the readers; each socket gets its own {@link DeviceSession}. */
export class TurnstileServer {
  private server: Server | null = null;

  private readonly sessions = new Map<Socket, DeviceSession>();

  private readonly log: Logger;

  constructor(private readonly options: TurnstileServerOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'tcp' });
  }

  get connectionCount(): number {
    return this.sessions.size;
  }

  async listen(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Turnstile server is already listening');
    }

    const server = createServer((socket) => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.log.error({ err: error }, 'Turnstile server error');
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected listen address ${String(address)}`);
    }
    this.log.info({ host: address.address, port: address.port }, 'Turnstile server listening');
    return address;
  }

  async close(): Promise<void> {
    const { server } = this;
    if (!server) {
      return;
    }
    this.server = null;

    for (const [socket, session] of this.sessions) {
      session.close();
      socket.destroy();
    }
    this.sessions.clear();

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private accept(socket: Socket): void {
    const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    if (this.sessions.size >= this.options.maxConnections) {
      this.log.warn({ remote, maxConnections: this.options.maxConnections }, 'Connection limit reached, refusing reader');
      socket.destroy();
      return;
    }

    const log = this.log.child({ remote });
    const session = new DeviceSession(
      {
        write: (bytes) => {
          socket.write(bytes);
        },
        close: (reason) => {
          log.warn({ reason }, 'Closing reader connection');
          socket.end();
        }
      },
      { ...this.options.session, logger: log }
    );
    this.sessions.set(socket, session);
    log.info({ connections: this.sessions.size }, 'Reader connected');

    if (this.options.idleTimeoutMs > 0) {
      socket.setTimeout(this.options.idleTimeoutMs, () => {
        log.info({ idleTimeoutMs: this.options.idleTimeoutMs }, 'Reader idle, closing connection');
        socket.end();
      });
    }

    socket.on('data', (chunk: Buffer) => session.receive(chunk));
    socket.on('error', (error) => {
      log.warn({ err: error }, 'Reader socket error');
    });
    socket.on('close', () => {
      session.close();
      this.sessions.delete(socket);
      log.info({ connections: this.sessions.size }, 'Reader disconnected');
    });
  }
}
