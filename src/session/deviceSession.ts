import type { Logger } from 'pino';

import { DISPLAY_MESSAGES } from '../access/displayMessages.js';
import { TurnstileGatewayError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import { buildAccessResponse, parseAccessRequest, parseRotationStatus } from '../protocol/accessPayloads.js';
import { ByteAccumulator } from '../protocol/byteAccumulator.js';
import { commandToCode, isGrantCommand, isManagementCommand } from '../protocol/commands.js';
import type { FrameCodec } from '../protocol/codec.js';
import type { Message } from '../protocol/message.js';
import type { TurnstileController } from '../turnstile/controller.js';
import { eventForCommand } from '../turnstile/stateMachine.js';
import type { AccessRequest } from '../types.js';
import type { AccessCoordinator } from './accessCoordinator.js';

/** What a session needs from the connection it runs on. */
export interface SessionTransport {
  write(bytes: Buffer): void;
  close(reason: string): void;
}

export interface DeviceSessionOptions {
  codec: FrameCodec;
  coordinator: AccessCoordinator;
  turnstiles: TurnstileController;
  maxConsecutiveErrors: number;
  logger?: Logger;
}

export interface SessionStats {
  framesReceived: number;
  framesSent: number;
  protocolErrors: number;
  skippedBytes: number;
}

/**
 * Protocol state for one connection. Inbound bytes are decoded as they
 * arrive; decoded messages are handled strictly one after another so
 * responses leave in request order.
 */
export class DeviceSession {
  private readonly buffer = new ByteAccumulator();

  private queue: Promise<void> = Promise.resolve();

  private consecutiveErrors = 0;

  private closed = false;

  private readonly log: Logger;

  readonly stats: SessionStats = { framesReceived: 0, framesSent: 0, protocolErrors: 0, skippedBytes: 0 };

  constructor(
    private readonly transport: SessionTransport,
    private readonly options: DeviceSessionOptions
  ) {
    this.log = options.logger ?? rootLogger;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  receive(chunk: Uint8Array): void {
    if (this.closed) {
      return;
    }

    this.buffer.append(chunk);
    for (;;) {
      const result = this.options.codec.decode(this.buffer);
      if (result.skipped > 0) {
        this.stats.skippedBytes += result.skipped;
        this.log.warn({ skipped: result.skipped }, 'Discarded bytes outside a frame');
      }

      if (result.kind === 'pending') {
        return;
      }

      if (result.kind === 'error') {
        this.recordProtocolError(result.error);
        if (this.closed) {
          return;
        }
        continue;
      }

      this.consecutiveErrors = 0;
      this.stats.framesReceived += 1;
      const { message } = result;
      this.queue = this.queue
        .then(() => this.handleMessage(message))
        .catch((error: unknown) => {
          this.log.error(
            { err: error, deviceId: message.deviceId.toString(), command: message.command },
            'Unhandled error processing turnstile message'
          );
        });
    }
  }

  /** Resolves once every message received so far has been handled. */
  drain(): Promise<void> {
    return this.queue;
  }

  close(): void {
    this.closed = true;
    this.buffer.clear();
  }

  private recordProtocolError(error: TurnstileGatewayError): void {
    this.stats.protocolErrors += 1;
    this.consecutiveErrors += 1;
    this.log.warn(
      { err: error, code: error.code, consecutiveErrors: this.consecutiveErrors },
      'Dropped invalid frame'
    );

    if (this.consecutiveErrors >= this.options.maxConsecutiveErrors) {
      this.log.error({ consecutiveErrors: this.consecutiveErrors }, 'Too many consecutive protocol errors');
      this.close();
      this.transport.close('too many consecutive protocol errors');
    }
  }

  private send(message: Message): void {
    if (this.closed) {
      return;
    }
    this.transport.write(this.options.codec.encode(message));
    this.stats.framesSent += 1;
  }

  private async handleMessage(message: Message): Promise<void> {
    const context = { deviceId: message.deviceId.toString(), command: message.command };

    if (message.command === 'AccessRequest') {
      await this.handleAccessRequest(message);
      return;
    }

    const event = eventForCommand(message.command);
    if (event !== null && event !== 'GRANT' && event !== 'RESET') {
      this.handleRotationStatus(message, event);
      return;
    }

    if (isManagementCommand(message.command) || message.command === 'QueryStatus') {
      this.log.info({ ...context, fields: message.fields.length }, 'Received management command');
      return;
    }

    if (isGrantCommand(message.command) || message.command === 'DenyAccess') {
      this.log.warn({ ...context, code: commandToCode(message.command) }, 'Ignoring decision command sent by device');
    }
  }

  private async handleAccessRequest(message: Message): Promise<void> {
    let request: AccessRequest;
    try {
      request = parseAccessRequest(message);
    } catch (error) {
      if (!(error instanceof TurnstileGatewayError)) {
        throw error;
      }
      this.log.warn({ err: error, deviceId: message.deviceId.toString() }, 'Rejected malformed access request');
      this.sendDenial(message, 'MALFORMED_REQUEST');
      return;
    }

    try {
      const { response } = await this.options.coordinator.handle(message.deviceId, request, 'device');
      this.send(response);
    } catch (error) {
      this.log.error(
        { err: error, deviceId: message.deviceId.toString(), credential: request.credential },
        'Access request failed'
      );
      this.sendDenial(message, 'VALIDATION_ERROR');
    }
  }

  private sendDenial(message: Message, reason: 'MALFORMED_REQUEST' | 'VALIDATION_ERROR'): void {
    this.send(
      buildAccessResponse(message.deviceId, {
        decision: 'DENIED',
        reason,
        displayMessage: DISPLAY_MESSAGES.ACCESS_DENIED,
        source: 'offline'
      })
    );
  }

  private handleRotationStatus(message: Message, event: 'WAITING' | 'COMPLETED' | 'TIMEOUT'): void {
    const deviceId = message.deviceId.toString();
    try {
      const status = parseRotationStatus(message);
      this.log.debug({ deviceId, status: status.kind, credential: status.credential }, 'Rotation status');
    } catch (error) {
      if (!(error instanceof TurnstileGatewayError)) {
        throw error;
      }
      // The command code alone carries the event.
      this.log.warn({ err: error, deviceId }, 'Rotation status with unreadable fields');
    }

    try {
      const transitions = this.options.turnstiles.report(message.deviceId, event);
      this.log.info({ deviceId, event, state: transitions[transitions.length - 1].to }, 'Turnstile transition');
    } catch (error) {
      if (!(error instanceof TurnstileGatewayError)) {
        throw error;
      }
      this.log.error({ err: error, deviceId, event }, 'Turnstile reported an unexpected status');
    }
  }
}
