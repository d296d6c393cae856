import type { Logger } from 'pino';

import { DISPLAY_MESSAGES } from '../access/displayMessages.js';
import { KeyedMutex } from '../access/keyedMutex.js';
import { logger as rootLogger } from '../logger.js';
import { buildAccessResponse, type AccessResponseOptions } from '../protocol/accessPayloads.js';
import type { DeviceId } from '../protocol/deviceId.js';
import { formatMessage, type Message } from '../protocol/message.js';
import type { TurnstileController } from '../turnstile/controller.js';
import type { AccessDecision, AccessRequest, AccessValidator } from '../types.js';

export type RequestSource = 'device' | 'web';

export interface DecisionEvent {
  deviceId: string;
  credential: string;
  direction: AccessRequest['direction'];
  readerType: AccessRequest['readerType'];
  decision: AccessDecision['decision'];
  reason?: string;
  displayMessage: string;
  decidedBy: AccessDecision['source'] | null;
  response: string;
  timestamp: string;
  source: RequestSource;
}

export interface AccessOutcome {
  decision: AccessDecision;
  response: Message;
}

export interface AccessCoordinatorOptions {
  validator: AccessValidator;
  turnstiles: TurnstileController;
  responseOptions?: AccessResponseOptions;
  onDecision?: (event: DecisionEvent) => void;
  logger?: Logger;
}

const validationFailure = (): AccessDecision => ({
  decision: 'DENIED',
  reason: 'VALIDATION_ERROR',
  displayMessage: DISPLAY_MESSAGES.ACCESS_DENIED,
  source: 'offline'
});

/**
 * One access request from credential to response message: closes a stale
 * rotation, asks the validator, and on grant opens the next rotation cycle.
 * A validator failure is answered with a plain denial so the reader is never
 * left without a response. Requests for the same device run one at a time,
 * whichever connection or endpoint they arrive on.
 */
export class AccessCoordinator {
  private readonly log: Logger;

  private readonly devices = new KeyedMutex<number>();

  constructor(private readonly options: AccessCoordinatorOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'access' });
  }

  handle(deviceId: DeviceId, request: AccessRequest, source: RequestSource): Promise<AccessOutcome> {
    return this.devices.runExclusive(deviceId.value, () => this.decide(deviceId, request, source));
  }

  private async decide(deviceId: DeviceId, request: AccessRequest, source: RequestSource): Promise<AccessOutcome> {
    const { turnstiles, validator } = this.options;
    const context = {
      deviceId: deviceId.toString(),
      credential: request.credential,
      direction: request.direction,
      readerType: request.readerType,
      source
    };

    turnstiles.recoverStale(deviceId);

    let decision: AccessDecision;
    let decidedBy: AccessDecision['source'] | null;
    try {
      decision = await validator.validate(request);
      decidedBy = decision.source;
    } catch (error) {
      this.log.error({ ...context, err: error }, 'Access validation failed');
      decision = validationFailure();
      decidedBy = null;
    }

    if (decision.decision === 'GRANTED') {
      turnstiles.grant(deviceId);
    }

    const response = buildAccessResponse(deviceId, decision, this.options.responseOptions);
    this.log.info(
      {
        ...context,
        decision: decision.decision,
        reason: decision.decision === 'DENIED' ? decision.reason : undefined,
        displayMessage: decision.displayMessage
      },
      'Processed access request'
    );

    this.options.onDecision?.({
      ...context,
      decision: decision.decision,
      reason: decision.decision === 'DENIED' ? decision.reason : undefined,
      displayMessage: decision.displayMessage,
      decidedBy,
      response: formatMessage(response),
      timestamp: request.timestamp.toISOString()
    });

    return { decision, response };
  }
}
