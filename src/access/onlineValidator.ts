import { RemoteAuthorityError, RemoteTimeoutError } from '../errors.js';
import { logger } from '../logger.js';
import {
  DEFAULT_ONLINE_TIMEOUT_MS,
  MAX_ONLINE_TIMEOUT_MS,
  MIN_ONLINE_TIMEOUT_MS
} from '../protocol/constants.js';
import { toDisplayText } from '../protocol/accessPayloads.js';
import type { AccessDecision, AccessRequest, AccessValidator } from '../types.js';
import { DISPLAY_MESSAGES } from './displayMessages.js';

export interface RemoteVerdict {
  granted: boolean;
  displayMessage?: string;
  reason?: string;
}

/**
 * Anything that can answer an access request remotely. Implementations must
 * stop work when `signal` aborts; whatever they return afterwards is ignored.
 */
export interface RemoteAuthority {
  authorize(request: AccessRequest, signal: AbortSignal): Promise<RemoteVerdict>;
}

export interface OnlineValidatorOptions {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

export interface ValidationReport {
  decision: AccessDecision;
  attempts: number;
  fellBack: boolean;
  error?: RemoteAuthorityError;
}

export const DEFAULT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_MS = 100;

export const clampOnlineTimeout = (value: number): number =>
  Math.min(MAX_ONLINE_TIMEOUT_MS, Math.max(MIN_ONLINE_TIMEOUT_MS, value));

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const toDecision = (verdict: RemoteVerdict, request: AccessRequest): AccessDecision => {
  const remoteText = verdict.displayMessage === undefined ? '' : toDisplayText(verdict.displayMessage);
  if (verdict.granted) {
    return {
      decision: 'GRANTED',
      displayMessage: remoteText || DISPLAY_MESSAGES.ACCESS_GRANTED,
      direction: request.direction,
      readerType: request.readerType,
      source: 'online'
    };
  }

  return {
    decision: 'DENIED',
    reason: 'REMOTE_DENIED',
    displayMessage: remoteText || DISPLAY_MESSAGES.ACCESS_DENIED,
    source: 'online'
  };
};

/**
 * Asks the remote authority first. Each attempt is bounded by `timeoutMs`;
 * after `retries` further attempts have failed the fallback validator
 * decides, exactly once.
 */
export class OnlineValidator implements AccessValidator {
  readonly timeoutMs: number;

  readonly retries: number;

  readonly retryDelayMs: number;

  constructor(
    private readonly remote: RemoteAuthority,
    private readonly fallback: AccessValidator,
    options: OnlineValidatorOptions = {}
  ) {
    this.timeoutMs = clampOnlineTimeout(options.timeoutMs ?? DEFAULT_ONLINE_TIMEOUT_MS);
    this.retries = Math.max(0, Math.floor(options.retries ?? DEFAULT_RETRIES));
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
  }

  async validate(request: AccessRequest): Promise<AccessDecision> {
    const { decision } = await this.validateWithReport(request);
    return decision;
  }

  async validateWithReport(request: AccessRequest): Promise<ValidationReport> {
    let attempts = 0;
    let lastError: unknown;

    while (attempts <= this.retries) {
      if (attempts > 0 && this.retryDelayMs > 0) {
        await sleep(this.retryDelayMs);
      }
      attempts += 1;

      try {
        const verdict = await this.attempt(request);
        return { decision: toDecision(verdict, request), attempts, fellBack: false };
      } catch (error) {
        lastError = error;
        logger.warn(
          { err: error, attempt: attempts, maxAttempts: this.retries + 1, credential: request.credential },
          'Remote access validation attempt failed'
        );
      }
    }

    const failure = new RemoteAuthorityError(attempts, lastError);
    logger.warn({ err: failure, credential: request.credential }, 'Falling back to local access validation');
    const decision = await this.fallback.validate(request);
    return { decision, attempts, fellBack: true, error: failure };
  }

  private attempt(request: AccessRequest): Promise<RemoteVerdict> {
    const controller = new AbortController();

    return new Promise<RemoteVerdict>((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        settled = true;
        controller.abort();
        reject(new RemoteTimeoutError(this.timeoutMs));
      }, this.timeoutMs);

      void Promise.resolve()
        .then(() => this.remote.authorize(request, controller.signal))
        .then(
          (verdict) => {
            if (settled) {
              logger.debug({ credential: request.credential }, 'Discarding late remote verdict');
              return;
            }
            settled = true;
            clearTimeout(timer);
            resolve(verdict);
          },
          (error: unknown) => {
            if (settled) {
              logger.debug({ err: error, credential: request.credential }, 'Discarding late remote failure');
              return;
            }
            settled = true;
            clearTimeout(timer);
            reject(error);
          }
        );
    });
  }
}
