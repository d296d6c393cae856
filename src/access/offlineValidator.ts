import type {
  AccessDecision,
  AccessDirection,
  AccessLogEntry,
  AccessRequest,
  AccessStore,
  AccessValidator,
  DenialReason,
  UserRecord
} from '../types.js';
import { DISPLAY_MESSAGES, methodDeniedMessage } from './displayMessages.js';
import { KeyedMutex } from './keyedMutex.js';

export const DEFAULT_ANTI_PASSBACK_WINDOW_MS = 5 * 60 * 1000;

export interface OfflineValidatorOptions {
  antiPassbackWindowMs?: number;
  logDenials?: boolean;
  clock?: () => Date;
}

export const normalizeCardNumber = (value: string): string => value.trim().toUpperCase();

export const isWithinValidity = (validFrom: Date | null, validUntil: Date | null, now: Date): boolean => {
  if (validFrom && now.getTime() < validFrom.getTime()) {
    return false;
  }
  if (validUntil && now.getTime() > validUntil.getTime()) {
    return false;
  }
  return true;
};

const isMethodAllowed = (user: UserRecord, request: AccessRequest): boolean => {
  switch (request.readerType) {
    case 'BIOMETRIC':
      return user.allowBiometric;
    case 'KEYPAD':
      return user.allowKeypad;
    default:
      return user.allowCard;
  }
};

const tracksPassback = (direction: AccessDirection): boolean => direction === 'ENTRY' || direction === 'EXIT';

interface Subject {
  userId: number | null;
  registration: string | null;
  credential: string;
}

/**
 * Local decision against the access store. Checks run in a fixed order and
 * stop at the first failure; every outcome is written to the access log.
 */
export class OfflineValidator implements AccessValidator {
  private readonly userLocks = new KeyedMutex<number>();

  private readonly antiPassbackWindowMs: number;

  private readonly logDenials: boolean;

  private readonly clock: () => Date;

  constructor(
    private readonly store: AccessStore,
    options: OfflineValidatorOptions = {}
  ) {
    this.antiPassbackWindowMs = options.antiPassbackWindowMs ?? DEFAULT_ANTI_PASSBACK_WINDOW_MS;
    this.logDenials = options.logDenials ?? true;
    this.clock = options.clock ?? (() => new Date());
  }

  async validate(request: AccessRequest): Promise<AccessDecision> {
    const now = this.clock();
    const user = await this.resolveUser(request, now);
    if ('decision' in user) {
      return user;
    }

    const subject: Subject = { userId: user.id, registration: user.registration, credential: user.credential };

    if (!user.record.active) {
      return this.deny(request, subject, 'USER_INACTIVE', DISPLAY_MESSAGES.USER_INACTIVE);
    }
    if (!isWithinValidity(user.record.validFrom, user.record.validUntil, now)) {
      return this.deny(request, subject, 'USER_EXPIRED', DISPLAY_MESSAGES.USER_EXPIRED);
    }
    if (!isMethodAllowed(user.record, request)) {
      return this.deny(request, subject, 'METHOD_NOT_PERMITTED', methodDeniedMessage(request.readerType));
    }

    // The passback read and the grant write must not interleave for one user.
    return this.userLocks.runExclusive(user.id, async () => {
      if (tracksPassback(request.direction)) {
        const since = new Date(this.clock().getTime() - this.antiPassbackWindowMs);
        const recent = await this.store.findRecentGrantedAccess(user.id, request.direction, since);
        if (recent) {
          return this.deny(request, subject, 'ANTI_PASSBACK', DISPLAY_MESSAGES.ANTI_PASSBACK);
        }
      }

      await this.store.appendAccessLog(this.logEntry(request, subject, true, DISPLAY_MESSAGES.ACCESS_GRANTED));
      return {
        decision: 'GRANTED',
        displayMessage: DISPLAY_MESSAGES.ACCESS_GRANTED,
        direction: request.direction,
        readerType: request.readerType,
        source: 'offline'
      };
    });
  }

  private async resolveUser(
    request: AccessRequest,
    now: Date
  ): Promise<AccessDecision | { id: number; registration: string; credential: string; record: UserRecord }> {
    if (request.readerType === 'KEYPAD') {
      const credential = request.credential.trim();
      const user = await this.store.findUserByCode(credential);
      if (!user) {
        return this.deny(
          request,
          { userId: null, registration: null, credential },
          'CODE_NOT_FOUND',
          DISPLAY_MESSAGES.CODE_NOT_FOUND
        );
      }
      return { id: user.id, registration: user.registration, credential, record: user };
    }

    const credential = normalizeCardNumber(request.credential);
    const card = await this.store.findCardByNumber(credential);
    if (!card) {
      return this.deny(
        request,
        { userId: null, registration: null, credential },
        'CARD_NOT_FOUND',
        DISPLAY_MESSAGES.CARD_NOT_FOUND
      );
    }

    const cardSubject: Subject = { userId: card.userId, registration: card.registration, credential };
    if (!card.active) {
      return this.deny(request, cardSubject, 'CARD_INACTIVE', DISPLAY_MESSAGES.CARD_INACTIVE);
    }
    if (!isWithinValidity(card.validFrom, card.validUntil, now)) {
      return this.deny(request, cardSubject, 'CARD_EXPIRED', DISPLAY_MESSAGES.CARD_EXPIRED);
    }

    const user = await this.store.findUserByRegistration(card.registration);
    if (!user) {
      return this.deny(request, cardSubject, 'USER_NOT_FOUND', DISPLAY_MESSAGES.USER_NOT_FOUND);
    }

    return { id: user.id, registration: user.registration, credential, record: user };
  }

  private async deny(
    request: AccessRequest,
    subject: Subject,
    reason: DenialReason,
    displayMessage: string
  ): Promise<AccessDecision> {
    if (this.logDenials) {
      await this.store.appendAccessLog(this.logEntry(request, subject, false, displayMessage));
    }
    return { decision: 'DENIED', reason, displayMessage, source: 'offline' };
  }

  private logEntry(request: AccessRequest, subject: Subject, granted: boolean, displayMessage: string): AccessLogEntry {
    return {
      userId: subject.userId,
      registration: subject.registration,
      credential: subject.credential,
      direction: request.direction,
      readerType: request.readerType,
      granted,
      displayMessage,
      timestamp: this.clock()
    };
  }
}
