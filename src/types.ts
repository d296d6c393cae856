export type AccessDirection = 'ENTRY' | 'EXIT' | 'UNKNOWN';

export type ReaderType = 'CARD' | 'BIOMETRIC' | 'KEYPAD';

export interface AccessRequest {
  credential: string;
  timestamp: Date;
  direction: AccessDirection;
  readerType: ReaderType;
}

export type DenialReason =
  | 'CARD_NOT_FOUND'
  | 'CODE_NOT_FOUND'
  | 'CARD_INACTIVE'
  | 'CARD_EXPIRED'
  | 'USER_NOT_FOUND'
  | 'USER_INACTIVE'
  | 'USER_EXPIRED'
  | 'METHOD_NOT_PERMITTED'
  | 'ANTI_PASSBACK'
  | 'REMOTE_DENIED'
  | 'MALFORMED_REQUEST'
  | 'VALIDATION_ERROR';

export type DecisionSource = 'offline' | 'online';

export type AccessDecision =
  | {
      decision: 'GRANTED';
      displayMessage: string;
      direction: AccessDirection;
      readerType: ReaderType;
      source: DecisionSource;
    }
  | {
      decision: 'DENIED';
      reason: DenialReason;
      displayMessage: string;
      source: DecisionSource;
    };

export interface AccessValidator {
  validate(request: AccessRequest): Promise<AccessDecision>;
}

export type ValidationMode = 'offline' | 'online';

export interface UserRecord {
  id: number;
  registration: string;
  name: string;
  active: boolean;
  validFrom: Date | null;
  validUntil: Date | null;
  allowCard: boolean;
  allowBiometric: boolean;
  allowKeypad: boolean;
  code: string | null;
}

export interface CardRecord {
  id: number;
  cardNumber: string;
  registration: string;
  userId: number;
  active: boolean;
  validFrom: Date | null;
  validUntil: Date | null;
}

export interface AccessLogEntry {
  userId: number | null;
  registration: string | null;
  credential: string;
  direction: AccessDirection;
  readerType: ReaderType;
  granted: boolean;
  displayMessage: string;
  timestamp: Date;
}

export interface AccessLogRecord extends AccessLogEntry {
  id: number;
}

export interface AccessStore {
  findCardByNumber(cardNumber: string): Promise<CardRecord | null>;
  findUserByRegistration(registration: string): Promise<UserRecord | null>;
  findUserByCode(code: string): Promise<UserRecord | null>;
  findRecentGrantedAccess(userId: number, direction: AccessDirection, since: Date): Promise<AccessLogRecord | null>;
  appendAccessLog(entry: AccessLogEntry): Promise<AccessLogRecord>;
}
