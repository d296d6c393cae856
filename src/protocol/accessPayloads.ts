import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';

import { InvalidFieldFormatError, InvalidMessageFormatError, MissingFieldError } from '../errors.js';
import type { AccessDecision, AccessDirection, AccessRequest, ReaderType } from '../types.js';
import type { CommandKind } from './commands.js';
import {
  DEFAULT_DENY_DISPLAY_SECONDS,
  DEFAULT_GRANT_DISPLAY_SECONDS,
  MAX_CARD_LENGTH,
  MAX_DISPLAY_MESSAGE_LENGTH,
  MIN_CARD_LENGTH,
  RESERVED_FIELD_CHARACTERS
} from './constants.js';
import type { DeviceId } from './deviceId.js';
import type { Message } from './message.js';

dayjs.extend(customParseFormat);

const ACCESS_FIELD_COUNT = 4;

const DIRECTION_CODES: Record<AccessDirection, number> = { UNKNOWN: 0, ENTRY: 1, EXIT: 2 };

const READER_TYPE_CODES: Record<ReaderType, number> = { CARD: 1, KEYPAD: 3, BIOMETRIC: 5 };

const TIMESTAMP_FORMAT = 'DD/MM/YYYY HH:mm:ss';

/** `dd/mm/yyyy hh:mm:ss` in local time, as the devices print it. */
export const formatProtocolTimestamp = (date: Date): string => dayjs(date).format(TIMESTAMP_FORMAT);

export const parseProtocolTimestamp = (text: string): Date => {
  // Strict parsing rejects dates that would roll over, such as 31/02.
  const parsed = dayjs(text.trim(), TIMESTAMP_FORMAT, true);
  if (!parsed.isValid()) {
    throw new InvalidMessageFormatError('INVALID_TIMESTAMP', `Invalid timestamp '${text}' (expected dd/mm/yyyy hh:mm:ss)`);
  }

  return parsed.toDate();
};

const parseCode = (field: string, index: number, what: string): number => {
  if (!/^\d{1,3}$/.test(field)) {
    throw new InvalidFieldFormatError(index, field, `Invalid ${what} code '${field}'`);
  }
  return Number.parseInt(field, 10);
};

export const parseDirectionCode = (field: string, index = 2): AccessDirection => {
  switch (parseCode(field, index, 'direction')) {
    case 0:
      return 'UNKNOWN';
    case 1:
      return 'ENTRY';
    case 2:
      return 'EXIT';
    default:
      throw new InvalidFieldFormatError(index, field, `Invalid direction code '${field}' (expected 0, 1 or 2)`);
  }
};

export const parseReaderTypeCode = (field: string, index = 3): ReaderType => {
  switch (parseCode(field, index, 'reader type')) {
    case 0:
    case 1:
      return 'CARD';
    case 3:
      return 'KEYPAD';
    case 5:
      return 'BIOMETRIC';
    default:
      throw new InvalidFieldFormatError(index, field, `Invalid reader type code '${field}' (expected 0, 1, 3 or 5)`);
  }
};

export const directionToCode = (direction: AccessDirection): number => DIRECTION_CODES[direction];

export const readerTypeToCode = (readerType: ReaderType): number => READER_TYPE_CODES[readerType];

export const validateCredential = (field: string, index = 0): string => {
  if (field.length < MIN_CARD_LENGTH || field.length > MAX_CARD_LENGTH) {
    throw new InvalidFieldFormatError(
      index,
      field,
      `Credential length must be ${MIN_CARD_LENGTH}-${MAX_CARD_LENGTH} characters, got ${field.length}`,
      MAX_CARD_LENGTH
    );
  }
  return field;
};

const requireFieldCount = (message: Message, what: string): void => {
  if (message.fields.length < ACCESS_FIELD_COUNT) {
    throw new MissingFieldError(what, ACCESS_FIELD_COUNT, message.fields.length);
  }
};

/**
 * Fields: credential, timestamp, direction code, reader type code. Extra
 * trailing fields are ignored.
 */
export const parseAccessRequest = (message: Message): AccessRequest => {
  requireFieldCount(message, 'Access request');
  const [credential, timestamp, direction, readerType] = message.fields;

  return {
    credential: validateCredential(credential),
    timestamp: parseProtocolTimestamp(timestamp),
    direction: parseDirectionCode(direction),
    readerType: parseReaderTypeCode(readerType)
  };
};

export const formatAccessRequest = (deviceId: DeviceId, request: AccessRequest): Message => ({
  deviceId,
  command: 'AccessRequest',
  fields: [
    request.credential,
    formatProtocolTimestamp(request.timestamp),
    String(directionToCode(request.direction)),
    String(readerTypeToCode(request.readerType))
  ]
});

export type RotationStatusKind = 'WaitingRotation' | 'RotationCompleted' | 'RotationTimeout';

export interface RotationStatus {
  kind: RotationStatusKind;
  credential: string | null;
  timestamp: Date;
  direction: AccessDirection;
  readerType: ReaderType;
}

const isRotationStatusKind = (kind: CommandKind): kind is RotationStatusKind =>
  kind === 'WaitingRotation' || kind === 'RotationCompleted' || kind === 'RotationTimeout';

export const parseRotationStatus = (message: Message): RotationStatus => {
  const { command } = message;
  if (!isRotationStatusKind(command)) {
    throw new InvalidMessageFormatError('MISSING_COMMAND', `${command} is not a rotation status command`);
  }
  requireFieldCount(message, 'Rotation status');
  const [credential, timestamp, direction, readerType] = message.fields;

  return {
    kind: command,
    credential: credential === '' ? null : validateCredential(credential),
    timestamp: parseProtocolTimestamp(timestamp),
    direction: parseDirectionCode(direction),
    readerType: parseReaderTypeCode(readerType)
  };
};

export const grantCommandFor = (direction: AccessDirection): CommandKind => {
  switch (direction) {
    case 'ENTRY':
      return 'GrantEntry';
    case 'EXIT':
      return 'GrantExit';
    default:
      return 'GrantBoth';
  }
};

const RESERVED = new Set<string>(RESERVED_FIELD_CHARACTERS);

/**
 * Makes arbitrary text safe for the device LCD: decomposes accented letters,
 * drops the combining marks and anything outside printable ASCII, removes
 * field delimiters and cuts to the display width.
 */
export const toDisplayText = (text: string): string =>
  Array.from(text.normalize('NFD').replace(/[\u0300-\u036f]/g, ''))
    .filter((char) => {
      const code = char.charCodeAt(0);
      return code >= 0x20 && code < 0x7f && !RESERVED.has(char);
    })
    .join('')
    .trim()
    .slice(0, MAX_DISPLAY_MESSAGE_LENGTH)
    .trimEnd();

export interface AccessResponseOptions {
  grantDisplaySeconds?: number;
  denyDisplaySeconds?: number;
}

/** Grant answers with the direction's grant code, deny with `00+30`. */
export const buildAccessResponse = (
  deviceId: DeviceId,
  decision: AccessDecision,
  options: AccessResponseOptions = {}
): Message => {
  const displayText = toDisplayText(decision.displayMessage);
  if (decision.decision === 'GRANTED') {
    return {
      deviceId,
      command: grantCommandFor(decision.direction),
      fields: [String(options.grantDisplaySeconds ?? DEFAULT_GRANT_DISPLAY_SECONDS), displayText]
    };
  }

  return {
    deviceId,
    command: 'DenyAccess',
    fields: [String(options.denyDisplaySeconds ?? DEFAULT_DENY_DISPLAY_SECONDS), displayText]
  };
};
