export type ErrorCategory = 'format' | 'integrity' | 'store' | 'remote' | 'state' | 'config';

export class TurnstileGatewayError extends Error {
  readonly code: string;

  readonly category: ErrorCategory;

  constructor(code: string, category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.category = category;
  }
}

export type MessageFormatReason =
  | 'EMPTY_MESSAGE'
  | 'MISSING_DEVICE_ID'
  | 'INVALID_DEVICE_ID'
  | 'MISSING_PROTOCOL_ID'
  | 'MISSING_COMMAND'
  | 'NON_ASCII_PAYLOAD'
  | 'INVALID_TIMESTAMP';

export class InvalidMessageFormatError extends TurnstileGatewayError {
  readonly reason: MessageFormatReason;

  constructor(reason: MessageFormatReason, message: string) {
    super('INVALID_MESSAGE_FORMAT', 'format', message);
    this.reason = reason;
  }
}

export class InvalidCommandCodeError extends TurnstileGatewayError {
  readonly commandCode: string;

  constructor(commandCode: string) {
    super('INVALID_COMMAND_CODE', 'format', `Unknown command code '${commandCode}'`);
    this.commandCode = commandCode;
  }
}

export class InvalidFieldFormatError extends TurnstileGatewayError {
  readonly fieldIndex: number;

  readonly field: string;

  readonly limit?: number;

  constructor(fieldIndex: number, field: string, message: string, limit?: number) {
    super('INVALID_FIELD_FORMAT', 'format', message);
    this.fieldIndex = fieldIndex;
    this.field = field;
    this.limit = limit;
  }
}

export class MissingFieldError extends TurnstileGatewayError {
  readonly expected: number;

  readonly actual: number;

  constructor(what: string, expected: number, actual: number) {
    super('MISSING_FIELD', 'format', `${what} requires ${expected} fields, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class ChecksumMismatchError extends TurnstileGatewayError {
  readonly expected: string;

  readonly actual: string;

  constructor(expected: string, actual: string) {
    super('CHECKSUM_MISMATCH', 'integrity', `Checksum mismatch: expected ${expected}, got ${actual}`);
    this.expected = expected;
    this.actual = actual;
  }
}

export class FrameTooLargeError extends TurnstileGatewayError {
  readonly size: number;

  readonly maxSize: number;

  constructor(size: number, maxSize: number) {
    super('FRAME_TOO_LARGE', 'integrity', `Frame of ${size} bytes exceeds the ${maxSize} byte limit`);
    this.size = size;
    this.maxSize = maxSize;
  }
}

export class StoreUnavailableError extends TurnstileGatewayError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('STORE_UNAVAILABLE', 'store', `Access store failed during ${operation}`, { cause });
    this.operation = operation;
  }
}

export class RemoteAuthorityError extends TurnstileGatewayError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super('REMOTE_AUTHORITY_FAILED', 'remote', `Remote authority failed after ${attempts} attempt(s)`, { cause });
    this.attempts = attempts;
  }
}

export class RemoteTimeoutError extends TurnstileGatewayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('REMOTE_TIMEOUT', 'remote', `Remote authority did not answer within ${timeoutMs} ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidStateTransitionError extends TurnstileGatewayError {
  readonly deviceId: string;

  readonly from: string;

  readonly to: string;

  readonly event: string;

  constructor(deviceId: string, from: string, to: string, event: string) {
    super(
      'INVALID_STATE_TRANSITION',
      'state',
      `Turnstile ${deviceId}: event ${event} cannot move ${from} to ${to}`
    );
    this.deviceId = deviceId;
    this.from = from;
    this.to = to;
    this.event = event;
  }
}

export class ConfigError extends TurnstileGatewayError {
  constructor(message: string) {
    super('CONFIG_ERROR', 'config', message);
  }
}
