import { InvalidMessageFormatError } from '../errors.js';
import { commandToCode, parseCommandCode, type CommandKind } from './commands.js';
import { DELIMITER_DEVICE, DELIMITER_FIELD, PROTOCOL_ID } from './constants.js';
import { DeviceId } from './deviceId.js';
import { validateField, validateFieldLengths, validateFields } from './fields.js';

export interface Message {
  deviceId: DeviceId;
  command: CommandKind;
  fields: string[];
}

const PROTOCOL_PREFIX = `${PROTOCOL_ID}${DELIMITER_DEVICE}`;

/**
 * Renders `<id>+REON+<code>` followed by `]field` per field and a closing `]`
 * when there is at least one field.
 */
export const formatMessage = (message: Message): string => {
  const header = `${message.deviceId.toString()}${DELIMITER_DEVICE}${PROTOCOL_PREFIX}${commandToCode(message.command)}`;
  if (message.fields.length === 0) {
    return header;
  }

  return `${header}${message.fields.map((field) => `${DELIMITER_FIELD}${field}`).join('')}${DELIMITER_FIELD}`;
};

const splitFields = (text: string): string[] => {
  if (text === '') {
    return [];
  }

  const segments = text.split(DELIMITER_FIELD);
  if (segments[segments.length - 1] === '') {
    segments.pop();
  }

  return segments;
};

/**
 * Inverse of {@link formatMessage}. The command code is everything between the
 * `REON+` prefix and the first `]`, so codes carrying `+` survive intact.
 */
export const parseMessage = (input: string): Message => {
  const text = input.trim();
  if (text === '') {
    throw new InvalidMessageFormatError('EMPTY_MESSAGE', 'Empty message');
  }

  const headerEnd = text.indexOf(DELIMITER_DEVICE);
  if (headerEnd === 0) {
    throw new InvalidMessageFormatError('MISSING_DEVICE_ID', 'Missing device ID');
  }
  if (headerEnd < 0) {
    throw new InvalidMessageFormatError('MISSING_PROTOCOL_ID', `Missing protocol ID in '${text}'`);
  }

  const deviceId = DeviceId.parse(text.slice(0, headerEnd));

  const rest = text.slice(headerEnd + 1);
  if (!rest.startsWith(PROTOCOL_PREFIX)) {
    throw new InvalidMessageFormatError(
      'MISSING_PROTOCOL_ID',
      `Expected '${PROTOCOL_PREFIX}' after device ID, got '${rest.slice(0, PROTOCOL_PREFIX.length)}'`
    );
  }

  const body = rest.slice(PROTOCOL_PREFIX.length);
  const fieldsStart = body.indexOf(DELIMITER_FIELD);
  const commandText = fieldsStart < 0 ? body : body.slice(0, fieldsStart);
  if (commandText === '') {
    throw new InvalidMessageFormatError('MISSING_COMMAND', 'Missing command code');
  }

  const command = parseCommandCode(commandText);
  const fields = fieldsStart < 0 ? [] : splitFields(body.slice(fieldsStart + 1));
  validateFieldLengths(fields);
  validateFields(fields);

  return { deviceId, command, fields };
};

export const messagesEqual = (left: Message, right: Message): boolean =>
  left.deviceId.equals(right.deviceId) &&
  left.command === right.command &&
  left.fields.length === right.fields.length &&
  left.fields.every((field, index) => field === right.fields[index]);

export class MessageBuilder {
  private readonly fieldValues: string[] = [];

  constructor(
    private readonly deviceId: DeviceId,
    private readonly command: CommandKind
  ) {}

  field(value: string | number): this {
    const text = String(value);
    validateField(text, this.fieldValues.length);
    this.fieldValues.push(text);
    return this;
  }

  fields(values: ReadonlyArray<string | number>): this {
    values.forEach((value) => this.field(value));
    return this;
  }

  build(): Message {
    validateFieldLengths(this.fieldValues);
    return { deviceId: this.deviceId, command: this.command, fields: [...this.fieldValues] };
  }

  toString(): string {
    return formatMessage(this.build());
  }
}
