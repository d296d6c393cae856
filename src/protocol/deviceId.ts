import { InvalidMessageFormatError } from '../errors.js';
import { MAX_DEVICE_ID, MIN_DEVICE_ID } from './constants.js';

/**
 * Address of one reader on the bus. Always rendered as two digits on the wire.
 */
export class DeviceId {
  private constructor(readonly value: number) {}

  static of(value: number): DeviceId {
    if (!Number.isInteger(value) || value < MIN_DEVICE_ID || value > MAX_DEVICE_ID) {
      throw new InvalidMessageFormatError(
        'INVALID_DEVICE_ID',
        `Device ID must be ${MIN_DEVICE_ID}-${MAX_DEVICE_ID}, got ${value}`
      );
    }

    return new DeviceId(value);
  }

  static parse(text: string): DeviceId {
    const trimmed = text.trim();
    if (!/^\d{1,3}$/.test(trimmed)) {
      throw new InvalidMessageFormatError('INVALID_DEVICE_ID', `Invalid device ID '${text}'`);
    }

    return DeviceId.of(Number.parseInt(trimmed, 10));
  }

  equals(other: DeviceId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value.toString().padStart(2, '0');
  }

  toJSON(): string {
    return this.toString();
  }
}
