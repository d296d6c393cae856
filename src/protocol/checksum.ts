import { ConfigError } from '../errors.js';

/**
 * Integrity value appended to every frame payload. The value is rendered as
 * `width` printable ASCII bytes so it can never collide with STX/ETX.
 */
export interface IntegrityCheck {
  readonly name: IntegrityCheckName;
  readonly width: number;
  compute(payload: Uint8Array): Buffer;
}

export type IntegrityCheckName = 'xor8' | 'sum8' | 'crc16';

const toHex = (value: number, width: number): Buffer =>
  Buffer.from(value.toString(16).toUpperCase().padStart(width, '0'), 'ascii');

export const xor8: IntegrityCheck = {
  name: 'xor8',
  width: 2,
  compute(payload) {
    let value = 0;
    for (const byte of payload) {
      value ^= byte;
    }
    return toHex(value, 2);
  }
};

export const sum8: IntegrityCheck = {
  name: 'sum8',
  width: 2,
  compute(payload) {
    let value = 0;
    for (const byte of payload) {
      value = (value + byte) & 0xff;
    }
    return toHex(value, 2);
  }
};

// CRC-16/CCITT-FALSE: poly 0x1021, init 0xFFFF, no reflection.
export const crc16: IntegrityCheck = {
  name: 'crc16',
  width: 4,
  compute(payload) {
    let crc = 0xffff;
    for (const byte of payload) {
      crc ^= byte << 8;
      for (let bit = 0; bit < 8; bit += 1) {
        crc = crc & 0x8000 ? ((crc << 1) ^ 0x1021) & 0xffff : (crc << 1) & 0xffff;
      }
    }
    return toHex(crc, 4);
  }
};

const checks: Record<IntegrityCheckName, IntegrityCheck> = { xor8, sum8, crc16 };

export const isIntegrityCheckName = (value: string): value is IntegrityCheckName => Object.hasOwn(checks, value);

export const integrityCheckByName = (name: string): IntegrityCheck => {
  const normalized = name.trim().toLowerCase();
  if (!isIntegrityCheckName(normalized)) {
    throw new ConfigError(`Unknown integrity check '${name}' (expected xor8, sum8 or crc16)`);
  }

  return checks[normalized];
};
