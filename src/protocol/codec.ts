import {
  ChecksumMismatchError,
  FrameTooLargeError,
  InvalidMessageFormatError,
  TurnstileGatewayError
} from '../errors.js';
import type { ByteAccumulator } from './byteAccumulator.js';
import { xor8, type IntegrityCheck } from './checksum.js';
import { DEFAULT_MAX_FRAME_SIZE, END_BYTE, START_BYTE } from './constants.js';
import { formatMessage, parseMessage, type Message } from './message.js';

export interface FrameCodecOptions {
  integrityCheck?: IntegrityCheck;
  maxFrameSize?: number;
}

/**
 * `skipped` counts bytes thrown away while looking for a start marker. Callers
 * surface it as a warning; it never makes the connection unusable.
 */
export type DecodeResult =
  | { kind: 'pending'; skipped: number }
  | { kind: 'frame'; message: Message; size: number; skipped: number }
  | { kind: 'error'; error: TurnstileGatewayError; skipped: number };

const isPrintableAscii = (bytes: Uint8Array): boolean => bytes.every((byte) => byte >= 0x20 && byte < 0x7f);

export class FrameCodec {
  readonly integrityCheck: IntegrityCheck;

  readonly maxFrameSize: number;

  constructor(options: FrameCodecOptions = {}) {
    this.integrityCheck = options.integrityCheck ?? xor8;
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
  }

  encode(message: Message): Buffer {
    const payload = Buffer.from(formatMessage(message), 'latin1');
    if (!isPrintableAscii(payload)) {
      throw new InvalidMessageFormatError('NON_ASCII_PAYLOAD', 'Outbound message must be printable ASCII');
    }

    const frame = Buffer.concat([
      Buffer.of(START_BYTE),
      payload,
      this.integrityCheck.compute(payload),
      Buffer.of(END_BYTE)
    ]);
    if (frame.length > this.maxFrameSize) {
      throw new FrameTooLargeError(frame.length, this.maxFrameSize);
    }

    return frame;
  }

  /**
   * Extracts at most one frame from the front of `buffer`. Call repeatedly
   * until it returns `pending` to drain a burst.
   */
  decode(buffer: ByteAccumulator): DecodeResult {
    let skipped = 0;

    for (;;) {
      const start = buffer.indexOf(START_BYTE);
      if (start < 0) {
        skipped += buffer.length;
        buffer.clear();
        return { kind: 'pending', skipped };
      }
      if (start > 0) {
        buffer.consume(start);
        skipped += start;
      }

      const end = buffer.indexOf(END_BYTE, 1);
      const restart = buffer.indexOf(START_BYTE, 1);

      // A new start marker before the end marker means the previous frame was cut short.
      if (restart > 0 && (end < 0 || restart < end)) {
        buffer.consume(restart);
        skipped += restart;
        continue;
      }

      if (end < 0) {
        if (buffer.length > this.maxFrameSize) {
          return this.rejectOversized(buffer, buffer.length, skipped);
        }
        return { kind: 'pending', skipped };
      }

      const size = end + 1;
      if (size > this.maxFrameSize) {
        return this.rejectOversized(buffer, size, skipped);
      }

      const frame = buffer.consume(size);
      return this.decodeFrame(frame.subarray(1, end), size, skipped);
    }
  }

  private decodeFrame(body: Buffer, size: number, skipped: number): DecodeResult {
    const { width } = this.integrityCheck;
    if (body.length <= width) {
      return {
        kind: 'error',
        error: new InvalidMessageFormatError('EMPTY_MESSAGE', `Frame body of ${body.length} bytes carries no payload`),
        skipped
      };
    }

    const payload = body.subarray(0, body.length - width);
    const received = body.subarray(body.length - width);
    if (!payload.every((byte) => byte < 0x80)) {
      return {
        kind: 'error',
        error: new InvalidMessageFormatError('NON_ASCII_PAYLOAD', 'Frame payload is not ASCII'),
        skipped
      };
    }

    const expected = this.integrityCheck.compute(payload);
    if (!expected.equals(received)) {
      return {
        kind: 'error',
        error: new ChecksumMismatchError(expected.toString('latin1'), received.toString('latin1')),
        skipped
      };
    }

    try {
      return { kind: 'frame', message: parseMessage(payload.toString('ascii')), size, skipped };
    } catch (error) {
      if (error instanceof TurnstileGatewayError) {
        return { kind: 'error', error, skipped };
      }
      throw error;
    }
  }

  private rejectOversized(buffer: ByteAccumulator, size: number, skipped: number): DecodeResult {
    const next = buffer.indexOf(START_BYTE, 1);
    if (next < 0) {
      buffer.clear();
    } else {
      buffer.consume(next);
    }

    return { kind: 'error', error: new FrameTooLargeError(size, this.maxFrameSize), skipped };
  }
}
