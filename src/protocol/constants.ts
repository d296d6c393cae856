export const START_BYTE = 0x02;
export const END_BYTE = 0x03;

export const PROTOCOL_ID = 'REON';

export const DELIMITER_DEVICE = '+';
export const DELIMITER_FIELD = ']';
export const DELIMITER_SUBFIELD = '[';
export const RESERVED_FIELD_CHARACTERS = [DELIMITER_FIELD, DELIMITER_DEVICE, DELIMITER_SUBFIELD] as const;

export const MIN_DEVICE_ID = 1;
export const MAX_DEVICE_ID = 99;

export const MAX_FIELD_LENGTH = 256;
export const MAX_FIELD_COUNT = 256;

export const MIN_CARD_LENGTH = 3;
export const MAX_CARD_LENGTH = 20;

export const MAX_DISPLAY_MESSAGE_LENGTH = 40;

export const DEFAULT_MAX_FRAME_SIZE = 64 * 1024;

// Seconds the reader keeps the decision on its display.
export const DEFAULT_GRANT_DISPLAY_SECONDS = 5;
export const DEFAULT_DENY_DISPLAY_SECONDS = 0;

export const DEFAULT_ONLINE_TIMEOUT_MS = 3000;
export const MIN_ONLINE_TIMEOUT_MS = 500;
export const MAX_ONLINE_TIMEOUT_MS = 10000;
