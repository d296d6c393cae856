import { InvalidFieldFormatError } from '../errors.js';
import { MAX_FIELD_COUNT, MAX_FIELD_LENGTH, RESERVED_FIELD_CHARACTERS } from './constants.js';

export const validateField = (field: string, index = 0): void => {
  const reserved = RESERVED_FIELD_CHARACTERS.find((character) => field.includes(character));
  if (reserved !== undefined) {
    throw new InvalidFieldFormatError(
      index,
      field,
      `Field ${index} ('${field}') contains reserved protocol delimiter '${reserved}'`
    );
  }
};

export const validateFields = (fields: readonly string[]): void => {
  fields.forEach((field, index) => validateField(field, index));
};

// Caps memory spent on a single hostile frame.
export const validateFieldLengths = (
  fields: readonly string[],
  maxLength: number = MAX_FIELD_LENGTH,
  maxCount: number = MAX_FIELD_COUNT
): void => {
  if (fields.length > maxCount) {
    throw new InvalidFieldFormatError(
      maxCount,
      '',
      `Message carries ${fields.length} fields, limit is ${maxCount}`,
      maxCount
    );
  }

  fields.forEach((field, index) => {
    const size = Buffer.byteLength(field, 'utf8');
    if (size > maxLength) {
      throw new InvalidFieldFormatError(
        index,
        field,
        `Field ${index} exceeds maximum length ${maxLength} (got ${size} bytes)`,
        maxLength
      );
    }
  });
};
