import type { ReaderType } from '../types.js';

// Shown verbatim on the reader LCD: ASCII only, at most 40 characters.
export const DISPLAY_MESSAGES = {
  CARD_NOT_FOUND: 'Cartao nao cadastrado',
  CODE_NOT_FOUND: 'Codigo nao cadastrado',
  CARD_INACTIVE: 'Cartao inativo',
  CARD_EXPIRED: 'Cartao fora do periodo de validade',
  USER_NOT_FOUND: 'Usuario nao encontrado',
  USER_INACTIVE: 'Usuario inativo',
  USER_EXPIRED: 'Usuario fora do periodo de validade',
  CARD_ACCESS_DENIED: 'Acesso por cartao nao permitido',
  BIO_ACCESS_DENIED: 'Acesso biometrico nao permitido',
  KEYPAD_ACCESS_DENIED: 'Acesso por teclado nao permitido',
  ANTI_PASSBACK: 'Bloqueio por anti-dupla',
  ACCESS_GRANTED: 'Acesso liberado',
  ACCESS_DENIED: 'Acesso negado'
} as const;

export type DisplayMessage = (typeof DISPLAY_MESSAGES)[keyof typeof DISPLAY_MESSAGES];

export const methodDeniedMessage = (readerType: ReaderType): DisplayMessage => {
  switch (readerType) {
    case 'BIOMETRIC':
      return DISPLAY_MESSAGES.BIO_ACCESS_DENIED;
    case 'KEYPAD':
      return DISPLAY_MESSAGES.KEYPAD_ACCESS_DENIED;
    default:
      return DISPLAY_MESSAGES.CARD_ACCESS_DENIED;
  }
};
