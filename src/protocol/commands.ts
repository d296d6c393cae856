import { InvalidCommandCodeError } from '../errors.js';

export const COMMAND_CODES = {
  AccessRequest: '000+0',
  GrantBoth: '00+1',
  GrantManual: '00+4',
  GrantEntry: '00+5',
  GrantExit: '00+6',
  DenyAccess: '00+30',
  WaitingRotation: '000+80',
  RotationCompleted: '000+81',
  RotationTimeout: '000+82',
  SendConfig: 'EC',
  SendCards: 'ECAR',
  SendUsers: 'EU',
  SendBiometrics: 'ED',
  SendDateTime: 'EH',
  ReceiveLogs: 'ER',
  ReceiveConfig: 'RC',
  QueryStatus: 'RQ'
} as const;

export type CommandKind = keyof typeof COMMAND_CODES;

export type CommandCodeText = (typeof COMMAND_CODES)[CommandKind];

const isCommandKind = (value: string): value is CommandKind => Object.hasOwn(COMMAND_CODES, value);

const kindsByCode: ReadonlyMap<string, CommandKind> = new Map(
  Object.keys(COMMAND_CODES)
    .filter(isCommandKind)
    .map((kind) => [COMMAND_CODES[kind], kind] as const)
);

export const ALL_COMMAND_KINDS: readonly CommandKind[] = [...kindsByCode.values()];

export const commandToCode = (kind: CommandKind): CommandCodeText => COMMAND_CODES[kind];

export const parseCommandCode = (text: string): CommandKind => {
  const kind = kindsByCode.get(text);
  if (!kind) {
    throw new InvalidCommandCodeError(text);
  }

  return kind;
};

const GRANT_COMMANDS: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'GrantBoth',
  'GrantManual',
  'GrantEntry',
  'GrantExit'
]);

const ROTATION_STATUS_COMMANDS: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'WaitingRotation',
  'RotationCompleted',
  'RotationTimeout'
]);

const MANAGEMENT_COMMANDS: ReadonlySet<CommandKind> = new Set<CommandKind>([
  'SendConfig',
  'SendCards',
  'SendUsers',
  'SendBiometrics',
  'SendDateTime',
  'ReceiveLogs',
  'ReceiveConfig'
]);

export const isGrantCommand = (kind: CommandKind): boolean => GRANT_COMMANDS.has(kind);

export const isAccessControlCommand = (kind: CommandKind): boolean =>
  kind === 'AccessRequest' || kind === 'DenyAccess' || GRANT_COMMANDS.has(kind);

export const isRotationStatusCommand = (kind: CommandKind): boolean => ROTATION_STATUS_COMMANDS.has(kind);

export const isManagementCommand = (kind: CommandKind): boolean => MANAGEMENT_COMMANDS.has(kind);
