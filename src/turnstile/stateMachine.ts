import { InvalidStateTransitionError } from '../errors.js';
import type { CommandKind } from '../protocol/commands.js';
import type { DeviceId } from '../protocol/deviceId.js';

export type TurnstileState = 'IDLE' | 'WAITING_ROTATION' | 'ROTATION_COMPLETED' | 'ROTATION_TIMEOUT';

export type TurnstileEvent = 'GRANT' | 'WAITING' | 'COMPLETED' | 'TIMEOUT' | 'RESET';

export interface TransitionRecord {
  from: TurnstileState;
  to: TurnstileState;
  event: TurnstileEvent;
  at: Date;
}

export interface TurnstileSnapshot {
  deviceId: string;
  state: TurnstileState;
  since: Date;
  transitions: number;
}

export const DEFAULT_HISTORY_LIMIT = 100;

export const DEFAULT_ROTATION_TIMEOUT_MS = 10000;

const TRANSITIONS: Record<TurnstileState, Partial<Record<TurnstileEvent, TurnstileState>>> = {
  IDLE: { GRANT: 'WAITING_ROTATION' },
  WAITING_ROTATION: {
    WAITING: 'WAITING_ROTATION',
    COMPLETED: 'ROTATION_COMPLETED',
    TIMEOUT: 'ROTATION_TIMEOUT'
  },
  ROTATION_COMPLETED: { RESET: 'IDLE' },
  ROTATION_TIMEOUT: { RESET: 'IDLE' }
};

// The state each event leads to when the table allows it.
const EVENT_TARGETS: Record<TurnstileEvent, TurnstileState> = {
  GRANT: 'WAITING_ROTATION',
  WAITING: 'WAITING_ROTATION',
  COMPLETED: 'ROTATION_COMPLETED',
  TIMEOUT: 'ROTATION_TIMEOUT',
  RESET: 'IDLE'
};

export const nextState = (from: TurnstileState, event: TurnstileEvent): TurnstileState | undefined =>
  TRANSITIONS[from][event];

export const eventForCommand = (kind: CommandKind): TurnstileEvent | null => {
  switch (kind) {
    case 'WaitingRotation':
      return 'WAITING';
    case 'RotationCompleted':
      return 'COMPLETED';
    case 'RotationTimeout':
      return 'TIMEOUT';
    default:
      return null;
  }
};

interface DeviceEntry {
  state: TurnstileState;
  since: Date;
  history: TransitionRecord[];
  transitions: number;
}

export interface TurnstileStateMachineOptions {
  rotationTimeoutMs: number;
  historyLimit: number;
  clock: () => Date;
}

/**
 * Rotation lifecycle for every turnstile on the link, keyed by device id.
 * The machine only validates and records transitions; timing out a pending
 * rotation is the job of {@link RotationTimer}.
 */
export class TurnstileStateMachine {
  private readonly devices = new Map<number, DeviceEntry>();

  readonly rotationTimeoutMs: number;

  readonly historyLimit: number;

  private readonly clock: () => Date;

  constructor(options: Partial<TurnstileStateMachineOptions> = {}) {
    this.rotationTimeoutMs = options.rotationTimeoutMs ?? DEFAULT_ROTATION_TIMEOUT_MS;
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.clock = options.clock ?? (() => new Date());
  }

  static builder(): TurnstileStateMachineBuilder {
    return new TurnstileStateMachineBuilder();
  }

  private entry(deviceId: DeviceId): DeviceEntry {
    let entry = this.devices.get(deviceId.value);
    if (!entry) {
      entry = { state: 'IDLE', since: this.clock(), history: [], transitions: 0 };
      this.devices.set(deviceId.value, entry);
    }
    return entry;
  }

  state(deviceId: DeviceId): TurnstileState {
    return this.devices.get(deviceId.value)?.state ?? 'IDLE';
  }

  canApply(deviceId: DeviceId, event: TurnstileEvent): boolean {
    return nextState(this.state(deviceId), event) !== undefined;
  }

  apply(deviceId: DeviceId, event: TurnstileEvent): TransitionRecord {
    const entry = this.entry(deviceId);
    const to = nextState(entry.state, event);
    if (to === undefined) {
      throw new InvalidStateTransitionError(deviceId.toString(), entry.state, EVENT_TARGETS[event], event);
    }

    const record: TransitionRecord = { from: entry.state, to, event, at: this.clock() };
    if (to !== entry.state) {
      entry.since = record.at;
    }
    entry.state = to;
    entry.transitions += 1;
    entry.history.push(record);
    if (entry.history.length > this.historyLimit) {
      entry.history.splice(0, entry.history.length - this.historyLimit);
    }

    return record;
  }

  history(deviceId: DeviceId): readonly TransitionRecord[] {
    return [...(this.devices.get(deviceId.value)?.history ?? [])];
  }

  snapshot(): TurnstileSnapshot[] {
    return [...this.devices.entries()]
      .sort(([left], [right]) => left - right)
      .map(([id, entry]) => ({
        deviceId: String(id).padStart(2, '0'),
        state: entry.state,
        since: entry.since,
        transitions: entry.transitions
      }));
  }

  forget(deviceId: DeviceId): void {
    this.devices.delete(deviceId.value);
  }
}

export class TurnstileStateMachineBuilder {
  private readonly options: Partial<TurnstileStateMachineOptions> = {};

  rotationTimeoutMs(value: number): this {
    this.options.rotationTimeoutMs = value;
    return this;
  }

  historyLimit(value: number): this {
    this.options.historyLimit = value;
    return this;
  }

  clock(value: () => Date): this {
    this.options.clock = value;
    return this;
  }

  build(): TurnstileStateMachine {
    return new TurnstileStateMachine(this.options);
  }
}
