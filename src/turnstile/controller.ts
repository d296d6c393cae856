import type { Logger } from 'pino';

import { logger as rootLogger } from '../logger.js';
import type { DeviceId } from '../protocol/deviceId.js';
import { RotationTimer } from './rotationTimer.js';
import type { TransitionRecord, TurnstileEvent, TurnstileStateMachine } from './stateMachine.js';

/**
 * Drives the state machine from protocol traffic and owns the rotation timer.
 * Every finished cycle (completed or timed out) is reset to IDLE straight away
 * so the turnstile is ready for the next credential.
 */
export class TurnstileController {
  private readonly timer: RotationTimer;

  private readonly log: Logger;

  constructor(
    readonly machine: TurnstileStateMachine,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: 'turnstile' });
    this.timer = new RotationTimer(machine.rotationTimeoutMs, (deviceId) => this.expire(deviceId));
  }

  grant(deviceId: DeviceId): TransitionRecord {
    const record = this.machine.apply(deviceId, 'GRANT');
    this.timer.arm(deviceId);
    return record;
  }

  /**
   * Applies a status reported by the device. WAITING only acknowledges the
   * pending rotation; COMPLETED and TIMEOUT close the cycle.
   */
  report(deviceId: DeviceId, event: Exclude<TurnstileEvent, 'GRANT' | 'RESET'>): TransitionRecord[] {
    const record = this.machine.apply(deviceId, event);
    if (event === 'WAITING') {
      return [record];
    }

    this.timer.disarm(deviceId);
    return [record, this.machine.apply(deviceId, 'RESET')];
  }

  /**
   * A new credential while a rotation is still pending means the previous
   * user never went through. Returns true when such a cycle was closed.
   */
  recoverStale(deviceId: DeviceId): boolean {
    if (this.machine.state(deviceId) !== 'WAITING_ROTATION') {
      return false;
    }

    this.timer.disarm(deviceId);
    this.machine.apply(deviceId, 'TIMEOUT');
    this.machine.apply(deviceId, 'RESET');
    this.log.warn({ deviceId: deviceId.toString() }, 'Closed stale rotation before new access request');
    return true;
  }

  isTimerArmed(deviceId: DeviceId): boolean {
    return this.timer.isArmed(deviceId);
  }

  close(): void {
    this.timer.disarmAll();
  }

  private expire(deviceId: DeviceId): void {
    if (this.machine.state(deviceId) !== 'WAITING_ROTATION') {
      return;
    }

    this.machine.apply(deviceId, 'TIMEOUT');
    this.machine.apply(deviceId, 'RESET');
    this.log.info(
      { deviceId: deviceId.toString(), timeoutMs: this.machine.rotationTimeoutMs },
      'Rotation timed out without a status from the device'
    );
  }
}
