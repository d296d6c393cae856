import type { DeviceId } from '../protocol/deviceId.js';

/**
 * One pending timeout per device. Re-arming replaces the previous timer, so a
 * device never holds more than one.
 */
export class RotationTimer {
  private readonly timers = new Map<number, NodeJS.Timeout>();

  constructor(
    private readonly timeoutMs: number,
    private readonly onTimeout: (deviceId: DeviceId) => void
  ) {}

  arm(deviceId: DeviceId): void {
    this.disarm(deviceId);
    const timer = setTimeout(() => {
      this.timers.delete(deviceId.value);
      this.onTimeout(deviceId);
    }, this.timeoutMs);
    timer.unref();
    this.timers.set(deviceId.value, timer);
  }

  disarm(deviceId: DeviceId): boolean {
    const timer = this.timers.get(deviceId.value);
    if (!timer) {
      return false;
    }
    clearTimeout(timer);
    this.timers.delete(deviceId.value);
    return true;
  }

  isArmed(deviceId: DeviceId): boolean {
    return this.timers.has(deviceId.value);
  }

  disarmAll(): void {
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
  }
}
