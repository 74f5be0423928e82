import type { GlobalCounters } from './internal/interfaces';
import { DEFAULT_IDLE_TIMEOUT_MS, DEFAULT_WAKE_INTERVAL_MS } from './internal/interfaces';

export type TimeoutDecision =
  | { action: 'shutdown' }
  | { action: 'idle'; delayMs: number; idleSince: number; firstObservation: boolean }
  | { action: 'sweep'; delayMs: number }
  | { action: 'rearm'; delayMs: number };

/**
 * Owns the global connect/disconnect counters and decides, on every timer
 * firing, whether to sweep active connections, keep counting down an idle
 * window, or stop accepting work.
 *
 * It never closes anything itself; the caller carries out the decision.
 */
export class IdleController {
  private readonly wakeIntervalMs: number;
  private readonly idleTimeoutMs: number;

  private counters: GlobalCounters = {
    connects: 0,
    disconnects: 0,
    firstIdleTime: 0,
    nextWakeDeadline: 0,
  };
  private shutdownDecided = false;

  constructor({
    wakeIntervalMs = DEFAULT_WAKE_INTERVAL_MS,
    idleTimeoutMs = DEFAULT_IDLE_TIMEOUT_MS,
  }: { wakeIntervalMs?: number; idleTimeoutMs?: number } = {}) {
    this.wakeIntervalMs = wakeIntervalMs;
    this.idleTimeoutMs = idleTimeoutMs;
  }

  public recordConnect(): void {
    this.counters.connects++;
  }

  public recordDisconnect(): void {
    if (this.counters.disconnects >= this.counters.connects) {
      throw new Error('Disconnect recorded without a matching connect');
    }
    this.counters.disconnects++;
  }

  public activeConnections(): number {
    return this.counters.connects - this.counters.disconnects;
  }

  /**
   * A slot was reserved: the service is no longer idle.
   * @returns true when a keepalive sweep must be armed now
   */
  public onAdmitted(now: number): boolean {
    this.counters.firstIdleTime = 0;
    if (this.counters.nextWakeDeadline < now) {
      this.counters.nextWakeDeadline = now + this.wakeIntervalMs;
      return true;
    }
    return false;
  }

  public onTimeout(now: number): TimeoutDecision {
    if (this.shutdownDecided) return { action: 'shutdown' };

    if (this.activeConnections() === 0) {
      if (this.counters.firstIdleTime === 0) {
        this.counters.firstIdleTime = now;
        return { action: 'idle', delayMs: this.idleTimeoutMs, idleSince: now, firstObservation: true };
      }
      if (now - this.counters.firstIdleTime >= this.idleTimeoutMs) {
        this.shutdownDecided = true;
        return { action: 'shutdown' };
      }
      return {
        action: 'idle',
        delayMs: this.idleTimeoutMs,
        idleSince: this.counters.firstIdleTime,
        firstObservation: false,
      };
    }

    if (now >= this.counters.nextWakeDeadline) {
      this.counters.nextWakeDeadline = now + this.wakeIntervalMs;
      return { action: 'sweep', delayMs: this.wakeIntervalMs };
    }

    return { action: 'rearm', delayMs: this.wakeIntervalMs };
  }

  public isShuttingDown(): boolean {
    return this.shutdownDecided;
  }

  public get wakeInterval(): number {
    return this.wakeIntervalMs;
  }

  public getCounters(): Readonly<GlobalCounters> {
    return { ...this.counters };
  }
}
