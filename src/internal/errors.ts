import type { BufferState, EngineEventType, TransportCondition } from './interfaces';

/**
 * Raised when a batch of buffers cannot be allocated.
 * Fatal for the connection that asked, never for the service.
 */
export class AllocationError extends Error {
  constructor(
    message: string,
    public readonly requested: number,
  ) {
    super(message);
    this.name = 'AllocationError';
  }
}

/**
 * Raised on an illegal buffer hand-off, e.g. handing out a buffer the
 * transport still owns or touching one that was already disposed.
 */
export class OwnershipError extends Error {
  constructor(
    message: string,
    public readonly state: BufferState,
  ) {
    super(message);
    this.name = 'OwnershipError';
  }
}

/**
 * One-line report of a transport condition with the event it came with.
 */
export function formatCondition(eventType: EngineEventType, condition: TransportCondition): string {
  return `${eventType}: ${condition.name}: ${condition.description}`;
}
