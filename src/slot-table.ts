import type { ConnectionSlot, RawConnection } from './internal/interfaces';
import { DEFAULT_MAX_CONNECTIONS } from './internal/interfaces';

/**
 * Fixed arena of connection slots indexed 0..capacity-1.
 *
 * A slot holds a non-owning reference to its connection; the engine owns the
 * connection's lifetime. The slot is also stored as the connection's context
 * so later events find it without a scan.
 */
export class ConnectionSlotTable {
  private readonly slots: ConnectionSlot[];
  private active = 0;

  constructor(capacity: number = DEFAULT_MAX_CONNECTIONS) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('Slot table capacity must be a positive integer');
    }

    this.slots = [];
    for (let id = 0; id < capacity; id++) {
      this.slots.push({
        id,
        connection: null,
        lastRecvTime: 0,
        bytesTotal: 0,
        buffersTotal: 0,
        connected: false,
      });
    }
  }

  /**
   * Bind the first free slot to `connection`.
   * Linear scan from index 0, so assignment is deterministic.
   *
   * @returns The bound slot, or null if the table is full
   */
  public reserve(connection: RawConnection): ConnectionSlot | null {
    for (const slot of this.slots) {
      if (slot.connection === null) {
        slot.connection = connection;
        connection.context = slot;
        this.active++;
        return slot;
      }
    }
    return null;
  }

  /**
   * Unbind a slot and zero its counters so it can be reused.
   */
  public release(slot: ConnectionSlot): void {
    if (slot.connection === null) return;

    slot.connection.context = undefined;
    slot.connection = null;
    slot.lastRecvTime = 0;
    slot.bytesTotal = 0;
    slot.buffersTotal = 0;
    slot.connected = false;
    this.active--;
  }

  /**
   * O(1) lookup through the connection's context.
   * A context pointing at a slot that now serves someone else resolves to undefined.
   */
  public slotOf(connection: RawConnection): ConnectionSlot | undefined {
    const slot = connection.context;
    if (slot && this.slots[slot.id] === slot && slot.connection === connection) {
      return slot;
    }
    return undefined;
  }

  public forEachActive(fn: (slot: ConnectionSlot, connection: RawConnection) => void): void {
    for (const slot of this.slots) {
      if (slot.connection !== null) fn(slot, slot.connection);
    }
  }

  public activeCount(): number {
    return this.active;
  }

  public get capacity(): number {
    return this.slots.length;
  }
}
