import { AllocationError, OwnershipError } from './internal/errors';
import type {
  BufferDisposition,
  BufferMetrics,
  BufferState,
  RawBuffer,
  TransferDirection,
} from './internal/interfaces';
import { DEFAULT_BUFFER_CAPACITY } from './internal/interfaces';

const STATE_FOR_DISPOSITION: Record<BufferDisposition, BufferState> = {
  'give-for-read': 'given-for-read',
  'ready-to-write': 'ready-to-write',
  dispose: 'disposed',
};

const STATE_FOR_DIRECTION: Record<TransferDirection, BufferState> = {
  read: 'given-for-read',
  write: 'ready-to-write',
};

/**
 * RawBufferPool - fixed-capacity byte buffers with tagged ownership
 *
 * Every buffer carries its ownership state. The application may only touch a
 * buffer while it is `free`; once released to the transport it stays there
 * until `reclaim` is called for the matching completion.
 *
 * ```typescript
 * const pool = new RawBufferPool({ capacity: 1024 });
 * const buffers = pool.allocate(4);
 * buffers.forEach((b) => pool.release(b, 'give-for-read'));
 * connection.giveReadBuffers(buffers);
 * // ... later, on a read event
 * for (const b of connection.takeReadBuffers(4)) pool.reclaim(b, 'read');
 * ```
 */
export class RawBufferPool {
  private readonly capacity: number;
  private readonly maxBuffers: number;

  private counts: Record<BufferState, number> = {
    free: 0,
    'given-for-read': 0,
    'ready-to-write': 0,
    disposed: 0,
  };
  private allocatedTotal = 0;

  constructor({ capacity = DEFAULT_BUFFER_CAPACITY, maxBuffers = Infinity }: { capacity?: number; maxBuffers?: number } = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('Buffer capacity must be a positive integer');
    }
    if (maxBuffers !== Infinity && (!Number.isInteger(maxBuffers) || maxBuffers < 0)) {
      throw new Error('maxBuffers must be a non-negative integer');
    }

    this.capacity = capacity;
    this.maxBuffers = maxBuffers;
  }

  /**
   * Allocate exactly `n` free buffers, or none at all.
   * @throws AllocationError when the live-buffer limit or memory is exhausted
   */
  public allocate(n: number): RawBuffer[] {
    if (this.liveCount() + n > this.maxBuffers) {
      throw new AllocationError(
        `Cannot allocate ${n} buffers: ${this.liveCount()} of ${this.maxBuffers} in use`,
        n,
      );
    }

    const buffers: RawBuffer[] = [];
    try {
      for (let i = 0; i < n; i++) {
        buffers.push({
          bytes: new Uint8Array(this.capacity),
          capacity: this.capacity,
          size: 0,
          offset: 0,
          state: 'free',
        });
      }
    } catch (error) {
      // Nothing was counted yet, the partial batch is simply dropped
      const reason = error instanceof Error ? error.message : String(error);
      throw new AllocationError(`Cannot allocate ${n} buffers: ${reason}`, n);
    }

    this.counts.free += n;
    this.allocatedTotal += n;
    return buffers;
  }

  /**
   * Hand a free buffer over: to the transport for reading or writing, or
   * out of existence.
   */
  public release(buffer: RawBuffer, disposition: BufferDisposition): void {
    if (buffer.state !== 'free') {
      throw new OwnershipError(`Cannot ${disposition} a buffer that is ${buffer.state}`, buffer.state);
    }

    const next = STATE_FOR_DISPOSITION[disposition];
    if (disposition === 'give-for-read') {
      buffer.size = 0;
      buffer.offset = 0;
    }
    this.move(buffer, next);
  }

  /**
   * Take a buffer back from the transport after a read or write completion.
   */
  public reclaim(buffer: RawBuffer, direction: TransferDirection): RawBuffer {
    const expected = STATE_FOR_DIRECTION[direction];
    if (buffer.state !== expected) {
      throw new OwnershipError(
        `Buffer returned from ${direction} must be ${expected}, got ${buffer.state}`,
        buffer.state,
      );
    }

    this.move(buffer, 'free');
    return buffer;
  }

  public liveCount(): number {
    return this.allocatedTotal - this.counts.disposed;
  }

  public getMetrics(): BufferMetrics {
    return {
      live: this.liveCount(),
      free: this.counts.free,
      givenForRead: this.counts['given-for-read'],
      readyToWrite: this.counts['ready-to-write'],
      disposed: this.counts.disposed,
      allocated: this.allocatedTotal,
      capacity: this.capacity,
    };
  }

  private move(buffer: RawBuffer, next: BufferState) {
    this.counts[buffer.state]--;
    this.counts[next]++;
    buffer.state = next;
  }
}
