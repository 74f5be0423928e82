import type { RawBufferPool } from './buffer-pool';
import type { IdleController } from './idle-controller';
import { AllocationError, formatCondition } from './internal/errors';
import type { ConnectionSlot, EventEngine, Logger, OutputSink, RawBuffer, RawConnection } from './internal/interfaces';
import type { ConnectionSlotTable } from './slot-table';

export type ConnectionPhase = 'connecting' | 'connected' | 'draining' | 'closed';

/**
 * Per-connection echo logic.
 *
 * Read buffers come back filled, their payload goes to the sink, and the same
 * buffers are written back on the connection. Written buffers are recycled
 * for reading while the read side is open. Once both sides are closed every
 * returned buffer is disposed.
 */
export class EchoPipeline {
  private phases = new WeakMap<RawConnection, ConnectionPhase>();

  constructor(
    private engine: EventEngine,
    private pool: RawBufferPool,
    private slots: ConnectionSlotTable,
    private controller: IdleController,
    private logger: Logger,
    private sink: OutputSink,
    private batchSize: number,
  ) {}

  public phaseOf(connection: RawConnection): ConnectionPhase | undefined {
    return this.phases.get(connection);
  }

  public track(connection: RawConnection, phase: ConnectionPhase): void {
    if (!this.phases.has(connection)) this.phases.set(connection, phase);
  }

  public onConnected(connection: RawConnection): void {
    const phase = this.phases.get(connection);
    if (phase === 'draining' || phase === 'closed') return;
    this.phases.set(connection, 'connected');

    const slot = this.slots.slotOf(connection);
    if (!slot) {
      this.logger.log('[echo] connection connected without a slot, ignoring');
      return;
    }

    this.logger.log(`[echo] connection ${slot.id} connected`);
    slot.connected = true;
    this.controller.recordConnect();

    let buffers: RawBuffer[];
    try {
      buffers = this.pool.allocate(this.batchSize);
    } catch (error) {
      if (!(error instanceof AllocationError)) throw error;
      this.logger.error(`[echo] connection ${slot.id}: ${error.message}`);
      this.drain(connection);
      return;
    }

    this.giveForRead(connection, buffers);
  }

  public onRead(connection: RawConnection): void {
    const slot = this.slots.slotOf(connection);
    if (slot) slot.lastRecvTime = this.engine.now();

    let buffers = connection.takeReadBuffers(this.batchSize);
    while (buffers.length > 0) {
      for (const buffer of buffers) {
        this.pool.reclaim(buffer, 'read');
        if (slot) slot.bytesTotal += buffer.size;
        if (buffer.size > 0) {
          this.sink(buffer.bytes.subarray(buffer.offset, buffer.offset + buffer.size));
        }
      }
      if (slot) slot.buffersTotal += buffers.length;

      if (!connection.isWriteClosed()) {
        for (const buffer of buffers) this.pool.release(buffer, 'ready-to-write');
        connection.writeBuffers(buffers);
      } else if (!connection.isReadClosed()) {
        this.giveForRead(connection, buffers);
      } else {
        this.dispose(buffers);
      }

      buffers = connection.takeReadBuffers(this.batchSize);
    }
  }

  public onWritten(connection: RawConnection): void {
    let buffers = connection.takeWrittenBuffers(this.batchSize);
    while (buffers.length > 0) {
      for (const buffer of buffers) this.pool.reclaim(buffer, 'write');

      if (!connection.isReadClosed()) {
        this.giveForRead(connection, buffers);
      } else {
        this.dispose(buffers);
      }

      buffers = connection.takeWrittenBuffers(this.batchSize);
    }
  }

  // No half-duplex echo: either side closing closes both
  public onClosed(connection: RawConnection): void {
    this.drain(connection);
  }

  public onWake(connection: RawConnection): void {
    const slot = this.slots.slotOf(connection);
    if (slot) this.logger.log(`[echo] connection ${slot.id} woken`);
  }

  public onDisconnected(connection: RawConnection): void {
    this.phases.set(connection, 'closed');

    const slot = this.slots.slotOf(connection);
    if (slot) {
      this.logger.log(
        `[echo] connection ${slot.id} disconnected: bytes: ${slot.bytesTotal}, buffers: ${slot.buffersTotal}`,
      );
    } else {
      this.logger.log('[echo] connection without a slot disconnected');
    }

    if (connection.condition) {
      this.logger.error(formatCondition('connection-disconnected', connection.condition));
    }

    // Whatever the transport still hands back at teardown is freed here
    this.dispose(connection.takeReadBuffers(Infinity).map((b) => this.pool.reclaim(b, 'read')));
    this.dispose(connection.takeWrittenBuffers(Infinity).map((b) => this.pool.reclaim(b, 'write')));

    if (slot) this.release(slot);
  }

  private release(slot: ConnectionSlot) {
    if (slot.connected) this.controller.recordDisconnect();
    this.slots.release(slot);
  }

  private drain(connection: RawConnection) {
    if (this.phases.get(connection) !== 'closed') {
      this.phases.set(connection, 'draining');
    }
    connection.close();
  }

  private giveForRead(connection: RawConnection, buffers: RawBuffer[]) {
    for (const buffer of buffers) this.pool.release(buffer, 'give-for-read');
    connection.giveReadBuffers(buffers);
  }

  private dispose(buffers: RawBuffer[]) {
    for (const buffer of buffers) this.pool.release(buffer, 'dispose');
  }
}
