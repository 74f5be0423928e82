import { EchoService } from './echo-service';
import type { EchoConfig, EventEngine } from './internal/interfaces';
import {
  DEFAULT_BUFFER_CAPACITY,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_MAX_CONNECTIONS,
  DEFAULT_READ_BUFFERS,
  DEFAULT_WAKE_INTERVAL_MS,
} from './internal/interfaces';

export type {
  BufferDisposition,
  BufferMetrics,
  BufferState,
  ConnectionSlot,
  EchoConfig,
  EchoStats,
  EngineEvent,
  EngineEventType,
  EventEngine,
  GlobalCounters,
  ListenerAddress,
  Logger,
  OutputSink,
  RawBuffer,
  RawConnection,
  RawListener,
  TransferDirection,
  TransportCondition,
} from './internal/interfaces';
export type { AdmissionResult, RejectReason } from './admission';
export type { ConnectionPhase } from './echo-pipeline';
export type { TimeoutDecision } from './idle-controller';
export { AllocationError, OwnershipError, formatCondition } from './internal/errors';
export { RawBufferPool } from './buffer-pool';
export { ConnectionSlotTable } from './slot-table';
export { IdleController } from './idle-controller';
export { ListenerAdmission } from './admission';
export { EchoPipeline } from './echo-pipeline';
export { EchoService };
export { NetProactor } from './engine/net-proactor';

const writeToStdout = (bytes: Uint8Array) => {
  // The buffer goes straight back to the transport, so the sink gets a copy
  process.stdout.write(Buffer.from(bytes));
};

/**
 * Create an echo service driven by `engine`.
 *
 * @param engine - Event engine delivering listener, connection and timer events
 * @param config - Optional limits and timings; defaults give 5 slots, 4 read
 *   buffers of 1024 bytes per connection, a 5s keepalive sweep and a 20s idle window
 *
 * @example
 * ```ts
 * const engine = new NetProactor();
 * engine.listen('', 5672);
 * const exitCode = await createEchoService(engine).run();
 * ```
 */
export function createEchoService(engine: EventEngine, config: EchoConfig = {}): EchoService {
  if (!engine) {
    throw new Error('An event engine is required');
  }

  const maxConnections = config.maxConnections ?? DEFAULT_MAX_CONNECTIONS;
  const readBuffers = config.readBuffers ?? DEFAULT_READ_BUFFERS;
  const bufferCapacity = config.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY;
  const maxBuffers = config.maxBuffers ?? Infinity;
  const wakeIntervalMs = config.wakeIntervalMs ?? DEFAULT_WAKE_INTERVAL_MS;
  const idleTimeoutMs = config.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;

  // Rule: at least one connection slot
  if (!Number.isInteger(maxConnections) || maxConnections < 1) {
    throw new Error('maxConnections must be a positive integer');
  }

  // Rule: a connection needs at least one read buffer to make progress
  if (!Number.isInteger(readBuffers) || readBuffers < 1) {
    throw new Error('readBuffers must be a positive integer');
  }

  if (!Number.isInteger(bufferCapacity) || bufferCapacity < 1) {
    throw new Error('bufferCapacity must be a positive integer');
  }

  // Rule: a limit below one batch would reject every connection
  if (maxBuffers !== Infinity && (!Number.isInteger(maxBuffers) || maxBuffers < readBuffers)) {
    throw new Error(`maxBuffers must be an integer >= readBuffers (${readBuffers})`);
  }

  // Rule: timer delays are whole, positive milliseconds
  if (!Number.isInteger(wakeIntervalMs) || wakeIntervalMs < 1) {
    throw new Error('wakeIntervalMs must be a positive integer');
  }

  if (!Number.isInteger(idleTimeoutMs) || idleTimeoutMs < 1) {
    throw new Error('idleTimeoutMs must be a positive integer');
  }

  return new EchoService(engine, {
    maxConnections,
    readBuffers,
    bufferCapacity,
    maxBuffers,
    wakeIntervalMs,
    idleTimeoutMs,
    logger: config.logger ?? console,
    sink: config.sink ?? writeToStdout,
  });
}
