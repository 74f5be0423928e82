export const DEFAULT_MAX_CONNECTIONS = 5;
export const DEFAULT_READ_BUFFERS = 4;
export const DEFAULT_BUFFER_CAPACITY = 1024;
export const DEFAULT_WAKE_INTERVAL_MS = 5000;
export const DEFAULT_IDLE_TIMEOUT_MS = 20000;

export type BufferState = 'free' | 'given-for-read' | 'ready-to-write' | 'disposed';

export type BufferDisposition = 'give-for-read' | 'ready-to-write' | 'dispose';

export type TransferDirection = 'read' | 'write';

export interface RawBuffer {
  readonly bytes: Uint8Array;
  readonly capacity: number;
  size: number;
  offset: number;
  state: BufferState;
}

export type BufferMetrics = {
  live: number;
  free: number;
  givenForRead: number;
  readyToWrite: number;
  disposed: number;
  allocated: number;
  capacity: number;
};

export type TransportCondition = {
  name: string;
  description: string;
};

export type ConnectionSlot = {
  readonly id: number;
  connection: RawConnection | null;
  lastRecvTime: number;
  bytesTotal: number;
  buffersTotal: number;
  // set once the connect has been counted
  connected: boolean;
};

export interface RawConnection {
  context: ConnectionSlot | undefined;
  readonly condition: TransportCondition | undefined;

  giveReadBuffers(buffers: RawBuffer[]): void;
  takeReadBuffers(max: number): RawBuffer[];
  writeBuffers(buffers: RawBuffer[]): void;
  takeWrittenBuffers(max: number): RawBuffer[];

  isReadClosed(): boolean;
  isWriteClosed(): boolean;
  close(): void;
  wake(): void;
}

export interface RawListener {
  readonly condition: TransportCondition | undefined;
  accept(connection: RawConnection): void;
  close(): void;
}

export type ListenerAddress = {
  host: string;
  port: number;
};

export type EngineEvent =
  | { type: 'listener-open'; listener: RawListener; address: ListenerAddress }
  | { type: 'listener-accept'; listener: RawListener }
  | { type: 'listener-close'; listener: RawListener }
  | { type: 'connection-connected'; connection: RawConnection }
  | { type: 'connection-wake'; connection: RawConnection }
  | { type: 'connection-disconnected'; connection: RawConnection }
  | { type: 'connection-need-read-buffers'; connection: RawConnection }
  | { type: 'connection-read'; connection: RawConnection }
  | { type: 'connection-closed-read'; connection: RawConnection }
  | { type: 'connection-closed-write'; connection: RawConnection }
  | { type: 'connection-written'; connection: RawConnection }
  | { type: 'timeout' }
  | { type: 'inactive' };

export type EngineEventType = EngineEvent['type'];

/**
 * Event delivery engine the service is driven by.
 * The service never touches sockets; it only reacts to events and calls back.
 */
export interface EventEngine {
  wait(): Promise<EngineEvent[]>;
  done(batch: EngineEvent[]): void;
  now(): number;
  setTimeout(ms: number): void;
  createRawConnection(): RawConnection;
}

export type Logger = {
  log: (message: string) => void;
  error: (message: string) => void;
};

export type OutputSink = (bytes: Uint8Array) => void;

export type EchoConfig = {
  maxConnections?: number;
  readBuffers?: number;
  bufferCapacity?: number;
  maxBuffers?: number;

  wakeIntervalMs?: number;
  idleTimeoutMs?: number;

  logger?: Logger;
  sink?: OutputSink;
};

export type GlobalCounters = {
  connects: number;
  disconnects: number;
  firstIdleTime: number;
  nextWakeDeadline: number;
};

export type EchoStats = {
  connects: number;
  disconnects: number;
  activeSlots: number;
  slotCapacity: number;
  buffers: BufferMetrics;
};
