import { createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import type {
  ConnectionSlot,
  EngineEvent,
  EventEngine,
  ListenerAddress,
  RawBuffer,
  RawConnection,
  RawListener,
  TransportCondition,
} from '../internal/interfaces';

const DEFAULT_BACKLOG = 16;

const conditionOf = (error: Error): TransportCondition => {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { name: code ?? error.name, description: error.message };
};

/**
 * NetProactor - event engine over node:net
 *
 * Socket callbacks are turned into discrete events queued for the service.
 * `wait()` hands out everything queued so far as one batch; when nothing is
 * queued and no listener, connection or timer is left it yields `inactive`.
 *
 * ```typescript
 * const engine = new NetProactor();
 * engine.listen('127.0.0.1', 7000);
 * while (true) {
 *   const batch = await engine.wait();
 *   // ... handle events
 *   engine.done(batch);
 * }
 * ```
 */
export class NetProactor implements EventEngine {
  private queue: EngineEvent[] = [];
  private waiter: ((batch: EngineEvent[]) => void) | null = null;
  private outstanding: EngineEvent[] | null = null;

  private timer: NodeJS.Timeout | null = null;
  private inactiveSent = false;

  /** @internal */
  readonly listeners = new Set<NetListener>();
  /** @internal */
  readonly connections = new Set<NetRawConnection>();

  constructor(private clock: () => number = Date.now) {}

  public listen(host: string, port: number, backlog: number = DEFAULT_BACKLOG): NetListener {
    const listener = new NetListener(this, host, port, backlog);
    this.listeners.add(listener);
    return listener;
  }

  public wait(): Promise<EngineEvent[]> {
    if (this.outstanding) {
      throw new Error('Previous batch has not been marked done');
    }

    if (this.queue.length === 0 && this.isIdle() && !this.inactiveSent) {
      this.inactiveSent = true;
      this.queue.push({ type: 'inactive' });
    }

    if (this.queue.length > 0) {
      return Promise.resolve(this.takeBatch());
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  public done(batch: EngineEvent[]): void {
    if (batch !== this.outstanding) {
      throw new Error('Batch is not the one handed out by wait()');
    }
    this.outstanding = null;
  }

  public now(): number {
    return this.clock();
  }

  // Single timer: a new delay replaces the pending one
  public setTimeout(ms: number): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.emit({ type: 'timeout' });
    }, ms);
  }

  public createRawConnection(): NetRawConnection {
    return new NetRawConnection(this);
  }

  /** @internal */
  emit(event: EngineEvent): void {
    this.queue.push(event);
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(this.takeBatch());
    }
  }

  private takeBatch(): EngineEvent[] {
    const batch = this.queue;
    this.queue = [];
    this.outstanding = batch;
    return batch;
  }

  private isIdle(): boolean {
    return this.listeners.size === 0 && this.connections.size === 0 && this.timer === null;
  }
}

export class NetListener implements RawListener {
  private server: Server;
  private pending: Socket[] = [];
  private closing = false;
  private _condition: TransportCondition | undefined;

  constructor(
    private proactor: NetProactor,
    host: string,
    port: number,
    backlog: number,
  ) {
    this.server = createServer({ allowHalfOpen: true, pauseOnConnect: true });

    this.server.on('listening', () => {
      this.proactor.emit({ type: 'listener-open', listener: this, address: this.address(host, port) });
    });
    this.server.on('connection', (socket: Socket) => {
      if (this.closing) {
        socket.destroy();
        return;
      }
      this.pending.push(socket);
      this.proactor.emit({ type: 'listener-accept', listener: this });
    });
    this.server.on('error', (error: Error) => {
      this._condition = conditionOf(error);
      this.close();
    });
    this.server.on('close', () => {
      this.proactor.listeners.delete(this);
      this.proactor.emit({ type: 'listener-close', listener: this });
    });

    // An empty host means every interface
    this.server.listen({ host: host || undefined, port, backlog });
  }

  public get condition(): TransportCondition | undefined {
    return this._condition;
  }

  public accept(connection: RawConnection): void {
    if (!(connection instanceof NetRawConnection)) {
      throw new Error('NetListener can only accept connections created by its NetProactor');
    }
    const socket = this.pending.shift();
    if (!socket) {
      throw new Error('No pending connection to accept');
    }
    connection.attach(socket);
  }

  public close(): void {
    if (this.closing) return;
    this.closing = true;
    for (const socket of this.pending.splice(0)) socket.destroy();

    if (this.server.listening) {
      this.server.close();
    } else {
      // Never bound: 'close' will not come from the server
      this.proactor.listeners.delete(this);
      this.proactor.emit({ type: 'listener-close', listener: this });
    }
  }

  private address(host: string, port: number): ListenerAddress {
    const address = this.server.address();
    if (address !== null && typeof address === 'object') {
      return { host: address.address, port: address.port };
    }
    return { host, port };
  }
}

export class NetRawConnection implements RawConnection {
  public context: ConnectionSlot | undefined;

  private socket: Socket | null = null;
  private _condition: TransportCondition | undefined;
  private readClosed = false;
  private writeClosed = false;
  private disconnected = false;

  private givenRead: RawBuffer[] = [];
  private filled: RawBuffer[] = [];
  private unread: Buffer[] = [];
  private inFlight = new Set<RawBuffer>();
  private written: RawBuffer[] = [];

  // one queued event of each kind at a time
  private queued = { read: false, written: false, needBuffers: false };

  constructor(private proactor: NetProactor) {}

  public get condition(): TransportCondition | undefined {
    return this._condition;
  }

  /** @internal */
  attach(socket: Socket): void {
    this.socket = socket;
    this.proactor.connections.add(this);

    socket.on('data', (chunk: Buffer) => {
      if (this.readClosed) return;
      this.unread.push(chunk);
      this.pump();
    });
    socket.on('end', () => {
      if (this.readClosed) return;
      this.readClosed = true;
      this.proactor.emit({ type: 'connection-closed-read', connection: this });
    });
    socket.on('error', (error: Error) => {
      this._condition = conditionOf(error);
      if (!this.writeClosed) {
        this.writeClosed = true;
        this.proactor.emit({ type: 'connection-closed-write', connection: this });
      }
    });
    socket.on('close', () => this.teardown());

    this.proactor.emit({ type: 'connection-connected', connection: this });

    if (this.readClosed && this.writeClosed) {
      // closed before it was attached
      socket.destroy();
    }
  }

  public giveReadBuffers(buffers: RawBuffer[]): void {
    this.givenRead.push(...buffers);
    if (this.disconnected) {
      this.returnUnfilled();
      return;
    }
    this.pump();
  }

  public takeReadBuffers(max: number): RawBuffer[] {
    const taken = this.filled.splice(0, max);
    if (this.filled.length === 0) this.queued.read = false;
    return taken;
  }

  public writeBuffers(buffers: RawBuffer[]): void {
    for (const buffer of buffers) {
      const socket = this.socket;
      if (!socket || this.writeClosed) {
        this.written.push(buffer);
        continue;
      }

      this.inFlight.add(buffer);
      socket.write(buffer.bytes.subarray(buffer.offset, buffer.offset + buffer.size), () => {
        // teardown may already have handed it back
        if (this.inFlight.delete(buffer)) {
          this.written.push(buffer);
          this.notifyWritten();
        }
      });
    }
    this.notifyWritten();
  }

  public takeWrittenBuffers(max: number): RawBuffer[] {
    const taken = this.written.splice(0, max);
    if (this.written.length === 0) this.queued.written = false;
    return taken;
  }

  public isReadClosed(): boolean {
    return this.readClosed;
  }

  public isWriteClosed(): boolean {
    return this.writeClosed;
  }

  public close(): void {
    if (this.readClosed && this.writeClosed) return;
    this.readClosed = true;
    this.writeClosed = true;

    const socket = this.socket;
    if (socket) {
      // flush what is already queued, then drop the socket
      socket.end(() => socket.destroy());
    }
  }

  public wake(): void {
    if (this.socket && !this.disconnected) {
      this.proactor.emit({ type: 'connection-wake', connection: this });
    }
  }

  private pump() {
    while (this.unread.length > 0 && this.givenRead.length > 0) {
      const buffer = this.givenRead[0];
      const chunk = this.unread[0];
      const room = buffer.capacity - buffer.offset - buffer.size;
      const n = Math.min(room, chunk.length);

      buffer.bytes.set(chunk.subarray(0, n), buffer.offset + buffer.size);
      buffer.size += n;

      if (n === chunk.length) {
        this.unread.shift();
      } else {
        this.unread[0] = chunk.subarray(n);
      }
      this.givenRead.shift();
      this.filled.push(buffer);
    }

    if (this.filled.length > 0 && !this.queued.read) {
      this.queued.read = true;
      this.proactor.emit({ type: 'connection-read', connection: this });
    }

    if (this.unread.length > 0) {
      this.socket?.pause();
      if (!this.queued.needBuffers) {
        this.queued.needBuffers = true;
        this.proactor.emit({ type: 'connection-need-read-buffers', connection: this });
      }
    } else if (this.givenRead.length > 0) {
      this.queued.needBuffers = false;
      this.socket?.resume();
    }
  }

  private notifyWritten() {
    if (this.written.length > 0 && !this.queued.written) {
      this.queued.written = true;
      this.proactor.emit({ type: 'connection-written', connection: this });
    }
  }

  private returnUnfilled() {
    this.filled.push(...this.givenRead.splice(0));
    if (this.filled.length > 0 && !this.queued.read) {
      this.queued.read = true;
      this.proactor.emit({ type: 'connection-read', connection: this });
    }
  }

  // Every outstanding buffer is handed back before the disconnect is reported
  private teardown() {
    if (this.disconnected) return;
    this.readClosed = true;
    this.writeClosed = true;
    this.disconnected = true;
    this.unread = [];

    this.returnUnfilled();
    this.written.push(...this.inFlight);
    this.inFlight.clear();
    this.notifyWritten();

    this.proactor.connections.delete(this);
    this.proactor.emit({ type: 'connection-disconnected', connection: this });
  }
}
