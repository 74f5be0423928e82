import { ListenerAdmission } from './admission';
import { RawBufferPool } from './buffer-pool';
import { EchoPipeline } from './echo-pipeline';
import type { ConnectionPhase } from './echo-pipeline';
import { IdleController } from './idle-controller';
import { formatCondition } from './internal/errors';
import type {
  EchoStats,
  EngineEvent,
  EventEngine,
  Logger,
  OutputSink,
  RawConnection,
  RawListener,
} from './internal/interfaces';
import { ConnectionSlotTable } from './slot-table';

export type EchoServiceOptions = {
  maxConnections: number;
  readBuffers: number;
  bufferCapacity: number;
  maxBuffers: number;
  wakeIntervalMs: number;
  idleTimeoutMs: number;
  logger: Logger;
  sink: OutputSink;
};

/**
 * Dispatcher for the echo service. Consumes one engine event at a time and
 * routes it to admission, the echo pipeline or the idle controller.
 *
 * Everything here runs on a single logical thread: an event is handled to
 * completion before the next one is looked at.
 */
export class EchoService {
  private readonly engine: EventEngine;
  private readonly logger: Logger;

  private readonly pool: RawBufferPool;
  private readonly slots: ConnectionSlotTable;
  private readonly controller: IdleController;
  private readonly admission: ListenerAdmission;
  private readonly pipeline: EchoPipeline;

  private listener: RawListener | null = null;
  private listenerClosing = false;
  private exitCode = 0;

  constructor(engine: EventEngine, options: EchoServiceOptions) {
    this.engine = engine;
    this.logger = options.logger;

    this.pool = new RawBufferPool({ capacity: options.bufferCapacity, maxBuffers: options.maxBuffers });
    this.slots = new ConnectionSlotTable(options.maxConnections);
    this.controller = new IdleController({
      wakeIntervalMs: options.wakeIntervalMs,
      idleTimeoutMs: options.idleTimeoutMs,
    });
    this.admission = new ListenerAdmission(engine, this.slots, this.controller, this.logger);
    this.pipeline = new EchoPipeline(
      engine,
      this.pool,
      this.slots,
      this.controller,
      this.logger,
      options.sink,
      options.readBuffers,
    );
  }

  /**
   * Pull batches from the engine until it goes inactive or a fatal listener
   * condition is seen.
   * @returns Process exit code, 0 on clean shutdown
   */
  public async run(): Promise<number> {
    while (true) {
      const batch = await this.engine.wait();
      for (const event of batch) {
        if (!this.handle(event)) {
          return this.exitCode;
        }
      }
      this.engine.done(batch);
    }
  }

  /**
   * Handle a single event.
   * @returns false when the dispatch loop should stop
   */
  public handle(event: EngineEvent): boolean {
    switch (event.type) {
      case 'listener-open': {
        this.listener = event.listener;
        this.logger.log(`[echo] listening on ${event.address.port}`);
        this.engine.setTimeout(this.controller.wakeInterval);
        break;
      }

      case 'listener-accept': {
        const result = this.admission.admit(event.listener);
        this.pipeline.track(result.connection, result.accepted ? 'connecting' : 'draining');
        break;
      }

      case 'listener-close': {
        this.listener = null;
        if (event.listener.condition) {
          this.logger.error(formatCondition(event.type, event.listener.condition));
          this.exitCode = 1;
        }
        break;
      }

      case 'timeout': {
        this.onTimeout();
        break;
      }

      case 'inactive':
        return false;

      case 'connection-connected':
        this.pipeline.onConnected(event.connection);
        break;

      case 'connection-wake':
        this.pipeline.onWake(event.connection);
        break;

      case 'connection-read':
        this.pipeline.onRead(event.connection);
        break;

      case 'connection-written':
        this.pipeline.onWritten(event.connection);
        break;

      case 'connection-closed-read':
      case 'connection-closed-write':
        this.pipeline.onClosed(event.connection);
        break;

      case 'connection-disconnected':
        this.pipeline.onDisconnected(event.connection);
        break;

      // The initial batch is the only provisioning
      case 'connection-need-read-buffers':
        break;
    }

    return this.exitCode === 0;
  }

  private onTimeout() {
    const decision = this.controller.onTimeout(this.engine.now());

    switch (decision.action) {
      case 'shutdown':
        this.closeListener();
        return;
      case 'idle':
        if (decision.firstObservation) {
          this.logger.log(`[echo] idle detected, shutting down in ${decision.delayMs}ms`);
        }
        break;
      case 'sweep':
        this.slots.forEachActive((_slot, connection) => connection.wake());
        break;
      case 'rearm':
        break;
    }

    this.engine.setTimeout(decision.delayMs);
  }

  private closeListener() {
    if (!this.listener || this.listenerClosing) return;
    this.listenerClosing = true;
    this.logger.log('[echo] closing listener');
    this.listener.close();
  }

  public getStats(): EchoStats {
    const counters = this.controller.getCounters();
    return {
      connects: counters.connects,
      disconnects: counters.disconnects,
      activeSlots: this.slots.activeCount(),
      slotCapacity: this.slots.capacity,
      buffers: this.pool.getMetrics(),
    };
  }

  public phaseOf(connection: RawConnection): ConnectionPhase | undefined {
    return this.pipeline.phaseOf(connection);
  }

  public get exitStatus(): number {
    return this.exitCode;
  }
}
