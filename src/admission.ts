import type { IdleController } from './idle-controller';
import type { ConnectionSlot, EventEngine, Logger, RawConnection, RawListener } from './internal/interfaces';
import type { ConnectionSlotTable } from './slot-table';

export type RejectReason = 'slot-table-full' | 'shutting-down';

export type AdmissionResult =
  | { accepted: true; connection: RawConnection; slot: ConnectionSlot }
  | { accepted: false; connection: RawConnection; reason: RejectReason };

/**
 * Gate for incoming connections.
 *
 * The engine has no way to decline a pending connection, so a rejected one is
 * accepted and closed straight away.
 */
export class ListenerAdmission {
  constructor(
    private engine: EventEngine,
    private slots: ConnectionSlotTable,
    private controller: IdleController,
    private logger: Logger,
  ) {}

  public admit(listener: RawListener): AdmissionResult {
    const connection = this.engine.createRawConnection();

    if (this.controller.isShuttingDown()) {
      this.logger.log('[echo] shutting down, rejecting');
      listener.accept(connection);
      connection.close();
      return { accepted: false, connection, reason: 'shutting-down' };
    }

    const slot = this.slots.reserve(connection);
    if (!slot) {
      this.logger.log('[echo] too many connections, rejecting');
      listener.accept(connection);
      connection.close();
      return { accepted: false, connection, reason: 'slot-table-full' };
    }

    if (this.controller.onAdmitted(this.engine.now())) {
      this.engine.setTimeout(this.controller.wakeInterval);
    }

    listener.accept(connection);
    return { accepted: true, connection, slot };
  }
}
