import { test } from 'node:test'
import assert from 'node:assert'
import { ConnectionSlotTable, IdleController, ListenerAdmission } from '../../src/index'
import { MemoryEngine } from '../helpers/memory-engine'
import { captureLogger } from '../helpers/drive'

const setup = (capacity: number) => {
  const engine = new MemoryEngine()
  const listener = engine.openListener()
  const slots = new ConnectionSlotTable(capacity)
  const controller = new IdleController({ wakeIntervalMs: 5000, idleTimeoutMs: 20000 })
  const logger = captureLogger()
  const admission = new ListenerAdmission(engine, slots, controller, logger)
  engine.drain()
  return { engine, listener, slots, controller, logger, admission }
}

test('ListenerAdmission - accepts while slots are free', () => {
  const { engine, listener, slots, admission } = setup(2)
  const clientA = listener.connectClient()
  const clientB = listener.connectClient()

  const first = admission.admit(listener)
  const second = admission.admit(listener)

  assert(first.accepted && second.accepted, 'Both should be accepted')
  assert.equal(first.slot.id, 0)
  assert.equal(second.slot.id, 1)
  assert.equal(first.connection.context, first.slot)
  assert.equal(clientA.connection, first.connection, 'Oldest pending client is bound first')
  assert.equal(clientB.connection, second.connection)
  assert.equal(slots.activeCount(), 2)
  assert.deepStrictEqual(engine.timerCalls, [5000], 'Only the first admission arms a sweep')
})

test('ListenerAdmission - full table accepts then closes', () => {
  const { engine, listener, slots, logger, admission } = setup(1)
  listener.connectClient()
  const rejectedClient = listener.connectClient()

  admission.admit(listener)
  const result = admission.admit(listener)

  assert(!result.accepted)
  assert.equal(result.reason, 'slot-table-full')
  assert.equal(rejectedClient.connection, result.connection, 'Rejected connection is still accepted')
  assert.equal(engine.created[1].closeCalls, 1, 'and closed right away')
  assert.equal(rejectedClient.closed, true)
  assert.equal(result.connection.context, undefined)
  assert.equal(slots.activeCount(), 1)
  assert.deepStrictEqual(logger.lines, ['[echo] too many connections, rejecting'])
})

test('ListenerAdmission - clears the idle mark on success', () => {
  const { engine, listener, controller, admission } = setup(1)
  controller.onTimeout(engine.now())
  assert.equal(controller.getCounters().firstIdleTime, 1000)

  listener.connectClient()
  admission.admit(listener)
  assert.equal(controller.getCounters().firstIdleTime, 0)
})

test('ListenerAdmission - rejects everything once shutdown is decided', () => {
  const { listener, slots, controller, logger, admission } = setup(3)
  controller.onTimeout(1000)
  controller.onTimeout(21000)
  assert.equal(controller.isShuttingDown(), true)

  const client = listener.connectClient()
  const result = admission.admit(listener)

  assert(!result.accepted)
  assert.equal(result.reason, 'shutting-down')
  assert.equal(client.closed, true)
  assert.equal(slots.activeCount(), 0)
  assert.deepStrictEqual(logger.lines, ['[echo] shutting down, rejecting'])
})
