import { test } from 'node:test'
import assert from 'node:assert'
import { createEchoService, EchoService } from '../../src/index'
import { MemoryEngine } from '../helpers/memory-engine'

test('createEchoService - defaults', () => {
  const service = createEchoService(new MemoryEngine())

  assert(service instanceof EchoService)
  const stats = service.getStats()
  assert.equal(stats.slotCapacity, 5, 'Five connection slots by default')
  assert.equal(stats.buffers.capacity, 1024, '1024-byte buffers by default')
  assert.equal(stats.connects, 0)
  assert.equal(stats.disconnects, 0)
  assert.equal(stats.activeSlots, 0)
})

test('createEchoService - custom limits', () => {
  const service = createEchoService(new MemoryEngine(), { maxConnections: 2, bufferCapacity: 64 })

  const stats = service.getStats()
  assert.equal(stats.slotCapacity, 2)
  assert.equal(stats.buffers.capacity, 64)
})

test('createEchoService - validation rules', () => {
  const engine = new MemoryEngine()

  assert.throws(() => createEchoService(engine, { maxConnections: 0 }), /maxConnections must be a positive integer/)
  assert.throws(() => createEchoService(engine, { readBuffers: 0 }), /readBuffers must be a positive integer/)
  assert.throws(() => createEchoService(engine, { bufferCapacity: -1 }), /bufferCapacity must be a positive integer/)
  assert.throws(
    () => createEchoService(engine, { readBuffers: 4, maxBuffers: 3 }),
    /maxBuffers must be an integer >= readBuffers \(4\)/,
  )
  assert.throws(() => createEchoService(engine, { wakeIntervalMs: 0 }), /wakeIntervalMs must be a positive integer/)
  assert.throws(() => createEchoService(engine, { idleTimeoutMs: 2.5 }), /idleTimeoutMs must be a positive integer/)
})

test('createEchoService - maxBuffers equal to one batch is accepted', () => {
  assert.doesNotThrow(() => createEchoService(new MemoryEngine(), { readBuffers: 4, maxBuffers: 4 }))
})
