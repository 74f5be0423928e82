import { test } from 'node:test'
import assert from 'node:assert'
import { AllocationError, OwnershipError, RawBufferPool } from '../../src/index'

test('RawBufferPool - allocate hands out free buffers of fixed capacity', () => {
  const pool = new RawBufferPool({ capacity: 1024 })

  const buffers = pool.allocate(4)
  assert.equal(buffers.length, 4, 'Should allocate exactly the requested count')
  for (const buffer of buffers) {
    assert.equal(buffer.state, 'free')
    assert.equal(buffer.capacity, 1024)
    assert.equal(buffer.bytes.length, 1024)
    assert.equal(buffer.size, 0)
    assert.equal(buffer.offset, 0)
  }

  assert.deepStrictEqual(pool.getMetrics(), {
    live: 4,
    free: 4,
    givenForRead: 0,
    readyToWrite: 0,
    disposed: 0,
    allocated: 4,
    capacity: 1024,
  })
})

test('RawBufferPool - read hand-off and reclaim', () => {
  const pool = new RawBufferPool({ capacity: 16 })
  const [buffer] = pool.allocate(1)

  pool.release(buffer, 'give-for-read')
  assert.equal(buffer.state, 'given-for-read')
  assert.equal(pool.getMetrics().givenForRead, 1)

  pool.reclaim(buffer, 'read')
  assert.equal(buffer.state, 'free')

  pool.release(buffer, 'ready-to-write')
  assert.equal(buffer.state, 'ready-to-write')

  pool.reclaim(buffer, 'write')
  pool.release(buffer, 'dispose')
  assert.equal(buffer.state, 'disposed')

  const metrics = pool.getMetrics()
  assert.equal(metrics.live, 0, 'Disposed buffer is no longer live')
  assert.equal(metrics.disposed, 1)
  assert.equal(metrics.free, 0)
})

test('RawBufferPool - no double hand-out', () => {
  const pool = new RawBufferPool({ capacity: 16 })
  const [buffer] = pool.allocate(1)

  pool.release(buffer, 'give-for-read')

  assert.throws(() => pool.release(buffer, 'give-for-read'), OwnershipError)
  assert.throws(() => pool.release(buffer, 'ready-to-write'), OwnershipError)
  assert.throws(() => pool.release(buffer, 'dispose'), OwnershipError)
  assert.equal(buffer.state, 'given-for-read', 'Failed hand-off must not change state')
})

test('RawBufferPool - reclaim checks the completion direction', () => {
  const pool = new RawBufferPool({ capacity: 16 })
  const [buffer] = pool.allocate(1)

  assert.throws(() => pool.reclaim(buffer, 'read'), OwnershipError, 'A free buffer was never handed out')

  pool.release(buffer, 'give-for-read')
  assert.throws(
    () => pool.reclaim(buffer, 'write'),
    (error: unknown) =>
      error instanceof OwnershipError &&
      error.state === 'given-for-read' &&
      error.message === 'Buffer returned from write must be ready-to-write, got given-for-read',
  )
})

test('RawBufferPool - disposed buffers are dead', () => {
  const pool = new RawBufferPool({ capacity: 16 })
  const [buffer] = pool.allocate(1)
  pool.release(buffer, 'dispose')

  assert.throws(() => pool.release(buffer, 'give-for-read'), OwnershipError)
  assert.throws(() => pool.reclaim(buffer, 'read'), OwnershipError)
})

test('RawBufferPool - giving a buffer for read clears old payload bounds', () => {
  const pool = new RawBufferPool({ capacity: 16 })
  const [buffer] = pool.allocate(1)
  buffer.size = 10
  buffer.offset = 2

  pool.release(buffer, 'give-for-read')
  assert.equal(buffer.size, 0)
  assert.equal(buffer.offset, 0)
})

test('RawBufferPool - allocation is all or nothing', () => {
  const pool = new RawBufferPool({ capacity: 16, maxBuffers: 6 })
  const first = pool.allocate(4)

  assert.throws(
    () => pool.allocate(4),
    (error: unknown) =>
      error instanceof AllocationError &&
      error.requested === 4 &&
      error.message === 'Cannot allocate 4 buffers: 4 of 6 in use',
  )
  assert.equal(pool.getMetrics().allocated, 4, 'No partial batch may be allocated')

  // Disposing frees room under the limit
  pool.release(first[0], 'dispose')
  pool.release(first[1], 'dispose')
  const second = pool.allocate(4)
  assert.equal(second.length, 4)
  assert.equal(pool.liveCount(), 6)
})

test('RawBufferPool - rejects invalid options', () => {
  assert.throws(() => new RawBufferPool({ capacity: 0 }), /Buffer capacity must be a positive integer/)
  assert.throws(() => new RawBufferPool({ capacity: 1.5 }), /Buffer capacity must be a positive integer/)
  assert.throws(() => new RawBufferPool({ maxBuffers: -1 }), /maxBuffers must be a non-negative integer/)
})
