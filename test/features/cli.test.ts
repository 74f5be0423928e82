import { test } from 'node:test'
import assert from 'node:assert'
import { parseArgs } from '../../src/cli'

test('CLI - defaults to every interface on the amqp port', () => {
  assert.deepStrictEqual(parseArgs([]), { host: '', port: 5672 })
})

test('CLI - host only', () => {
  assert.deepStrictEqual(parseArgs(['localhost']), { host: 'localhost', port: 5672 })
})

test('CLI - host and port', () => {
  assert.deepStrictEqual(parseArgs(['127.0.0.1', '7000']), { host: '127.0.0.1', port: 7000 })
  assert.deepStrictEqual(parseArgs(['', '0']), { host: '', port: 0 })
})

test('CLI - rejects a bad port', () => {
  assert.throws(() => parseArgs(['localhost', 'http']), /Invalid port: http/)
  assert.throws(() => parseArgs(['localhost', '70000']), /Invalid port: 70000/)
})
