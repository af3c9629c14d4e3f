import { assert, describe, it } from 'vitest'
import {
  bytesToIp,
  ipv4ToBytes,
  ipv6ToBytes,
  isLocalHost,
  isLoopback,
} from '../../src/index.ts'

describe('[ip]: literal encoding', () => {
  it('encodes IPv4 literals', () => {
    assert.deepEqual(Array.from(ipv4ToBytes('192.0.2.7')), [192, 0, 2, 7])
  })

  it('expands compressed IPv6 literals', () => {
    const loopback = ipv6ToBytes('::1')
    assert.equal(loopback.length, 16)
    assert.equal(loopback[15], 1)
    assert.isTrue(loopback.subarray(0, 15).every((b) => b === 0))

    const doc = ipv6ToBytes('2001:db8::ff00:42:8329')
    assert.deepEqual(
      Array.from(doc),
      [0x20, 0x01, 0x0d, 0xb8, 0, 0, 0, 0, 0, 0, 0xff, 0x00, 0x00, 0x42, 0x83, 0x29],
    )
  })

  it('handles embedded IPv4 tails', () => {
    const mapped = ipv6ToBytes('::ffff:10.1.2.3')
    assert.deepEqual(Array.from(mapped.subarray(10)), [0xff, 0xff, 10, 1, 2, 3])
  })

  it('decodes bytes back to text', () => {
    assert.equal(bytesToIp(Uint8Array.from([10, 0, 0, 1])), '10.0.0.1')
    assert.equal(bytesToIp(ipv6ToBytes('2001:db8::1')), '2001:db8:0:0:0:0:0:1')
  })

  it('rejects non-literals', () => {
    assert.throws(() => ipv4ToBytes('example.com'))
    assert.throws(() => ipv6ToBytes('1.2.3.4'))
  })
})

describe('[ip]: classification', () => {
  it('detects loopback hosts', () => {
    assert.isTrue(isLoopback('127.0.0.1'))
    assert.isTrue(isLoopback('[::1]'))
    assert.isTrue(isLoopback('localhost'))
    assert.isFalse(isLoopback('8.8.8.8'))
  })

  it('treats private and link-local ranges as local', () => {
    for (const host of [
      '10.4.5.6',
      '172.20.0.1',
      '192.168.1.1',
      '169.254.0.9',
      '0.0.0.0',
      'fe80::1',
      'fd00::5',
      '::',
      '::ffff:192.168.0.1',
      'localhost.localdomain',
    ]) {
      assert.isTrue(isLocalHost(host), host)
    }
  })

  it('treats public addresses and names as global', () => {
    for (const host of ['8.8.8.8', '172.32.0.1', '2001:4860::8888', 'seed.example.org']) {
      assert.isFalse(isLocalHost(host), host)
    }
  })
})
