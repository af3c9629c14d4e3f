import { assert, describe, it } from 'vitest'
import { hostPortToMultiaddr, urlToNetConfig } from '../../src/index.ts'

describe('[multi-addr]', () => {
  it('builds multiaddrs by host kind', () => {
    assert.equal(hostPortToMultiaddr('10.0.0.1', 26661).toString(), '/ip4/10.0.0.1/tcp/26661')
    assert.deepEqual(hostPortToMultiaddr('[::1]', '8080').protoNames(), ['ip6', 'tcp'])
    assert.equal(hostPortToMultiaddr('seed.example.org', 1).toString(), '/dns/seed.example.org/tcp/1')
  })

  it('rejects bad ports', () => {
    assert.throws(() => hostPortToMultiaddr('10.0.0.1', 70000))
    assert.throws(() => hostPortToMultiaddr('10.0.0.1', 'abc'))
  })

  it('resolves tcp urls to socket options', () => {
    assert.deepEqual(urlToNetConfig(new URL('tcp+tls://127.0.0.1:9000')), {
      type: 'tcp',
      host: '127.0.0.1',
      port: 9000,
      family: 4,
    })
  })

  it('resolves bracketed IPv6 hosts', () => {
    const config = urlToNetConfig(new URL('tcp://[::1]:8080'))
    assert.equal(config.type, 'tcp')
    if (config.type === 'tcp') {
      assert.equal(config.family, 6)
      assert.equal(config.port, 8080)
    }
  })

  it('resolves unix urls to a path', () => {
    assert.deepEqual(urlToNetConfig(new URL('unix:///tmp/node.sock')), {
      type: 'ipc',
      path: '/tmp/node.sock',
    })
  })

  it('requires a port for network schemes', () => {
    assert.throws(() => urlToNetConfig(new URL('tcp://127.0.0.1')))
  })
})
