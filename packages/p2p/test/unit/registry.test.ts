import { assert, describe, it } from 'vitest'
import {
  Channel,
  P2p,
  type P2pHandle,
  ProtocolRegistry,
  SESSION_ALL,
  SESSION_DEFAULT,
  SESSION_INBOUND,
  SESSION_MANUAL,
  SESSION_OUTBOUND,
  SESSION_REFINE,
  SESSION_SEED,
  type SessionFlag,
  getLogger,
  matchesSession,
  registerDefaultProtocols,
  sessionName,
} from '../../src/index.ts'
import { duplexPair } from './duplex-pair.ts'

function channelFor(sessionFlag: SessionFlag): Channel {
  const [stream] = duplexPair()
  return new Channel({
    stream,
    address: 'tcp+tls://198.51.100.2:26661',
    direction: 'outbound',
    sessionFlag,
  })
}

describe('[session]: flags', () => {
  it('matches masks bitwise', () => {
    assert.isTrue(matchesSession(SESSION_DEFAULT, SESSION_MANUAL))
    assert.isFalse(matchesSession(SESSION_DEFAULT, SESSION_SEED))
    assert.isTrue(matchesSession(SESSION_ALL, SESSION_REFINE))
    assert.equal(sessionName(SESSION_INBOUND), 'inbound')
  })
})

describe('[protocol]: registry', () => {
  const p2p = new P2p({}, { logger: getLogger({ silent: true }) })

  it('attaches the protocols registered for the channel session', () => {
    const registry = new ProtocolRegistry()
    registerDefaultProtocols(registry)
    assert.equal(registry.size, 3)

    const names = (flag: SessionFlag): string[] =>
      registry.attach(flag, channelFor(flag), p2p).map((p) => p.name)

    assert.deepEqual(names(SESSION_OUTBOUND), ['ping', 'address'])
    assert.deepEqual(names(SESSION_INBOUND), ['ping', 'address'])
    assert.deepEqual(names(SESSION_SEED), ['seed'])
    assert.deepEqual(names(SESSION_REFINE), [])
  })

  it('passes the channel and coordinator to each factory', () => {
    const registry = new ProtocolRegistry()
    const seen: Array<[Channel, P2pHandle]> = []
    registry.register(SESSION_SEED | SESSION_MANUAL, (channel, handle) => {
      seen.push([channel, handle])
      return { name: 'probe', start: async () => {} }
    })

    const channel = channelFor(SESSION_MANUAL)
    assert.lengthOf(registry.attach(SESSION_MANUAL, channel, p2p), 1)
    assert.lengthOf(registry.attach(SESSION_OUTBOUND, channelFor(SESSION_OUTBOUND), p2p), 0)
    assert.equal(seen[0][0], channel)
    assert.equal(seen[0][1], p2p)
  })
})
