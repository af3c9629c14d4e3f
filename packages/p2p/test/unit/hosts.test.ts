import { assert, describe, it } from 'vitest'
import {
  Channel,
  HostColor,
  Hosts,
  SESSION_OUTBOUND,
  type SettingsInput,
  createSettings,
} from '../../src/index.ts'
import { duplexPair } from './duplex-pair.ts'

const SELF = 'tcp+tls://203.0.113.1:26661'
const BANNED_HOST = '203.0.113.66'
const A = 'tcp+tls://198.51.100.1:26661'
const B = 'tcp+tls://198.51.100.2:26661'
const C = 'tcp+tls://198.51.100.3:26661'

function makeHosts(input: SettingsInput = {}): Hosts {
  return new Hosts(
    createSettings({
      externalAddrs: [SELF],
      blacklist: [{ host: BANNED_HOST }],
      ...input,
    }),
  )
}

function makeChannel(address: string): Channel {
  const [stream] = duplexPair()
  return new Channel({ stream, address, direction: 'outbound', sessionFlag: SESSION_OUTBOUND })
}

describe('[hosts]: address filtering', () => {
  it('drops self, blacklisted, local and malformed addresses', () => {
    const hosts = makeHosts()
    const kept = hosts.filterAddresses([
      { addr: SELF, lastSeen: 1 },
      { addr: `tcp://${BANNED_HOST}:1`, lastSeen: 1 },
      { addr: 'tcp://10.0.0.1:26661', lastSeen: 1 },
      { addr: 'tcp://127.0.0.1:26661', lastSeen: 1 },
      { addr: 'unix:///tmp/peer.sock', lastSeen: 1 },
      { addr: 'tcp://198.51.100.1', lastSeen: 1 },
      { addr: 'TCP+TLS://198.51.100.1:26661/', lastSeen: 4 },
      { addr: A, lastSeen: 9 },
      { addr: B, lastSeen: 2 },
    ])
    assert.deepEqual(kept, [
      { addr: A, lastSeen: 9 },
      { addr: B, lastSeen: 2 },
    ])
  })

  it('keeps local addresses on a local network, except our own port on loopback', () => {
    const hosts = makeHosts({ localnet: true, externalAddrs: ['tcp://127.0.0.1:26661'] })
    const kept = hosts.filterAddresses([
      { addr: 'tcp://localhost:26661', lastSeen: 1 },
      { addr: 'tcp://127.0.0.1:26662', lastSeen: 1 },
      { addr: 'tcp://10.0.0.1:26661', lastSeen: 1 },
      { addr: 'unix:///tmp/peer.sock', lastSeen: 1 },
    ])
    assert.deepEqual(
      kept.map((e) => e.addr),
      ['tcp://127.0.0.1:26662', 'tcp://10.0.0.1:26661', 'unix:///tmp/peer.sock'],
    )
  })

  it('stores survivors in the greylist only', () => {
    const hosts = makeHosts()
    assert.equal(hosts.storeGreylist([{ addr: A, lastSeen: 5 }, { addr: SELF, lastSeen: 5 }]), 1)
    assert.equal(hosts.container.getColor(A), HostColor.Grey)
    assert.isFalse(hosts.container.contains(SELF))
  })

  it('blocks accepted connections by rule or black tier host', () => {
    const hosts = makeHosts({
      blacklist: [{ host: BANNED_HOST, transports: ['tcp'] }],
    })
    assert.isTrue(hosts.isBlockedHost(BANNED_HOST, 'tcp'))
    assert.isFalse(hosts.isBlockedHost(BANNED_HOST, 'tcp+tls'))

    hosts.ban(B)
    assert.isTrue(hosts.isBlockedHost('198.51.100.2', 'tcp+tls'))
    assert.isTrue(hosts.isBlocked(B))
  })

  it('matches blacklist rules by port', () => {
    const hosts = makeHosts({ blacklist: [{ host: '198.51.100.1', ports: [1] }] })
    assert.isTrue(hosts.isBlacklisted('tcp://198.51.100.1:1'))
    assert.isFalse(hosts.isBlacklisted('tcp://198.51.100.1:2'))
  })
})

describe('[hosts]: claims', () => {
  it('lets one dialer claim an address at a time', () => {
    const hosts = makeHosts()
    assert.isTrue(hosts.tryClaim(A))
    assert.isFalse(hosts.tryClaim(A))
    assert.isTrue(hosts.isPending(A))
    assert.isTrue(hosts.isMigrating(A))
    assert.equal(hosts.pendingCount, 1)

    hosts.release(A)
    assert.isFalse(hosts.isPending(A))
    assert.isTrue(hosts.tryClaim(A))
  })

  it('refuses claims on connected addresses', async () => {
    const hosts = makeHosts()
    const channel = makeChannel(A)
    assert.isTrue(hosts.registerChannel(channel))
    assert.isFalse(hosts.tryClaim(A))
    await channel.stop()
  })
})

describe('[hosts]: outbound selection', () => {
  it('prefers gold on the first slots and falls back to other tiers', () => {
    const hosts = makeHosts({ goldConnectCount: 2 })
    hosts.container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 1 }])
    hosts.container.storeOrUpdate(HostColor.Gold, [{ addr: B, lastSeen: 1 }])

    assert.equal(hosts.selectOutbound(0), B)
    assert.equal(hosts.selectOutbound(1), A)
    assert.isUndefined(hosts.selectOutbound(0))
  })

  it('waits for the preferred tier under strict preference', () => {
    const hosts = makeHosts({ goldConnectCount: 1, slotPreferenceStrict: true })
    hosts.container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 1 }])
    assert.isUndefined(hosts.selectOutbound(0))
    assert.isFalse(hosts.isPending(A))
  })

  it('skips blocked, manual, self and undialable candidates', () => {
    const hosts = makeHosts({ peers: [B], goldConnectCount: 0 })
    hosts.container.storeOrUpdate(HostColor.Grey, [
      { addr: `tcp+tls://${BANNED_HOST}:1`, lastSeen: 1 },
      { addr: B, lastSeen: 1 },
      { addr: SELF, lastSeen: 1 },
      { addr: 'unix:///tmp/peer.sock', lastSeen: 1 },
    ])
    assert.isUndefined(hosts.selectOutbound(0))
  })

  it('moves hosts between tiers on connect, failure and ban', () => {
    const hosts = makeHosts()
    hosts.container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 1 }])
    hosts.container.storeOrUpdate(HostColor.Anchor, [{ addr: B, lastSeen: 1 }])
    hosts.container.storeOrUpdate(HostColor.White, [{ addr: C, lastSeen: 1 }])

    hosts.markConnected(A)
    assert.equal(hosts.container.getColor(A), HostColor.Gold)
    hosts.markConnected(B)
    assert.equal(hosts.container.getColor(B), HostColor.Anchor)

    hosts.demote(A)
    assert.equal(hosts.container.getColor(A), HostColor.Grey)
    hosts.demote(A)
    assert.isFalse(hosts.container.contains(A))
    hosts.demote(B)
    assert.equal(hosts.container.getColor(B), HostColor.Anchor)
    hosts.demote(C)
    assert.equal(hosts.container.getColor(C), HostColor.Grey)

    hosts.ban(C)
    assert.equal(hosts.container.getColor(C), HostColor.Black)
  })
})

describe('[hosts]: address exchange', () => {
  it('answers getaddrs from anchor, gold and white hosts on the asked schemes', () => {
    const hosts = makeHosts()
    hosts.container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 1 }])
    hosts.container.storeOrUpdate(HostColor.Gold, [{ addr: B, lastSeen: 2 }])
    hosts.container.storeOrUpdate(HostColor.White, [
      { addr: C, lastSeen: 3 },
      { addr: 'tcp://198.51.100.4:1', lastSeen: 3 },
    ])

    assert.sameDeepMembers(hosts.fetchAddrs(['tcp+tls'], 10), [
      { addr: B, lastSeen: 2 },
      { addr: C, lastSeen: 3 },
    ])
    assert.lengthOf(hosts.fetchAddrs([], 10), 3)
    assert.lengthOf(hosts.fetchAddrs([], 1), 1)
  })

  it('advertises external addresses with their last verification time', () => {
    const hosts = makeHosts()
    hosts.markSelfReachable(SELF, 1234)
    assert.deepEqual(hosts.selfAddrs(), [{ addr: SELF, lastSeen: 1234 }])
  })
})

describe('[hosts]: connected channels', () => {
  it('keeps one channel per address until it stops', async () => {
    const hosts = makeHosts()
    const sub = hosts.subscribeChannel()
    const first = makeChannel(A)
    const second = makeChannel(A)

    assert.isTrue(hosts.registerChannel(first))
    assert.isFalse(hosts.registerChannel(second))
    assert.equal(await sub.receive(), first)
    assert.equal(hosts.timeWithoutChannels(), 0)
    assert.isTrue(hosts.isConnected(A))

    await first.stop()
    assert.isFalse(hosts.isConnected(A))
    assert.lengthOf(hosts.channelList(), 0)
    assert.isTrue(hosts.registerChannel(second))
    await second.stop()
  })

  it('does not register stopped channels', async () => {
    const hosts = makeHosts()
    const channel = makeChannel(A)
    await channel.stop()
    assert.isFalse(hosts.registerChannel(channel))
  })
})
