import * as x509 from '@peculiar/x509'
import { secp256k1 } from 'ethereum-cryptography/secp256k1'
import { mkdtemp, rm } from 'node:fs/promises'
import net from 'node:net'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Duplex } from 'node:stream'
import { assert, describe, it } from 'vitest'
import {
  ConfigError,
  ConnectError,
  ErrorCode,
  type Listener,
  StreamReader,
  Transports,
  generateBoundCertificate,
  verifyPeerCertificate,
  writeAll,
} from '../../src/index.ts'

function makeTransports(allowedTransports: string[], torSocksProxy = 'socks5://127.0.0.1:9050'): Transports {
  return new Transports({
    allowedTransports,
    transportMixing: false,
    torSocksProxy,
    channelHandshakeTimeout: 5_000,
  })
}

function nextConnection(listener: Listener): Promise<[Duplex, string]> {
  return new Promise((resolve) => {
    listener.once('connection', (stream, remote) => resolve([stream, remote]))
  })
}

async function roundTrip(client: Duplex, server: Duplex): Promise<void> {
  await writeAll(client, Uint8Array.of(1, 2, 3))
  assert.deepEqual(Array.from(await new StreamReader(server).readExact(3)), [1, 2, 3])
  await writeAll(server, Uint8Array.of(4, 5))
  assert.deepEqual(Array.from(await new StreamReader(client).readExact(2)), [4, 5])
}

async function expectError<E extends Error>(
  promise: Promise<unknown>,
  type: Chai.Constructor<E>,
): Promise<E> {
  try {
    await promise
  } catch (err) {
    assert.instanceOf(err, type)
    if (err instanceof type) return err
  }
  assert.fail(`expected ${type.name}`)
}

describe('[transport]: tcp and unix', () => {
  it('accepts and dials tcp on an ephemeral port', async () => {
    const transports = makeTransports(['tcp'])
    const listener = await transports.listen('tcp://127.0.0.1:0')
    try {
      assert.match(listener.boundAddress, /^tcp:\/\/127\.0\.0\.1:\d+$/)
      assert.notEqual(listener.boundAddress, 'tcp://127.0.0.1:0')

      const accepted = nextConnection(listener)
      const client = await transports.dial(listener.boundAddress, { timeout: 5_000 })
      const [server, remote] = await accepted
      assert.match(remote, /^tcp:\/\/127\.0\.0\.1:\d+$/)

      await roundTrip(client, server)
      client.destroy()
    } finally {
      await listener.close()
    }
  })

  it('maps a refused dial to CONNECTION_REFUSED', async () => {
    const transports = makeTransports(['tcp'])
    const listener = await transports.listen('tcp://127.0.0.1:0')
    const addr = listener.boundAddress
    await listener.close()

    const err = await expectError(transports.dial(addr, { timeout: 5_000 }), ConnectError)
    assert.equal(err.code, ErrorCode.CONNECTION_REFUSED)
  })

  it('accepts and dials unix sockets', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'meshwork-unix-'))
    const transports = makeTransports(['unix'])
    const addr = `unix://${join(dir, 'node.sock')}`
    const listener = await transports.listen(addr)
    try {
      const accepted = nextConnection(listener)
      const client = await transports.dial(addr, { timeout: 5_000 })
      const [server, remote] = await accepted
      assert.equal(remote, `${addr}#1`)
      await roundTrip(client, server)
      client.destroy()
    } finally {
      await listener.close()
      await rm(dir, { recursive: true, force: true })
    }
  })

  it('names concurrent unix peers apart', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'meshwork-unix-'))
    const transports = makeTransports(['unix'])
    const addr = `unix://${join(dir, 'node.sock')}`
    const listener = await transports.listen(addr)
    try {
      const first = nextConnection(listener)
      const clientA = await transports.dial(addr, { timeout: 5_000 })
      const [serverA, remoteA] = await first
      const second = nextConnection(listener)
      const clientB = await transports.dial(addr, { timeout: 5_000 })
      const [serverB, remoteB] = await second

      assert.equal(remoteA, `${addr}#1`)
      assert.equal(remoteB, `${addr}#2`)
      await roundTrip(clientA, serverA)
      await roundTrip(clientB, serverB)
      clientA.destroy()
      clientB.destroy()
    } finally {
      await listener.close()
      await rm(dir, { recursive: true, force: true })
    }
  })

  it('refuses disallowed schemes and listening on tor', async () => {
    const transports = makeTransports(['tcp+tls', 'tor'])
    const dialErr = await expectError(
      transports.dial('tcp://127.0.0.1:1', { timeout: 1_000 }),
      ConfigError,
    )
    assert.equal(dialErr.code, ErrorCode.DISALLOWED_TRANSPORT)

    const listenErr = await expectError(transports.listen('tor://127.0.0.1:1'), ConfigError)
    assert.equal(listenErr.code, ErrorCode.DISALLOWED_TRANSPORT)
  })
})

describe('[transport]: tls', () => {
  it('encrypts tcp+tls streams between two nodes', async () => {
    const server = makeTransports(['tcp+tls'])
    const client = makeTransports(['tcp+tls'])
    const listener = await server.listen('tcp+tls://127.0.0.1:0')
    try {
      const accepted = nextConnection(listener)
      const stream = await client.dial(listener.boundAddress, { timeout: 5_000 })
      const [serverStream] = await accepted
      await roundTrip(stream, serverStream)
      stream.destroy()
    } finally {
      await listener.close()
    }
  })

  it('binds certificates to the node key', async () => {
    const nodeKey = secp256k1.utils.randomPrivateKey()
    const { certPEM, nodePublicKey } = await generateBoundCertificate(nodeKey)
    const raw = new Uint8Array(new x509.X509Certificate(certPEM).rawData)

    const verified = await verifyPeerCertificate(raw, { expectedNodePublicKey: nodePublicKey })
    assert.deepEqual(verified.nodePublicKey, nodePublicKey)

    const otherKey = secp256k1.getPublicKey(secp256k1.utils.randomPrivateKey(), true)
    await expectError(verifyPeerCertificate(raw, { expectedNodePublicKey: otherKey }), Error)
    await expectError(
      verifyPeerCertificate(raw, { now: new Date(Date.now() + 2 * 365 * 24 * 60 * 60 * 1000) }),
      Error,
    )
  })
})

describe('[transport]: tor via socks5', () => {
  it('tunnels through the configured proxy', async () => {
    const requests: number[][] = []
    const proxy = net.createServer((socket) => {
      const reader = new StreamReader(socket)
      const serve = async (): Promise<void> => {
        await reader.readExact(3)
        await writeAll(socket, Uint8Array.of(0x05, 0x00))
        requests.push(Array.from(await reader.readExact(10)))
        await writeAll(socket, Uint8Array.of(0x05, 0x00, 0x00, 0x01, 127, 0, 0, 1, 0, 0))
        await writeAll(socket, Uint8Array.of(0x68, 0x69))
      }
      serve().catch(() => socket.destroy())
    })
    await new Promise<void>((resolve) => proxy.listen(0, '127.0.0.1', resolve))
    const bound = proxy.address()
    assert.isNotNull(bound)
    if (bound === null || typeof bound === 'string') return

    try {
      const transports = makeTransports(['tor'], `socks5://127.0.0.1:${bound.port}`)
      const stream = await transports.dial('tor://192.0.2.1:26661', { timeout: 5_000 })
      assert.deepEqual(Array.from(await new StreamReader(stream).readExact(2)), [0x68, 0x69])
      assert.deepEqual(requests, [[0x05, 0x01, 0x00, 0x01, 192, 0, 2, 1, 0x68, 0x25]])
      stream.destroy()
    } finally {
      await new Promise<void>((resolve) => proxy.close(() => resolve()))
    }
  })
})
