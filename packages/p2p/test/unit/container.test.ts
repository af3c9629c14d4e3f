import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, assert, beforeEach, describe, it } from 'vitest'
import { HostColor, HostContainer, TIER_LIMITS } from '../../src/index.ts'

const A = 'tcp://198.51.100.1:26661'
const B = 'tcp://198.51.100.2:26661'
const C = 'tcp+tls://198.51.100.3:26661'

describe('[hosts]: container tiers', () => {
  it('keeps each tier sorted newest first', () => {
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.Grey, [
      { addr: A, lastSeen: 10 },
      { addr: B, lastSeen: 30 },
      { addr: C, lastSeen: 20 },
    ])
    assert.deepEqual(
      container.fetchAll(HostColor.Grey).map((e) => e.addr),
      [B, C, A],
    )
  })

  it('only moves lastSeen forward on update', () => {
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 10 }])

    assert.equal(container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 5 }]), 0)
    assert.equal(container.getEntry(A)?.lastSeen, 10)
    assert.equal(container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 15 }]), 1)
    assert.equal(container.getEntry(A)?.lastSeen, 15)
    assert.equal(container.size(HostColor.Grey), 1)
  })

  it('holds an address in one tier at a time', () => {
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.White, [{ addr: A, lastSeen: 10 }])

    assert.equal(container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 99 }]), 0)
    assert.equal(container.getColor(A), HostColor.White)

    container.move(A, HostColor.Black, 50)
    assert.isTrue(container.containsIn(HostColor.Black, A))
    assert.isTrue(container.isEmpty(HostColor.White))
    assert.isTrue(container.isEmpty(HostColor.Grey))
  })

  it('promotes only from the named tier', () => {
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 10 }])

    assert.isFalse(container.promote(A, HostColor.White, HostColor.Gold))
    assert.isTrue(container.promote(A, HostColor.Grey, HostColor.White, 40))
    assert.deepEqual(container.getEntry(A), { addr: A, lastSeen: 40 })
    assert.equal(container.getColor(A), HostColor.White)
  })

  it('drops the oldest entries past the tier limit', () => {
    const container = new HostContainer()
    const limit = TIER_LIMITS[HostColor.Grey]
    const entries = Array.from({ length: limit + 1 }, (_, i) => ({
      addr: `tcp://10.${Math.floor(i / 256)}.${i % 256}.1:1`,
      lastSeen: i,
    }))
    container.storeOrUpdate(HostColor.Grey, entries)

    assert.equal(container.size(HostColor.Grey), limit)
    assert.isFalse(container.contains('tcp://10.0.0.1:1'))
    assert.isTrue(container.contains('tcp://10.0.1.1:1'))
  })

  it('removes by position, falling back to a lookup when stale', () => {
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.Grey, [
      { addr: A, lastSeen: 3 },
      { addr: B, lastSeen: 2 },
      { addr: C, lastSeen: 1 },
    ])

    assert.isTrue(container.removeAt(HostColor.Grey, B, 1))
    // C is now at index 1, not 2
    assert.isTrue(container.removeAt(HostColor.Grey, C, 2))
    assert.isFalse(container.removeAt(HostColor.Grey, C, 0))
    assert.deepEqual(container.fetchAll(HostColor.Grey), [{ addr: A, lastSeen: 3 }])
  })

  it('filters fetches by scheme', () => {
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.White, [
      { addr: A, lastSeen: 3 },
      { addr: B, lastSeen: 2 },
      { addr: C, lastSeen: 1 },
    ])

    assert.deepEqual(
      container.fetchWithSchemes(HostColor.White, ['tcp+tls']).map((e) => e.addr),
      [C],
    )
    assert.lengthOf(container.fetchWithSchemes(HostColor.White, ['tcp'], 1), 1)
    assert.isUndefined(container.fetchRandom(HostColor.White, ['unix']))

    const picked = container.fetchRandom(HostColor.White, ['tcp+tls'])
    assert.deepEqual(picked, { entry: { addr: C, lastSeen: 1 }, position: 2 })
    assert.sameMembers(container.fetchRandomN(HostColor.White, ['tcp'], 5).map((e) => e.addr), [A, B])
  })

  it('finds neighbours outside the black tier', () => {
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 1 }])
    container.storeOrUpdate(HostColor.Gold, [{ addr: B, lastSeen: 1 }])
    container.storeOrUpdate(HostColor.Black, [{ addr: C, lastSeen: 1 }])

    const neighbors = container.findNeighbors(new Uint8Array(32), 10)
    assert.sameMembers(neighbors, [A, B])
  })
})

describe('[hosts]: container file', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'meshwork-hosts-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('saves one tab-separated line per entry and loads it back', async () => {
    const path = join(dir, 'nested', 'hosts.tsv')
    const container = new HostContainer()
    container.storeOrUpdate(HostColor.Grey, [{ addr: A, lastSeen: 7 }])
    container.storeOrUpdate(HostColor.Anchor, [{ addr: C, lastSeen: 9 }])
    await container.save(path)

    assert.equal(
      await readFile(path, 'utf8'),
      `grey\t${A}\t7\nanchor\t${C}\t9\n`,
    )

    const loaded = new HostContainer()
    assert.equal(await loaded.load(path), 2)
    assert.equal(loaded.getColor(A), HostColor.Grey)
    assert.deepEqual(loaded.getEntry(C), { addr: C, lastSeen: 9 })
  })

  it('skips malformed lines', async () => {
    const path = join(dir, 'hosts.tsv')
    await writeFile(
      path,
      [
        `white\t${A}\t5`,
        'purple\ttcp://198.51.100.9:1\t5',
        `white\t${B}\tnot-a-number`,
        'white\thttp://198.51.100.9:1\t5',
        `gold\t${C}`,
        '',
      ].join('\n'),
    )

    const container = new HostContainer()
    assert.equal(await container.load(path), 1)
    assert.equal(container.getColor(A), HostColor.White)
    assert.isFalse(container.contains(B))
  })

  it('loads nothing from a missing file', async () => {
    const container = new HostContainer()
    assert.equal(await container.load(join(dir, 'absent.tsv')), 0)
  })
})
