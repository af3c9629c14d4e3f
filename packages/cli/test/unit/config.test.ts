import { ConfigError, ErrorCode, createSettings } from '@meshwork/p2p'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, assert, beforeEach, describe, it } from 'vitest'
import { mergeSettings, nodeArgsSchema, readConfigFile } from '../../src/cli.ts'

async function expectInvalidConfig(promise: Promise<unknown>): Promise<void> {
  try {
    await promise
  } catch (err) {
    assert.instanceOf(err, ConfigError)
    if (err instanceof ConfigError) assert.equal(err.code, ErrorCode.INVALID_SETTINGS)
    return
  }
  assert.fail('expected ConfigError')
}

describe('[cli]: node settings', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'meshwork-cli-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads settings from a JSON file', async () => {
    const path = join(dir, 'node.json')
    await writeFile(
      path,
      JSON.stringify({ seeds: ['tcp+tls://seed.example.org:26661'], outboundConnections: 4 }),
    )
    const settings = await readConfigFile(path)
    assert.deepEqual(settings, {
      seeds: ['tcp+tls://seed.example.org:26661'],
      outboundConnections: 4,
    })
  })

  it('rejects unknown keys and malformed files', async () => {
    const unknownKey = join(dir, 'unknown.json')
    await writeFile(unknownKey, JSON.stringify({ maxPeers: 4 }))
    await expectInvalidConfig(readConfigFile(unknownKey))

    const broken = join(dir, 'broken.json')
    await writeFile(broken, '{ "seeds": [')
    await expectInvalidConfig(readConfigFile(broken))
  })

  it('lets set flags override the file and keeps the rest', () => {
    const args = nodeArgsSchema.parse({
      _: ['node'],
      $0: 'meshwork',
      'outbound-connections': 2,
      outboundConnections: 2,
      peers: ['tcp://10.0.0.5:26661'],
    })
    assert.isUndefined(args.seeds)
    assert.equal(args.logLevel, 'info')
    assert.isUndefined(args.metricsEnabled)

    const merged = mergeSettings(
      { seeds: ['tcp://10.0.0.9:26661'], outboundConnections: 6, localnet: true },
      args,
    )
    assert.deepEqual(merged, {
      seeds: ['tcp://10.0.0.9:26661'],
      outboundConnections: 2,
      localnet: true,
      peers: ['tcp://10.0.0.5:26661'],
    })

    const settings = createSettings({ ...merged, allowedTransports: ['tcp'] })
    assert.equal(settings.outboundConnections, 2)
    assert.deepEqual(settings.peers, ['tcp://10.0.0.5:26661'])
  })
})
