import { assert, describe, it } from 'vitest'
import { createMetrics } from '../../src/index.ts'

describe('[metrics]: network', () => {
  it('registers network metrics on its own registry', async () => {
    const { network, register } = createMetrics()
    network.peerCount.set(3)
    network.connectionAttempts.inc({ status: 'success' })
    network.connectionAttempts.inc({ status: 'success' })
    network.connectionAttempts.inc({ status: 'failure' })

    const peerCount = await network.peerCount.get()
    assert.equal(peerCount.values[0].value, 3)

    const attempts = await network.connectionAttempts.get()
    const byStatus = Object.fromEntries(
      attempts.values.map((v) => [String(v.labels.status), v.value]),
    )
    assert.deepEqual(byStatus, { success: 2, failure: 1 })

    const text = await register.metrics()
    assert.include(text, 'meshwork_network_peer_count 3')
  })

  it('keeps registries independent', async () => {
    const a = createMetrics()
    const b = createMetrics()
    a.network.peerBans.inc()
    const bans = await b.network.peerBans.get()
    assert.equal(bans.values[0].value, 0)
  })
})
