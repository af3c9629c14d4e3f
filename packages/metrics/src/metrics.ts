import { collectDefaultMetrics } from 'prom-client'
import { createNetworkMetrics, type NetworkMetrics } from './metrics/network'
import type { MetricsOptions } from './options'
import { RegistryMetricCreator } from './utils/registryMetricCreator'

export type Metrics = {
  network: NetworkMetrics
  register: RegistryMetricCreator
}

export function createMetrics(opts: Pick<MetricsOptions, 'collectDefaultMetrics'> = {}): Metrics {
  const register = new RegistryMetricCreator()
  const network = createNetworkMetrics(register)

  if (opts.collectDefaultMetrics) {
    collectDefaultMetrics({ register, prefix: 'meshwork_' })
  }

  return { network, register }
}
