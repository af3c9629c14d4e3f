import {
  createMetrics,
  defaultMetricsOptions,
  getHttpMetricsServer,
  type HttpMetricsServer,
  type MetricsOptions,
} from '@meshwork/metrics'
import { createSettings, getLogger, P2p } from '@meshwork/p2p'
import { mergeSettings, readConfigFile } from './config'
import type { NodeArgs } from './options'

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      for (const name of SHUTDOWN_SIGNALS) process.off(name, onSignal)
      resolve(signal)
    }
    for (const name of SHUTDOWN_SIGNALS) process.on(name, onSignal)
  })
}

export async function nodeHandler(args: NodeArgs): Promise<void> {
  const logger = getLogger({ logLevel: args.logLevel, label: 'node' })

  const fileSettings = args.config !== undefined ? await readConfigFile(args.config) : {}
  const settings = createSettings(mergeSettings(fileSettings, args))
  const metricsOptions: MetricsOptions = {
    ...defaultMetricsOptions,
    enabled: args.metricsEnabled ?? defaultMetricsOptions.enabled,
    address: args.metricsAddress ?? defaultMetricsOptions.address,
    port: args.metricsPort ?? defaultMetricsOptions.port,
  }
  const metrics = metricsOptions.enabled === true ? createMetrics(metricsOptions) : undefined

  const p2p = new P2p(settings, {
    logger: getLogger({ logLevel: args.logLevel, label: 'p2p' }),
    metrics: metrics?.network,
  })

  await p2p.start()
  const running = p2p.run()

  let metricsServer: HttpMetricsServer | undefined
  if (metrics !== undefined) {
    metricsServer = await getHttpMetricsServer(
      {
        port: metricsOptions.port,
        address: metricsOptions.address,
        healthCheck: async () => ({
          healthy: p2p.state === 'run',
          details: { channels: p2p.channels().length },
        }),
      },
      { register: metrics.register },
    )
    logger.info(`metrics served at ${metricsServer.address}/metrics`)
  }

  logger.info(`node started with ${settings.allowedTransports.join(', ')}`)
  for (const addr of settings.inbound) logger.info(`accepting connections on ${addr}`)

  const signal = waitForSignal()
  const stoppedBy = await Promise.race([
    signal,
    running.then(() => undefined),
  ])
  if (stoppedBy !== undefined) logger.info(`received ${stoppedBy}, shutting down`)

  try {
    await p2p.stop()
    await running
  } finally {
    await metricsServer?.close()
  }
  logger.info('node stopped')
}
