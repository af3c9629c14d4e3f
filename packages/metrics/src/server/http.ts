import debug from 'debug'
import http from 'node:http'
import type { AddressInfo, Socket } from 'node:net'
import type { Registry } from 'prom-client'
import { RegistryMetricCreator } from '../utils/registryMetricCreator'

const log = debug('meshwork:metrics:http')

export type HealthCheckFn = () => Promise<{
  healthy: boolean
  details?: Record<string, unknown>
}>

export type HttpMetricsServerOpts = {
  port: number
  address?: string
  healthCheck?: HealthCheckFn
}

export type HttpMetricsServer = {
  /** Base URL the server is bound to, e.g. `http://127.0.0.1:8008` */
  address: string
  close(): Promise<void>
}

enum RequestStatus {
  success = 'success',
  error = 'error',
}

async function wrapError<T>(
  promise: Promise<T>,
): Promise<{ err: Error; result?: undefined } | { err?: undefined; result: T }> {
  try {
    return { result: await promise }
  } catch (err) {
    return { err: err instanceof Error ? err : new Error(String(err)) }
  }
}

export async function getHttpMetricsServer(
  opts: HttpMetricsServerOpts,
  { register }: { register: Registry },
): Promise<HttpMetricsServer> {
  // Separate registry for scrape timings, scraping `register` from inside its own collect would recurse
  const httpServerRegister = new RegistryMetricCreator()

  const scrapeTimeMetric = httpServerRegister.histogram<'status'>({
    name: 'meshwork_metrics_scrape_seconds',
    help: 'Metrics server async time to scrape metrics',
    labelNames: ['status'],
    buckets: [0.1, 1, 10],
  })
  const activeSockets = httpServerRegister.gauge({
    name: 'meshwork_metrics_server_active_sockets_count',
    help: 'Metrics server current count of active sockets',
  })

  const sockets = new Set<Socket>()

  const onRequest = async (
    req: http.IncomingMessage,
    res: http.ServerResponse,
  ): Promise<void> => {
    const url = req.url?.split('?')[0]

    if (req.method === 'GET' && url === '/health') {
      if (opts.healthCheck === undefined) {
        res
          .writeHead(200, { 'content-type': 'application/json' })
          .end(JSON.stringify({ status: 'healthy' }))
        return
      }
      const healthRes = await wrapError(opts.healthCheck())
      if (healthRes.err !== undefined) {
        res
          .writeHead(500, { 'content-type': 'application/json' })
          .end(JSON.stringify({ status: 'error', error: healthRes.err.message }))
        return
      }
      const { healthy, details } = healthRes.result
      res
        .writeHead(healthy ? 200 : 503, { 'content-type': 'application/json' })
        .end(JSON.stringify({ status: healthy ? 'healthy' : 'unhealthy', ...details }))
      return
    }

    if (req.method === 'GET' && url === '/metrics') {
      const timer = scrapeTimeMetric.startTimer()
      const metricsRes = await wrapError(register.metrics())
      if (metricsRes.err !== undefined) {
        timer({ status: RequestStatus.error })
        res.writeHead(500, { 'content-type': 'text/plain' }).end(metricsRes.err.stack)
        return
      }
      timer({ status: RequestStatus.success })
      const httpServerMetrics = await httpServerRegister.metrics()
      res
        .writeHead(200, { 'content-type': register.contentType })
        .end([metricsRes.result, httpServerMetrics].join('\n\n'))
      return
    }

    res.writeHead(404).end()
  }

  const server = http.createServer((req, res) => {
    onRequest(req, res).catch((err: unknown) => {
      log('request failed: %s', err instanceof Error ? err.message : String(err))
      if (!res.headersSent) res.writeHead(500)
      res.end()
    })
  })

  server.on('connection', (socket) => {
    sockets.add(socket)
    activeSockets.set(sockets.size)
    socket.on('close', () => {
      sockets.delete(socket)
      activeSockets.set(sockets.size)
    })
  })

  const address = await new Promise<string>((resolve, reject) => {
    server.once('error', reject)
    server.listen(opts.port, opts.address, () => {
      const info: AddressInfo | string | null = server.address()
      if (info === null || typeof info === 'string') {
        resolve(`http://${String(info)}`)
        return
      }
      const host = info.family === 'IPv6' ? `[${info.address}]` : info.address
      resolve(`http://${host}:${info.port}`)
    })
  })
  log('started metrics HTTP server on %s', address)

  return {
    address,
    async close(): Promise<void> {
      for (const socket of sockets) socket.destroy()
      sockets.clear()
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err)
          else resolve()
        })
      })
    },
  }
}
