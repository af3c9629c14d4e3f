import debug from 'debug'
import { pEvent } from 'p-event'
import net, { type Socket } from 'node:net'
import { ConnectError, ErrorCode, isNetError } from '../errors'

const log = debug('meshwork:transport:tcp')

export interface DialOptions {
  /** Milliseconds allowed for the whole dial, upgrades included */
  timeout: number
  signal?: AbortSignal
}

export type SocketTarget = { host: string; port: number } | { path: string }

const ERRNO_CODES: Record<string, ErrorCode> = {
  ECONNREFUSED: ErrorCode.CONNECTION_REFUSED,
  EHOSTUNREACH: ErrorCode.HOST_UNREACHABLE,
  ENETUNREACH: ErrorCode.NETWORK_UNREACHABLE,
  ETIMEDOUT: ErrorCode.CONNECT_TIMEOUT,
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}

export function timeoutError(target: string, timeout: number): ConnectError {
  return new ConnectError(`dial ${target} timed out after ${timeout}ms`, {
    code: ErrorCode.CONNECT_TIMEOUT,
    context: { address: target },
  })
}

/**
 * Maps a socket-level failure to a `ConnectError`. Errors that already are
 * `NetError`s pass through.
 */
export function toConnectError(err: unknown, target: string): Error {
  if (isNetError(err)) return err
  const errno = errnoCode(err)
  const code = (errno !== undefined ? ERRNO_CODES[errno] : undefined) ?? ErrorCode.CONNECT_FAILED
  const message = err instanceof Error ? err.message : String(err)
  return new ConnectError(`dial ${target} failed: ${message}`, {
    code,
    context: { address: target },
    cause: err,
  })
}

function describe(target: SocketTarget): string {
  return 'path' in target ? target.path : `${target.host}:${target.port}`
}

/**
 * Opens a TCP or IPC socket, failing with a `ConnectError` on refusal,
 * unreachability or timeout.
 */
export async function connectSocket(
  target: SocketTarget,
  options: DialOptions,
): Promise<Socket> {
  const name = describe(target)
  const timeout = AbortSignal.timeout(options.timeout)
  const signal =
    options.signal === undefined ? timeout : AbortSignal.any([options.signal, timeout])

  log('dialing %s', name)
  const socket = net.connect(target)
  socket.on('error', (err) => log('socket %s error: %s', name, err.message))

  try {
    await pEvent(socket, 'connect', { signal })
    return socket
  } catch (err) {
    socket.destroy()
    if (timeout.aborted && options.signal?.aborted !== true) {
      throw timeoutError(name, options.timeout)
    }
    if (options.signal?.aborted === true) throw err
    throw toConnectError(err, name)
  }
}
