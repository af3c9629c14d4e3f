import { pEvent } from 'p-event'
import type { Readable } from 'node:stream'

export class EndOfStreamError extends Error {
  constructor(message = 'unexpected end of stream') {
    super(message)
    this.name = 'EndOfStreamError'
  }
}

/**
 * Exact-length reads over a byte stream. Unread bytes stay in the stream's
 * own buffer, so another reader can take over the stream afterwards.
 */
export class StreamReader {
  constructor(private readonly stream: Readable) {}

  async readExact(n: number, signal?: AbortSignal): Promise<Uint8Array> {
    if (n === 0) return new Uint8Array(0)

    for (;;) {
      if (this.stream.destroyed) throw new EndOfStreamError('stream destroyed')

      const chunk: unknown = this.stream.read(n)
      if (chunk !== null) {
        if (!(chunk instanceof Uint8Array)) {
          throw new TypeError('expected a byte stream')
        }
        if (chunk.length < n) throw new EndOfStreamError()
        return new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength)
      }
      if (this.stream.readableEnded) throw new EndOfStreamError()

      await pEvent(this.stream, ['readable', 'end', 'close'], { signal })
    }
  }

  async readByte(signal?: AbortSignal): Promise<number> {
    const [byte] = await this.readExact(1, signal)
    return byte
  }
}

/**
 * Writes `bytes` and resolves once the stream has accepted them.
 */
export async function writeAll(
  stream: NodeJS.WritableStream,
  bytes: Uint8Array,
): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    stream.write(bytes, (err) => {
      if (err) reject(err)
      else resolve()
    })
  })
}
