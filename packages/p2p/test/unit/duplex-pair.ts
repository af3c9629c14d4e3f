import { Duplex } from 'node:stream'

/**
 * One end of an in-memory byte pipe. Writes land in the peer's readable
 * side; ending or destroying one end ends the peer's readable side.
 */
class PipeEnd extends Duplex {
  peer?: PipeEnd
  private readableClosed = false

  receive(chunk: Buffer | null): void {
    if (this.readableClosed || this.destroyed) return
    if (chunk === null) this.readableClosed = true
    this.push(chunk)
  }

  override _read(): void {}

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.peer?.receive(chunk)
    callback()
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.peer?.receive(null)
    callback()
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.peer?.receive(null)
    callback(error)
  }
}

export function duplexPair(): [Duplex, Duplex] {
  const a = new PipeEnd()
  const b = new PipeEnd()
  a.peer = b
  b.peer = a
  return [a, b]
}
