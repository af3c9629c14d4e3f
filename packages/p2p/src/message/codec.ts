import { RLP } from '@ethereumjs/rlp'
import { bytesToInt, bytesToUtf8, intToBytes, utf8ToBytes } from '@meshwork/utils'
import { ErrorCode, ProtocolError } from '../errors'

/**
 * Encodes and decodes one message type. `name` is the packet command the
 * message travels under.
 */
export interface MessageCodec<T> {
  readonly name: string
  encode(message: T): Uint8Array
  decode(payload: Uint8Array): T
}

export type RlpItem = Uint8Array | RlpItem[]

function malformed(what: string, message: string): ProtocolError {
  return new ProtocolError(`malformed ${what}: ${message}`, {
    code: ErrorCode.MALFORMED_MESSAGE,
    context: { command: what },
  })
}

export const encodeRlp = (items: RlpItem[]): Uint8Array => RLP.encode(items)

/**
 * Typed accessors over a decoded RLP list. Every failure is a
 * `ProtocolError` naming the message.
 */
export class RlpReader {
  private constructor(
    private readonly what: string,
    private readonly items: RlpItem[],
  ) {}

  static decode(what: string, payload: Uint8Array): RlpReader {
    let decoded: RlpItem
    try {
      decoded = RLP.decode(payload)
    } catch (err) {
      throw malformed(what, err instanceof Error ? err.message : String(err))
    }
    if (!Array.isArray(decoded)) throw malformed(what, 'expected a list')
    return new RlpReader(what, decoded)
  }

  get length(): number {
    return this.items.length
  }

  expectLength(min: number): this {
    if (this.items.length < min) {
      throw malformed(this.what, `expected ${min} fields, got ${this.items.length}`)
    }
    return this
  }

  bytes(index: number): Uint8Array {
    const item = this.items[index]
    if (!(item instanceof Uint8Array)) throw malformed(this.what, `field ${index} is not bytes`)
    return item
  }

  string(index: number): string {
    return bytesToUtf8(this.bytes(index))
  }

  int(index: number): number {
    const bytes = this.bytes(index)
    if (bytes.length > 6) throw malformed(this.what, `field ${index} out of range`)
    return bytesToInt(bytes)
  }

  list(index: number): RlpReader {
    const item = this.items[index]
    if (!Array.isArray(item)) throw malformed(this.what, `field ${index} is not a list`)
    return new RlpReader(this.what, item)
  }

  map<U>(fn: (reader: RlpReader, index: number) => U): U[] {
    return this.items.map((_, i) => fn(this, i))
  }
}

export const str = (value: string): Uint8Array => utf8ToBytes(value)
export const int = (value: number): Uint8Array => intToBytes(value)
