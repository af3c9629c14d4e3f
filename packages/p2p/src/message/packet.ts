import {
  bytesToUtf8,
  concatBytes,
  equalsBytes,
  readUint32BE,
  utf8ToBytes,
  writeUint32BE,
} from '@meshwork/utils'
import { ErrorCode, ProtocolError } from '../errors'
import type { StreamReader } from '../transport/stream-reader'

/** Leading bytes of every packet */
export const PACKET_MAGIC = Uint8Array.of(0x6d, 0x65, 0x73, 0x68)

export const MAX_PAYLOAD_SIZE = 8 * 1024 * 1024
export const MAX_COMMAND_LENGTH = 255

export interface Packet {
  command: string
  payload: Uint8Array
}

/**
 * magic (4) | command length (1) | command | payload length (u32 BE) | payload
 */
export function encodePacket(packet: Packet): Uint8Array {
  const command = utf8ToBytes(packet.command)
  if (command.length === 0 || command.length > MAX_COMMAND_LENGTH) {
    throw new ProtocolError(`command must be 1-${MAX_COMMAND_LENGTH} bytes`, {
      code: ErrorCode.MALFORMED_PACKET,
      context: { command: packet.command },
    })
  }
  if (packet.payload.length > MAX_PAYLOAD_SIZE) {
    throw new ProtocolError(`payload of ${packet.payload.length} bytes exceeds limit`, {
      code: ErrorCode.PAYLOAD_TOO_LARGE,
      context: { command: packet.command },
    })
  }
  return concatBytes(
    PACKET_MAGIC,
    Uint8Array.of(command.length),
    command,
    writeUint32BE(packet.payload.length),
    packet.payload,
  )
}

export async function readPacket(reader: StreamReader, signal?: AbortSignal): Promise<Packet> {
  const magic = await reader.readExact(PACKET_MAGIC.length, signal)
  if (!equalsBytes(magic, PACKET_MAGIC)) {
    throw new ProtocolError('bad packet magic', { code: ErrorCode.MALFORMED_PACKET })
  }

  const commandLength = await reader.readByte(signal)
  if (commandLength === 0) {
    throw new ProtocolError('empty command', { code: ErrorCode.MALFORMED_PACKET })
  }
  const command = bytesToUtf8(await reader.readExact(commandLength, signal))

  const payloadLength = readUint32BE(await reader.readExact(4, signal))
  if (payloadLength > MAX_PAYLOAD_SIZE) {
    throw new ProtocolError(`payload of ${payloadLength} bytes exceeds limit`, {
      code: ErrorCode.PAYLOAD_TOO_LARGE,
      context: { command },
    })
  }
  const payload = await reader.readExact(payloadLength, signal)
  return { command, payload }
}
