import { randomBytes } from 'node:crypto'

/** Current UNIX time in whole seconds. */
export const unixTimestamp = (): number => Math.floor(Date.now() / 1000)

export const randomU32 = (): number => randomBytes(4).readUInt32BE(0)
