export const SESSION_INBOUND = 0x01
export const SESSION_OUTBOUND = 0x02
export const SESSION_MANUAL = 0x04
export const SESSION_SEED = 0x08
export const SESSION_REFINE = 0x10

/** Sessions whose channels carry regular traffic and are kept in the connected set */
export const SESSION_DEFAULT = SESSION_INBOUND | SESSION_OUTBOUND | SESSION_MANUAL
export const SESSION_ALL =
  SESSION_INBOUND | SESSION_OUTBOUND | SESSION_MANUAL | SESSION_SEED | SESSION_REFINE

export type SessionFlag =
  | typeof SESSION_INBOUND
  | typeof SESSION_OUTBOUND
  | typeof SESSION_MANUAL
  | typeof SESSION_SEED
  | typeof SESSION_REFINE

const NAMES: Record<SessionFlag, string> = {
  [SESSION_INBOUND]: 'inbound',
  [SESSION_OUTBOUND]: 'outbound',
  [SESSION_MANUAL]: 'manual',
  [SESSION_SEED]: 'seed',
  [SESSION_REFINE]: 'refine',
}

export const sessionName = (flag: SessionFlag): string => NAMES[flag]

/** True when `flag` is one of the sessions in `mask` */
export const matchesSession = (mask: number, flag: SessionFlag): boolean => (mask & flag) !== 0
