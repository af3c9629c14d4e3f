export * from './flags'
export * from './inbound-session'
export * from './manual-session'
export * from './outbound-session'
export * from './refine-session'
export * from './seed-session'
export * from './session'
