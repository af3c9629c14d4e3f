export * from './container'
export * from './hosts'
