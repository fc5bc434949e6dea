export * from './checker-result'
export * from './history'
export * from './operation'
export * from './run-id'
