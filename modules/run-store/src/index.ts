export * from './history-recorder'
export * from './run-meta'
export * from './run-store'
