export * from './cas-register'
export * from './checker'
export * from './dispatcher'
export * from './external-checker'
export * from './independent'
export * from './linearizability'
export * from './perf'
export * from './timeline'
