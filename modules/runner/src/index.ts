export * from './harness-config'
export * from './reanalysis'
export * from './run-events'
export * from './test-runner'
export * from './workload-driver'
