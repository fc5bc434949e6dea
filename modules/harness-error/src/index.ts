export * from './harness-error'
