export * from './harness-cli'
