export * from './concurrent-generator'
export * from './op-source'
export * from './workload'
