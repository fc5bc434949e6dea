export * from './backend'
export * from './etcd-client'
export * from './mailbox'
export * from './memory-register'
export * from './network'
export * from './simulated-partition'
