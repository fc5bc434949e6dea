export * from './command-fault-injector'
export * from './fault-injector'
export * from './run-nemesis'
export * from './schedule'
