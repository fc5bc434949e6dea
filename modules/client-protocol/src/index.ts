export * from './client'
export * from './invoke'
export * from './outcomes'
