export * from './arrays'
export * from './brand'
export * from './camelize-record'
export * from './constructs'
export * from './int'
export * from './maps'
export * from './timeouts'
export * from './typed-publisher'
