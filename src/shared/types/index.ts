export * from './config'
export * from './forge'
export * from './local'
