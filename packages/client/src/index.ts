export * from './client'
export * from './features'
export * from './types'
