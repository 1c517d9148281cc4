export * from './errors'
export * from './format'
export * from './limits'
export * from './stream'
export * from './types'
