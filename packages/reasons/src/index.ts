export * from './registry'
export * from './factory'
export * from './errors'
