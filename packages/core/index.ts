export * from './src/env'
export * from './src/logger'
export * from './src/utils'
export * from './src/zod'
