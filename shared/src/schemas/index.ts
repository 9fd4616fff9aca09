export * from './profile.schema'
export * from './generator.schema'
export * from './auth.schema'
