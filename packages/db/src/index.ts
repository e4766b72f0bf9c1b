export * from './client'
export * from './queries/leads'
export * from './queries/consent'
