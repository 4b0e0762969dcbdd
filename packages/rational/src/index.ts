export * from './arithmetic'
export * from './parse'
export * from './rational'
