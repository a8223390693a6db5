export { REASONS, getReason } from '@metro-traffic/dto'
export type { ReasonDetail } from '@metro-traffic/dto'
export * from './factory'
export * from './errors'
