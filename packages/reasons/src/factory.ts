import { REASONS, ReasonCode, ReasonDetail } from '@metro-traffic/dto'

export type ReasonContext = NonNullable<ReasonDetail['context']>

/** Copy of the registry entry for `code`, with request-specific context when there is any. */
export function reason(code: ReasonCode, context?: ReasonContext): ReasonDetail {
  const entry = REASONS[code]
  if (!context || Object.keys(context).length === 0) return { ...entry }
  return { ...entry, context: { ...context } }
}
