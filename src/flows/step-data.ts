import type { JsonObject, StepResult } from '../state/types.js'

export function readString(source: JsonObject | StepResult | undefined, key: string): string | null {
  const value = source?.[key]
  return typeof value === 'string' ? value : null
}

export function readNumber(source: JsonObject | StepResult | undefined, key: string): number | null {
  const value = source?.[key]
  return typeof value === 'number' ? value : null
}
