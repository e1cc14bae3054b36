import type { JsonValue } from './json-value.interface'

export interface iFinding {
  feature: string
  // dotted for mapping keys, bracketed for sequence indices: a.b[1].c
  path: string
  info: JsonValue
}

export type DeprecationTable = ReadonlyMap<string, JsonValue>
