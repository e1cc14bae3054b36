import { ParseError } from './errors'
import type { ConfigNode, ScalarValue } from './interfaces'

export const DEFAULT_MAX_DEPTH = 1000

const isPlainObject = (
  value: unknown
): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null) {
    return false
  }

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

const toScalar = (
  value: unknown
): ScalarValue => {
  if (value === null || value === undefined) {
    return null
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }

  if (value instanceof Date) {
    return value.toISOString()
  }

  return String(value)
}

/**
 * Converts the output of a YAML or JSON parser into a tagged `ConfigNode`.
 * Throws `ParseError` when the document nests deeper than `maxDepth`.
 */
export const toConfigTree = (
  value: unknown,
  maxDepth: number = DEFAULT_MAX_DEPTH,
  file?: string
): ConfigNode => {
  const convert = (current: unknown, depth: number): ConfigNode => {
    if (depth > maxDepth) {
      throw new ParseError(`Configuration nesting exceeds the maximum depth of ${maxDepth}`, file)
    }

    if (Array.isArray(current)) {
      return {
        kind: 'sequence',
        items: current.map((item: unknown) => convert(item, depth + 1))
      }
    }

    if (isPlainObject(current)) {
      return {
        kind: 'mapping',
        entries: Object.entries(current).map(([key, child]): [string, ConfigNode] => [key, convert(child, depth + 1)])
      }
    }

    return { kind: 'scalar', value: toScalar(current) }
  }

  return convert(value, 0)
}
