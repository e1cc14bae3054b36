import { existsSync, readFileSync } from 'node:fs'
import path from 'path'
import { parse as parseYaml } from 'yaml'

import { NotFoundError, ParseError, UnsupportedFormatError, describeError } from './errors'
import type { ConfigFormat, ConfigNode, DeprecationTable, JsonValue } from './interfaces'
import { DEFAULT_MAX_DEPTH, toConfigTree } from './tree'

const FORMATS: readonly ConfigFormat[] = ['yaml', 'json']

const EXTENSIONS: Record<string, ConfigFormat> = {
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.json': 'json'
}

const isConfigFormat = (
  value: string
): value is ConfigFormat => {
  return FORMATS.some((format) => format === value)
}

export const resolveFormat = (
  format: string,
  file?: string
): ConfigFormat => {
  const normalized = format.trim().toLowerCase()

  if (!isConfigFormat(normalized)) {
    throw new UnsupportedFormatError(format, file)
  }

  return normalized
}

export const detectFormat = (
  file: string
): ConfigFormat | undefined => {
  return EXTENSIONS[path.extname(file).toLowerCase()]
}

const readText = (
  file: string,
  label: string
): string => {
  if (!existsSync(file)) {
    throw new NotFoundError(label, file)
  }

  try {
    return readFileSync(file, 'utf8')
  } catch (error) {
    throw new ParseError(`Error reading ${file}: ${describeError(error)}`, file, error)
  }
}

const parseDocument = (
  text: string,
  format: ConfigFormat,
  file: string
): unknown => {
  try {
    if (format === 'yaml') {
      // duplicate keys: the last occurrence wins, as with JSON.parse;
      // `<<` merge keys are expanded into the mapping that holds them
      return parseYaml(text, { uniqueKeys: false, merge: true })
    }

    return JSON.parse(text)
  } catch (error) {
    throw new ParseError(`Error loading ${format.toUpperCase()} file ${file}: ${describeError(error)}`, file, error)
  }
}

/**
 * Reads `file` and parses it as `format` (yaml or json, case-insensitive).
 */
export const loadConfig = (
  file: string,
  format: string,
  maxDepth: number = DEFAULT_MAX_DEPTH
): ConfigNode => {
  const text = readText(file, 'Configuration file')
  const resolved = resolveFormat(format, file)

  return toConfigTree(parseDocument(text, resolved, file), maxDepth, file)
}

const isJsonObject = (
  value: unknown
): value is { [key: string]: JsonValue } => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Reads the deprecated-features JSON file. The root must be an object whose
 * keys are feature names; values are kept verbatim.
 */
export const loadTable = (
  file: string
): DeprecationTable => {
  const text = readText(file, 'Deprecated features file')
  const parsed: unknown = parseDocument(text, 'json', file)

  if (!isJsonObject(parsed)) {
    const actual = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed

    throw new ParseError(`Deprecated features file must contain a JSON object, got ${actual}: ${file}`, file)
  }

  return new Map(Object.entries(parsed))
}
