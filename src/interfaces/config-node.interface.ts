export type ScalarValue = string | number | boolean | null

export interface iMappingNode {
  kind: 'mapping'
  entries: [string, ConfigNode][]
}

export interface iSequenceNode {
  kind: 'sequence'
  items: ConfigNode[]
}

export interface iScalarNode {
  kind: 'scalar'
  value: ScalarValue
}

/**
 * Parsed configuration document. Read-only once built by the loader.
 */
export type ConfigNode = iMappingNode | iSequenceNode | iScalarNode

export type ConfigFormat = 'yaml' | 'json'
