import type { ConfigNode, DeprecationTable, iFinding } from './interfaces'

type Frame =
  | { type: 'node', node: ConfigNode, path: string }
  | { type: 'key', key: string, value: ConfigNode, path: string }

const childKeyPath = (
  path: string,
  key: string
): string => {
  return path ? `${path}.${key}` : key
}

/**
 * Walks the tree depth-first and reports every mapping key present in `table`.
 * Uses an explicit stack, so nesting depth is bounded by memory, not by the call stack.
 */
export const findDeprecated = (
  tree: ConfigNode,
  table: DeprecationTable
): iFinding[] => {
  const findings: iFinding[] = []
  const stack: Frame[] = [{ type: 'node', node: tree, path: '' }]

  while (stack.length) {
    const frame = stack.pop()

    if (!frame) {
      break
    }

    if (frame.type === 'key') {
      const info = table.get(frame.key)

      if (info !== undefined) {
        findings.push({ feature: frame.key, path: frame.path, info })
      }

      stack.push({ type: 'node', node: frame.value, path: frame.path })
      continue
    }

    const { node, path } = frame

    switch (node.kind) {
      case 'mapping':
        // reversed so entries pop in document order
        for (let i = node.entries.length - 1; i >= 0; i--) {
          const [key, value] = node.entries[i]

          stack.push({ type: 'key', key, value, path: childKeyPath(path, key) })
        }
        break
      case 'sequence':
        for (let i = node.items.length - 1; i >= 0; i--) {
          stack.push({ type: 'node', node: node.items[i], path: `${path}[${i}]` })
        }
        break
      case 'scalar':
        break
    }
  }

  return findings
}
