import { describe, it, expect } from 'vitest'
import type { ConfigNode, DeprecationTable, JsonValue } from '../src/interfaces'
import { findDeprecated } from '../src/matcher'
import { toConfigTree } from '../src/tree'

const table = (entries: Record<string, JsonValue>): DeprecationTable => new Map(Object.entries(entries))

describe('findDeprecated', () => {
  const oldSetting = { description: 'Use new_setting instead.', replacement: 'new_setting' }
  const apiVersion = { description: 'API Version v1 is deprecated.', replacement: 'v2' }

  it('should report top-level and nested keys with their paths', () => {
    const tree = toConfigTree({
      api_version: 'v1',
      settings: { old_setting: 123, new_setting: 456 }
    })

    expect(findDeprecated(tree, table({ api_version: apiVersion, old_setting: oldSetting }))).toEqual([
      { feature: 'api_version', path: 'api_version', info: apiVersion },
      { feature: 'old_setting', path: 'settings.old_setting', info: oldSetting }
    ])
  })

  it('should build bracketed paths through sequences', () => {
    const tree = toConfigTree({ a: { b: [1, { c: 2 }] } })

    expect(findDeprecated(tree, table({ c: 'gone' }))).toEqual([
      { feature: 'c', path: 'a.b[1].c', info: 'gone' }
    ])
  })

  it('should start paths with an index when the root is a sequence', () => {
    const tree = toConfigTree([{ a: 1 }, { b: [{ a: 2 }] }])

    expect(findDeprecated(tree, table({ a: 1 })).map((finding) => finding.path)).toEqual([
      '[0].a',
      '[1].b[0].a'
    ])
  })

  it('should never match values or sequence elements', () => {
    const tree = toConfigTree({ x: 'old_setting', list: ['old_setting', ['old_setting']] })

    expect(findDeprecated(tree, table({ old_setting: oldSetting }))).toEqual([])
  })

  it('should report every occurrence of a repeated key', () => {
    const tree = toConfigTree({ old: 1, nested: { old: 2 }, arr: [{ old: 3 }] })

    expect(findDeprecated(tree, table({ old: null })).map((finding) => finding.path)).toEqual([
      'old',
      'nested.old',
      'arr[0].old'
    ])
  })

  it('should emit findings in depth-first pre-order', () => {
    const tree = toConfigTree({ a: { x: 1, a: 2 }, x: 3 })

    expect(findDeprecated(tree, table({ a: 'A', x: 'X' })).map((finding) => finding.path)).toEqual([
      'a',
      'a.x',
      'a.a',
      'x'
    ])
  })

  it('should carry metadata through verbatim', () => {
    const info: JsonValue = [1, 'two', { three: [3] }]
    const [finding] = findDeprecated(toConfigTree({ k: 0 }), table({ k: info }))

    expect(finding.info).toBe(info)
  })

  it('should match keys whose metadata is null', () => {
    expect(findDeprecated(toConfigTree({ k: 0 }), table({ k: null }))).toEqual([
      { feature: 'k', path: 'k', info: null }
    ])
  })

  it('should not match inherited object members', () => {
    const tree = toConfigTree(JSON.parse('{"constructor": 1, "toString": 2}'))

    expect(findDeprecated(tree, table({ hasOwnProperty: 'x' }))).toEqual([])
  })

  it('should return an empty list for an empty table', () => {
    expect(findDeprecated(toConfigTree({ a: { b: [1] } }), new Map())).toEqual([])
  })

  it('should return an empty list for an empty mapping or a scalar root', () => {
    expect(findDeprecated(toConfigTree({}), table({ a: 1 }))).toEqual([])
    expect(findDeprecated(toConfigTree('a'), table({ a: 1 }))).toEqual([])
  })

  it('should be deterministic across runs', () => {
    const tree = toConfigTree({ a: [{ b: 1 }, { a: { b: 2 } }] })
    const deprecated = table({ a: 'A', b: 'B' })

    expect(findDeprecated(tree, deprecated)).toEqual(findDeprecated(tree, deprecated))
  })

  it('should walk trees deeper than the call stack allows', () => {
    const depth = 20000
    let tree: ConfigNode = { kind: 'mapping', entries: [['legacy', { kind: 'scalar', value: true }]] }

    for (let i = 0; i < depth; i++) {
      tree = { kind: 'sequence', items: [tree] }
    }

    const findings = findDeprecated(tree, table({ legacy: 'x' }))

    expect(findings).toHaveLength(1)
    expect(findings[0].path).toBe(`${'[0]'.repeat(depth)}.legacy`)
  })
})
