import { describe, expect, it } from 'vitest'
import {
  applyPatches,
  DynamicKeyTable,
  defineState,
  field,
  fnv1a32,
  isKeyDefinition,
  PatchDecoder,
  PatchEncoder,
  PatchOpcode,
  StaleSlotError,
  type StatePatch,
} from '../src'

const Board = defineState({
  round: field.integer(),
  players: field.map(field.object({ x: field.number(), y: field.number() })),
  grid: field.map(field.map(field.number())),
  settings: field.json({ rounds: 3 }),
})

describe('isKeyDefinition', () => {
  it('should accept only [integer, string] pairs', () => {
    expect(isKeyDefinition([0, 'A'])).toBe(true)
    expect(isKeyDefinition([0, 1])).toBe(false)
    expect(isKeyDefinition(['A', 0])).toBe(false)
    expect(isKeyDefinition([0.5, 'A'])).toBe(false)
    expect(isKeyDefinition([0, 'A', 'B'])).toBe(false)
    expect(isKeyDefinition('A')).toBe(false)
  })
})

describe('PatchEncoder', () => {
  const encoder = new PatchEncoder(Board.pathHasher)

  it('should replace static paths with their hash', () => {
    const table = new DynamicKeyTable()
    expect(encoder.encode([{ path: ['round'], op: 'set', value: 2 }], table)).toEqual([
      { path: fnv1a32('round'), op: PatchOpcode.set, value: 2 },
    ])
  })

  it('should define a key on first use and reference its slot afterwards', () => {
    const table = new DynamicKeyTable()
    const patches: StatePatch[] = [
      { path: ['players', 'A'], op: 'add', value: { x: 0, y: 0 } },
      { path: ['players', 'A', 'x'], op: 'set', value: 4 },
      { path: ['players', 'B'], op: 'delete' },
    ]

    expect(encoder.encode(patches, table)).toEqual([
      { path: fnv1a32('players.*'), keys: [0, 'A'], op: PatchOpcode.add, value: { x: 0, y: 0 } },
      { path: fnv1a32('players.*.x'), keys: 0, op: PatchOpcode.set, value: 4 },
      { path: fnv1a32('players.*'), keys: [1, 'B'], op: PatchOpcode.delete },
    ])
  })

  it('should send a list of tokens for several wildcards', () => {
    const table = new DynamicKeyTable()
    table.lookup('r1')

    expect(encoder.encode([{ path: ['grid', 'r1', 'c2'], op: 'add', value: 4 }], table)).toEqual([
      { path: fnv1a32('grid.*.*'), keys: [0, [1, 'c2']], op: PatchOpcode.add, value: 4 },
    ])
  })

  it('should send keys raw once the table is full', () => {
    const table = new DynamicKeyTable(1)
    table.lookup('A')

    expect(encoder.encode([{ path: ['players', 'B'], op: 'delete' }], table)).toEqual([
      { path: fnv1a32('players.*'), keys: 'B', op: PatchOpcode.delete },
    ])
  })

  it('should never emit a token list shaped like a definition', () => {
    const table = new DynamicKeyTable(1)
    table.lookup('r1')

    const [patch] = encoder.encode([{ path: ['grid', 'r1', 'c2'], op: 'add', value: 4 }], table)
    expect(patch.keys).toEqual([[0, 'r1'], 'c2'])
  })

  it('should fall back to a JSON Pointer for paths outside the table', () => {
    const table = new DynamicKeyTable()
    expect(encoder.encode([{ path: ['settings', 'a/b~c'], op: 'set', value: 1 }], table)).toEqual([
      { path: '/settings/a~1b~0c', op: PatchOpcode.set, value: 1 },
    ])
  })

  it('should send every path as a JSON Pointer without a hasher', () => {
    const plain = new PatchEncoder(null)
    const table = new DynamicKeyTable()
    expect(plain.encode([{ path: ['players', 'A', 'x'], op: 'set', value: 1 }], table)).toEqual([
      { path: '/players/A/x', op: PatchOpcode.set, value: 1 },
    ])
    expect(table.size).toBe(0)
  })
})

describe('PatchDecoder', () => {
  it('should reverse the encoder', () => {
    const encoder = new PatchEncoder(Board.pathHasher)
    const table = new DynamicKeyTable(2)
    const patches: StatePatch[] = [
      { path: ['players', 'A'], op: 'add', value: { x: 0, y: 0 } },
      { path: ['players', 'A', 'x'], op: 'set', value: 4 },
      { path: ['grid', 'r1', 'c2'], op: 'add', value: 4 },
      { path: ['grid', 'r1', 'c3'], op: 'add', value: 5 },
      { path: ['settings', 'a/b'], op: 'set', value: 1 },
      { path: ['players', 'B'], op: 'delete' },
    ]

    const wire = encoder.encode(patches, table)
    const decoder = new PatchDecoder(Board.pathHasher)
    decoder.decode({ kind: 'firstSync', patches: [] })

    expect(decoder.decode({ kind: 'diff', patches: wire })).toEqual(patches)
  })

  it('should seed the broadcast scope from a participant full sync', () => {
    const decoder = new PatchDecoder(Board.pathHasher)
    decoder.decode({ kind: 'firstSync', patches: [], broadcastKeys: [[3, 'A']] })

    const decoded = decoder.decode(
      { kind: 'diff', patches: [{ path: fnv1a32('players.*.x'), keys: 3, op: PatchOpcode.set, value: 1 }] },
      'broadcast',
    )
    expect(decoded).toEqual([{ path: ['players', 'A', 'x'], op: 'set', value: 1 }])
  })

  it('should keep scopes apart', () => {
    const decoder = new PatchDecoder(Board.pathHasher)
    decoder.decode({ kind: 'firstSync', patches: [] })
    decoder.decode({ kind: 'diff', patches: [{ path: fnv1a32('players.*'), keys: [0, 'A'], op: PatchOpcode.delete }] })

    expect(() =>
      decoder.decode({ kind: 'diff', patches: [{ path: fnv1a32('players.*'), keys: 0, op: PatchOpcode.delete }] }, 'broadcast'),
    ).toThrow(StaleSlotError)
  })

  it('should forget participant slots on a new full sync', () => {
    const decoder = new PatchDecoder(Board.pathHasher)
    decoder.decode({ kind: 'diff', patches: [{ path: fnv1a32('players.*'), keys: [0, 'A'], op: PatchOpcode.delete }] })
    decoder.decode({ kind: 'firstSync', patches: [] })

    expect(() =>
      decoder.decode({ kind: 'diff', patches: [{ path: fnv1a32('players.*'), keys: 0, op: PatchOpcode.delete }] }),
    ).toThrow('Unknown dynamic key slot 0 in participant scope')
  })

  it('should reject unknown hashes and opcodes', () => {
    const decoder = new PatchDecoder(Board.pathHasher)
    expect(() => decoder.decode({ kind: 'diff', patches: [{ path: 7, op: PatchOpcode.set, value: 1 }] })).toThrow(
      'Unknown path hash 7',
    )
  })

  it('should decode nothing from an empty update', () => {
    expect(new PatchDecoder(Board.pathHasher).decode({ kind: 'noChange' })).toEqual([])
  })
})

describe('applyPatches', () => {
  it('should apply patches in order', () => {
    const view: Record<string, unknown> = {}
    applyPatches(view, [
      { path: ['round'], op: 'set', value: 1 },
      { path: ['players'], op: 'set', value: {} },
      { path: ['players', 'A'], op: 'add', value: { x: 0, y: 0 } },
      { path: ['players', 'A', 'x'], op: 'set', value: 3 },
      { path: ['players', 'B'], op: 'add', value: { x: 1, y: 1 } },
      { path: ['players', 'B'], op: 'delete' },
    ])
    expect(view).toEqual({ round: 1, players: { A: { x: 3, y: 0 } } })
  })

  it('should create missing parents and ignore deletes under missing ones', () => {
    const view: Record<string, unknown> = {}
    applyPatches(view, [
      { path: ['grid', 'r1', 'c1'], op: 'add', value: 2 },
      { path: ['players', 'A', 'x'], op: 'delete' },
    ])
    expect(view).toEqual({ grid: { r1: { c1: 2 } } })
  })

  it('should copy values', () => {
    const value = { x: 1 }
    const view: Record<string, unknown> = {}
    applyPatches(view, [{ path: ['pos'], op: 'set', value }])
    value.x = 2
    expect(view).toEqual({ pos: { x: 1 } })
  })
})
