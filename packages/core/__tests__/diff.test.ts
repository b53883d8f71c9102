import { describe, expect, it } from 'vitest'
import { defineState, diffSnapshots, field, snapshotPatches } from '../src'

const Game = defineState({
  round: field.integer(),
  players: field.map(field.object({ x: field.number(), y: field.number() })),
  deck: field.array(field.string()),
  settings: field.json({ rounds: 3 }),
  scores: field.map(field.number()).custom((pid, scores) => ({ mine: scores[pid] ?? 0 })),
  hands: field.map(field.string()).perParticipant((hands) => hands),
})

describe('diffSnapshots', () => {
  it('should return nothing for equal views', () => {
    const view = { round: 1, players: { A: { x: 0, y: 0 } } }
    expect(diffSnapshots(Game, view, structuredClone(view))).toEqual([])
  })

  it('should set changed primitives', () => {
    expect(diffSnapshots(Game, { round: 1 }, { round: 2 })).toEqual([{ path: ['round'], op: 'set', value: 2 }])
  })

  it('should recurse into maps and objects', () => {
    const prev = { players: { A: { x: 0, y: 0 }, B: { x: 1, y: 1 } } }
    const next = { players: { A: { x: 5, y: 0 }, C: { x: 2, y: 2 } } }

    expect(diffSnapshots(Game, prev, next)).toEqual([
      { path: ['players', 'A', 'x'], op: 'set', value: 5 },
      { path: ['players', 'C'], op: 'add', value: { x: 2, y: 2 } },
      { path: ['players', 'B'], op: 'delete' },
    ])
  })

  it('should replace arrays as a whole', () => {
    expect(diffSnapshots(Game, { deck: ['a'] }, { deck: ['a', 'b'] })).toEqual([
      { path: ['deck'], op: 'set', value: ['a', 'b'] },
    ])
  })

  it('should replace JSON fields as a whole', () => {
    expect(diffSnapshots(Game, { settings: { rounds: 3 } }, { settings: { rounds: 4 } })).toEqual([
      { path: ['settings'], op: 'set', value: { rounds: 4 } },
    ])
  })

  it('should replace custom views as a whole', () => {
    expect(diffSnapshots(Game, { scores: { mine: 0 } }, { scores: { mine: 5 } })).toEqual([
      { path: ['scores'], op: 'set', value: { mine: 5 } },
    ])
  })

  it('should add and delete fields that appear in or vanish from a view', () => {
    expect(diffSnapshots(Game, {}, { hands: { A: 'x' } })).toEqual([
      { path: ['hands'], op: 'add', value: { A: 'x' } },
    ])
    expect(diffSnapshots(Game, { hands: { A: 'x' } }, {})).toEqual([{ path: ['hands'], op: 'delete' }])
  })

  it('should compare only the given fields', () => {
    const prev = { round: 1, deck: ['a'] }
    const next = { round: 2, deck: ['b'] }
    expect(diffSnapshots(Game, prev, next, ['deck'])).toEqual([{ path: ['deck'], op: 'set', value: ['b'] }])
  })

  it('should set a value whose type changed', () => {
    expect(diffSnapshots(Game, { players: { A: { x: 0, y: 0 } } }, { players: { A: null } })).toEqual([
      { path: ['players', 'A'], op: 'set', value: null },
    ])
  })
})

describe('snapshotPatches', () => {
  it('should set every field', () => {
    expect(snapshotPatches({ round: 1, players: {} })).toEqual([
      { path: ['round'], op: 'set', value: 1 },
      { path: ['players'], op: 'set', value: {} },
    ])
  })
})
