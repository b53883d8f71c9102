import { describe, expect, it } from 'vitest'
import { broadcastScope, DynamicKeyTable, KeyTableStore, participantScope } from '../src'

describe('DynamicKeyTable', () => {
  it('should assign slots in first-seen order', () => {
    const table = new DynamicKeyTable()

    expect(table.lookup('alice')).toEqual({ slot: 0, isNew: true })
    expect(table.lookup('bob')).toEqual({ slot: 1, isNew: true })
    expect(table.lookup('alice')).toEqual({ slot: 0, isNew: false })
    expect(table.size).toBe(2)
    expect(table.entries()).toEqual([
      [0, 'alice'],
      [1, 'bob'],
    ])
  })

  it('should report unknown keys without assigning a slot', () => {
    const table = new DynamicKeyTable()
    expect(table.slotOf('alice')).toBeUndefined()
    expect(table.size).toBe(0)
  })

  it('should stop assigning slots once full', () => {
    const table = new DynamicKeyTable(1)

    expect(table.lookup('alice')).toEqual({ slot: 0, isNew: true })
    expect(table.lookup('bob')).toBeNull()
    expect(table.lookup('alice')).toEqual({ slot: 0, isNew: false })
  })
})

describe('KeyTableStore', () => {
  it('should keep broadcast and participant scopes apart', () => {
    const store = new KeyTableStore()

    store.table(broadcastScope).lookup('x')
    store.table(participantScope('A')).lookup('y')

    expect(store.get(broadcastScope)?.entries()).toEqual([[0, 'x']])
    expect(store.get(participantScope('A'))?.entries()).toEqual([[0, 'y']])
    expect(store.get(participantScope('B'))).toBeUndefined()
  })

  it('should start a scope over on reset', () => {
    const store = new KeyTableStore()
    store.table(participantScope('A')).lookup('y')

    const fresh = store.reset(participantScope('A'))

    expect(fresh.size).toBe(0)
    expect(store.get(participantScope('A'))).toBe(fresh)
  })

  it('should drop a participant scope', () => {
    const store = new KeyTableStore()
    store.table(participantScope('A'))
    store.table(participantScope('B'))

    store.drop('A')

    expect(store.participantIds()).toEqual(['B'])
  })

  it('should pass the slot limit to every scope', () => {
    const store = new KeyTableStore(2)
    expect(store.table(broadcastScope).maxSlots).toBe(2)
    expect(store.reset(participantScope('A')).maxSlots).toBe(2)
  })

  it('should clear every scope', () => {
    const store = new KeyTableStore()
    store.table(broadcastScope)
    store.table(participantScope('A'))

    store.clear()

    expect(store.get(broadcastScope)).toBeUndefined()
    expect(store.participantIds()).toEqual([])
  })
})
