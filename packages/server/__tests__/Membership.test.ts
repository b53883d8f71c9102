import { describe, expect, it } from 'vitest'
import { EventQueue } from '../src/EventQueue'
import { Membership } from '../src/Membership'

function info(participantId: string, sessionId: string) {
  return { participantId, sessionId, metadata: {}, joinedAt: 0 }
}

describe('Membership', () => {
  it('bumps the epoch on every registration and removal', () => {
    const membership = new Membership()
    expect(membership.register(info('A', 's1'))).toBe(1)
    expect(membership.remove('A')?.sessionId).toBe('s1')
    expect(membership.epochOf('A')).toBeUndefined()
    expect(membership.register(info('A', 's2'))).toBe(3)
    expect(membership.epochOf('A')).toBe(3)
  })

  it('reports only the current epoch of a present participant as current', () => {
    const membership = new Membership()
    membership.register(info('A', 's1'))
    expect(membership.isCurrent('A', 1)).toBe(true)

    membership.remove('A')
    expect(membership.isCurrent('A', 1)).toBe(false)
    expect(membership.isCurrent('A', 2)).toBe(false)
  })

  it('ignores removal of an absent participant', () => {
    const membership = new Membership()
    expect(membership.remove('A')).toBeUndefined()
    expect(membership.register(info('A', 's1'))).toBe(1)
  })

  it('lists present participants', () => {
    const membership = new Membership()
    membership.register(info('A', 's1'))
    membership.register(info('B', 's2'))
    membership.remove('A')
    expect(membership.ids()).toEqual(['B'])
    expect(membership.size).toBe(1)
  })
})

describe('EventQueue', () => {
  it('delivers events whose epoch is current and drops the rest', () => {
    const membership = new Membership()
    const queue = new EventQueue()

    const epochA = membership.register(info('A', 's1'))
    const epochB = membership.register(info('B', 's2'))
    queue.enqueue('A', epochA, { type: 'damaged', payload: 20 })
    queue.enqueue('B', epochB, { type: 'hit' })

    membership.remove('A')
    membership.register(info('A', 's3'))

    const { delivered, dropped } = queue.flush((id, epoch) => membership.isCurrent(id, epoch))
    expect(delivered).toEqual([{ participantId: 'B', epoch: 1, event: { type: 'hit' } }])
    expect(dropped).toEqual([{ participantId: 'A', epoch: 1, event: { type: 'damaged', payload: 20 } }])
    expect(queue.size).toBe(0)
  })

  it('keeps queue order', () => {
    const queue = new EventQueue()
    queue.enqueue('A', 1, { type: 'first' })
    queue.enqueue('A', 1, { type: 'second' })
    const { delivered } = queue.flush(() => true)
    expect(delivered.map((entry) => entry.event.type)).toEqual(['first', 'second'])
  })
})
