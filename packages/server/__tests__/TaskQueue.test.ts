import { describe, expect, it } from 'vitest'
import { TaskQueue } from '../src/TaskQueue'

describe('TaskQueue', () => {
  it('runs tasks one at a time in order', async () => {
    const queue = new TaskQueue()
    const log: string[] = []

    const first = queue.run(async () => {
      log.push('first:start')
      await new Promise((resolve) => setTimeout(resolve, 5))
      log.push('first:end')
      return 1
    })
    const second = queue.run(() => {
      log.push('second')
      return 2
    })

    expect(await Promise.all([first, second])).toEqual([1, 2])
    expect(log).toEqual(['first:start', 'first:end', 'second'])
  })

  it('keeps going after a task fails', async () => {
    const queue = new TaskQueue()
    const failing = queue.run(() => {
      throw new Error('bad task')
    })
    const next = queue.run(() => 'ok')

    await expect(failing).rejects.toThrow('bad task')
    expect(await next).toBe('ok')
  })

  it('counts pending tasks', async () => {
    const queue = new TaskQueue()
    const task = queue.run(() => undefined)
    expect(queue.size).toBe(1)
    await task
    expect(queue.size).toBe(0)
  })
})
