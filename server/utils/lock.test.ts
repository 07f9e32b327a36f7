import { describe, expect, it } from 'vitest'
import { KeyedLock } from './lock'

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('KeyedLock', () => {
  it('runs tasks with the same key one after another', async () => {
    const lock = new KeyedLock()
    const order: string[] = []
    const gate = deferred()
    const started = deferred()

    const first = lock.run('s1', async () => {
      order.push('first:start')
      started.resolve()
      await gate.promise
      order.push('first:end')
    })
    const second = lock.run('s1', async () => {
      order.push('second')
    })

    await started.promise
    expect(order).toEqual(['first:start'])

    gate.resolve()
    await Promise.all([first, second])
    expect(order).toEqual(['first:start', 'first:end', 'second'])
    expect(lock.isLocked('s1')).toBe(false)
  })

  it('does not block other keys', async () => {
    const lock = new KeyedLock()
    const gate = deferred()
    const blocked = lock.run('s1', () => gate.promise)

    await expect(lock.run('s2', async () => 'done')).resolves.toBe('done')
    expect(lock.isLocked('s1')).toBe(true)

    gate.resolve()
    await blocked
  })

  it('releases the key when a task fails', async () => {
    const lock = new KeyedLock()
    await expect(lock.run('s1', async () => {
      throw new Error('boom')
    })).rejects.toThrow('boom')

    await expect(lock.run('s1', async () => 1)).resolves.toBe(1)
  })

  it('ignores a second release', async () => {
    const lock = new KeyedLock()
    const release = await lock.acquire('s1')
    release()
    release()

    const next = await lock.acquire('s1')
    expect(lock.isLocked('s1')).toBe(true)
    next()
    expect(lock.isLocked('s1')).toBe(false)
  })
})
