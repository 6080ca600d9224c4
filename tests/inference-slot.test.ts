import { describe, expect, it } from 'vitest'
import { InferenceSlot } from '../src/modules/classification/services/domain/inference-slot'

describe('InferenceSlot', () => {
  it('runs tasks one after another in submission order', async () => {
    const slot = new InferenceSlot()
    const log: string[] = []

    const task = (name: string, ms: number) => () =>
      new Promise<string>((resolve) => {
        log.push(`start ${name}`)
        setTimeout(() => {
          log.push(`end ${name}`)
          resolve(name)
        }, ms)
      })

    const results = await Promise.all([slot.run(task('a', 10)), slot.run(task('b', 1))])

    expect(results).toEqual(['a', 'b'])
    expect(log).toEqual(['start a', 'end a', 'start b', 'end b'])
  })

  it('keeps serving tasks after one rejects', async () => {
    const slot = new InferenceSlot()

    const failed = slot.run(() => Promise.reject(new Error('boom')))
    const next = slot.run(() => Promise.resolve(42))

    await expect(failed).rejects.toThrow('boom')
    await expect(next).resolves.toBe(42)
  })
})
