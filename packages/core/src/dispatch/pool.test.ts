import { describe, it, expect } from 'vitest'
import { dispatchJobs } from './pool'
import type { DispatchJob } from '../index'
import { CapturingLogger, ScriptedProvider, throwingLogger } from '../../test/providerHarness'

function jobsFor(phones: string[]): DispatchJob[] {
  return phones.map((phone, index) => ({ index, recipient: { name: `R${index}`, phone }, body: `Hi R${index}` }))
}

describe('dispatchJobs', () => {
  it('sends every job once with the sender address', async () => {
    const provider = new ScriptedProvider()
    const results = await dispatchJobs(jobsFor(['+1001', '+1002']), provider, { from: '+19990000000', concurrency: 5 })
    expect(results).toHaveLength(2)
    expect(provider.sends).toEqual([
      { to: '+1001', body: 'Hi R0', from: '+19990000000' },
      { to: '+1002', body: 'Hi R1', from: '+19990000000' },
    ])
  })

  it('caps in-flight sends at the concurrency limit', async () => {
    const phones = Array.from({ length: 12 }, (_, i) => `+1${i}`)
    const provider = new ScriptedProvider({ sendDelays: Object.fromEntries(phones.map((p) => [p, 5])) })
    await dispatchJobs(jobsFor(phones), provider, { concurrency: 5 })
    expect(provider.maxInFlight).toBe(5)
    expect(provider.sends).toHaveLength(12)
  })

  it('converts a failed send into send_failed without affecting siblings', async () => {
    const provider = new ScriptedProvider({ failSendFor: { '+1002': 'The To number is not a valid phone number' } })
    const results = await dispatchJobs(jobsFor(['+1001', '+1002', '+1003']), provider, { concurrency: 2 })
    const byIndex = Object.fromEntries(results.map((r) => [r.job.index, r.outcome]))
    expect(byIndex[1]).toEqual({ kind: 'send_failed', reason: 'The To number is not a valid phone number' })
    expect(byIndex[0].kind).toBe('sent')
    expect(byIndex[2].kind).toBe('sent')
  })

  it('treats a missing message id as a failure', async () => {
    const provider = new ScriptedProvider({ ids: { '+1001': '' } })
    const [result] = await dispatchJobs(jobsFor(['+1001']), provider, { concurrency: 1 })
    expect(result.outcome).toEqual({ kind: 'send_failed', reason: 'Provider returned no message id' })
  })

  it('emits results and progress in completion order', async () => {
    const provider = new ScriptedProvider({ sendDelays: { '+1001': 30, '+1002': 5, '+1003': 15 } })
    const progress: Array<[number, number]> = []
    const order: number[] = []
    const results = await dispatchJobs(jobsFor(['+1001', '+1002', '+1003']), provider, {
      concurrency: 3,
      onResult: (r) => order.push(r.job.index),
      onProgress: (completed, total) => progress.push([completed, total]),
    })
    expect(order).toEqual([1, 2, 0])
    expect(results.map((r) => r.job.index)).toEqual([1, 2, 0])
    expect(progress).toEqual([[1, 3], [2, 3], [3, 3]])
  })

  it('logs attempts, successes and failures', async () => {
    const logger = new CapturingLogger()
    const provider = new ScriptedProvider({ failSendFor: { '+1002': 'rejected' } })
    await dispatchJobs(jobsFor(['+1001', '+1002']), provider, { concurrency: 1, logger })
    expect(logger.lines).toEqual([
      { level: 'info', message: 'Sending message', details: { name: 'R0', phone: '+1001' } },
      { level: 'info', message: 'Message sent', details: { name: 'R0', phone: '+1001', messageId: 'M1' } },
      { level: 'info', message: 'Sending message', details: { name: 'R1', phone: '+1002' } },
      { level: 'error', message: 'Failed to send message', details: { name: 'R1', phone: '+1002', reason: 'rejected' } },
    ])
  })

  it('keeps an accepted message as sent when logging it throws', async () => {
    const provider = new ScriptedProvider()
    const results = await dispatchJobs(jobsFor(['+1001']), provider, {
      concurrency: 5,
      logger: throwingLogger(['Sending message', 'Message sent']),
    })
    expect(provider.sends).toHaveLength(1)
    expect(results.map((r) => r.outcome)).toEqual([{ kind: 'sent', messageId: 'M1' }])
  })

  it('finishes every job when a progress callback throws', async () => {
    const provider = new ScriptedProvider()
    const logger = new CapturingLogger()
    const results = await dispatchJobs(jobsFor(['+1001', '+1002']), provider, {
      concurrency: 1,
      logger,
      onProgress: () => {
        throw new Error('terminal closed')
      },
    })
    expect(results.map((r) => r.outcome.kind)).toEqual(['sent', 'sent'])
    expect(logger.messages('warn')).toEqual(['Progress callback failed', 'Progress callback failed'])
  })
})
