import type { DispatchJob, DispatchOutcome, MessagingProvider } from '../index'
import { runWithConcurrency } from '../concurrency/workerPool'
import { describeError } from '../errors'
import { isolateLogger, silentLogger, type Logger } from '../logging/logger'

export type DispatchResult = {
  job: DispatchJob
  outcome: DispatchOutcome
}

export type DispatchOptions = {
  from?: string
  concurrency: number
  logger?: Logger
  /** Fires once per job, in completion order. */
  onResult?: (result: DispatchResult) => void
  onProgress?: (completed: number, total: number) => void
}

async function sendOne(
  provider: MessagingProvider,
  job: DispatchJob,
  from: string | undefined,
  logger: Logger
): Promise<DispatchOutcome> {
  const { name, phone } = job.recipient
  logger.info('Sending message', { name, phone })
  let providerId: string
  try {
    const result = await provider.send({ to: phone, body: job.body, from })
    providerId = result.providerId
  } catch (error) {
    const reason = describeError(error, 'Unknown send error')
    logger.error('Failed to send message', { name, phone, reason })
    return { kind: 'send_failed', reason }
  }
  if (!providerId) {
    logger.error('Provider returned no message id', { name, phone })
    return { kind: 'send_failed', reason: 'Provider returned no message id' }
  }
  logger.info('Message sent', { name, phone, messageId: providerId })
  return { kind: 'sent', messageId: providerId }
}

function notify(logger: Logger, callback: () => void) {
  try {
    callback()
  } catch (error) {
    logger.warn('Progress callback failed', { reason: describeError(error) })
  }
}

/**
 * Sends every job with at most `concurrency` calls in flight. A failed send becomes a
 * `send_failed` outcome and never affects the other jobs. Resolves with the results in
 * completion order. Logger and callback failures never change an outcome.
 */
export async function dispatchJobs(
  jobs: readonly DispatchJob[],
  provider: MessagingProvider,
  options: DispatchOptions
): Promise<DispatchResult[]> {
  const logger = isolateLogger(options.logger ?? silentLogger)
  const completed: DispatchResult[] = []
  await runWithConcurrency(
    jobs,
    options.concurrency,
    (job) => sendOne(provider, job, options.from, logger),
    (outcome, index) => {
      const result = { job: jobs[index], outcome }
      completed.push(result)
      const count = completed.length
      notify(logger, () => options.onResult?.(result))
      notify(logger, () => options.onProgress?.(count, jobs.length))
    }
  )
  return completed
}
