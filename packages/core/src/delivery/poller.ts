import type { DeliveryOutcome, MessageStatus, MessagingProvider, Recipient } from '../index'
import { systemClock, type Clock } from '../clock'
import { runWithConcurrency } from '../concurrency/workerPool'
import { describeError } from '../errors'
import { isolateLogger, silentLogger, type Logger } from '../logging/logger'

export type PollOptions = {
  maxAttempts: number
  intervalMs: number
  clock?: Clock
}

export type PollResult = {
  outcome: DeliveryOutcome
  attempts: number
  lastStatus?: MessageStatus
  error?: string
}

export function classifyStatus(status: MessageStatus): DeliveryOutcome | undefined {
  if (status === 'delivered') return 'delivered'
  if (status === 'failed' || status === 'undelivered') return 'failed'
  return undefined
}

/**
 * Polls one message until it reaches a terminal status or `maxAttempts` calls have been made.
 * Attempts never overlap. A failed status fetch ends polling with `unknown`.
 */
export async function pollDeliveryStatus(
  provider: MessagingProvider,
  messageId: string,
  options: PollOptions
): Promise<PollResult> {
  const clock = options.clock ?? systemClock
  let lastStatus: MessageStatus | undefined
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    try {
      lastStatus = await provider.fetchStatus(messageId)
    } catch (error) {
      return { outcome: 'unknown', attempts: attempt, lastStatus, error: describeError(error, 'Unknown status error') }
    }
    const outcome = classifyStatus(lastStatus)
    if (outcome) return { outcome, attempts: attempt, lastStatus }
    if (attempt < options.maxAttempts) await clock.sleep(options.intervalMs)
  }
  return { outcome: 'unknown', attempts: options.maxAttempts, lastStatus }
}

export type SentMessage = {
  index: number
  recipient: Recipient
  messageId: string
}

export type PolledMessage = SentMessage & PollResult

export type PollAllOptions = PollOptions & {
  concurrency: number
  logger?: Logger
}

function logOutcome(logger: Logger, message: SentMessage, result: PollResult) {
  const details = { name: message.recipient.name, phone: message.recipient.phone, messageId: message.messageId }
  if (result.error) {
    logger.error('Failed to check message status', { ...details, reason: result.error })
  } else if (result.outcome === 'delivered') {
    logger.info('Message delivered', details)
  } else if (result.outcome === 'failed') {
    logger.error('Message failed', { ...details, status: result.lastStatus })
  } else {
    logger.warn('Message delivery status is unknown', { ...details, attempts: result.attempts, status: result.lastStatus })
  }
}

// Second phase: runs once every send has completed
export async function pollAll(
  messages: readonly SentMessage[],
  provider: MessagingProvider,
  options: PollAllOptions
): Promise<PolledMessage[]> {
  const logger = isolateLogger(options.logger ?? silentLogger)
  return runWithConcurrency(messages, options.concurrency, async (message) => {
    const result = await pollDeliveryStatus(provider, message.messageId, options)
    logOutcome(logger, message, result)
    return { ...message, ...result }
  })
}
