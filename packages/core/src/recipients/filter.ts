import type { Recipient, SkipOutcome } from '../index'
import { silentLogger, type Logger } from '../logging/logger'

export const PHONE_PATTERN = /^\+[0-9]+$/

export function isValidPhone(phone: string): boolean {
  return PHONE_PATTERN.test(phone)
}

export type IndexedRecipient = { index: number; recipient: Recipient }

export type SkippedRecipient = IndexedRecipient & { outcome: SkipOutcome }

export type FilterResult = {
  eligible: IndexedRecipient[]
  skipped: SkippedRecipient[]
}

/**
 * Splits the input into recipients to dispatch and recipients to skip, both in input order.
 * Duplicate phones are kept: every row is its own job.
 */
export function filterRecipients(
  recipients: readonly Recipient[],
  optOuts: ReadonlySet<string>,
  logger: Logger = silentLogger
): FilterResult {
  const eligible: IndexedRecipient[] = []
  const skipped: SkippedRecipient[] = []
  recipients.forEach((recipient, index) => {
    if (!isValidPhone(recipient.phone)) {
      logger.warn('Invalid phone number skipped', { name: recipient.name, phone: recipient.phone })
      skipped.push({ index, recipient, outcome: { kind: 'skipped_invalid_phone' } })
      return
    }
    if (optOuts.has(recipient.phone)) {
      logger.info('Skipping opted-out number', { name: recipient.name, phone: recipient.phone })
      skipped.push({ index, recipient, outcome: { kind: 'skipped_opted_out' } })
      return
    }
    eligible.push({ index, recipient })
  })
  return { eligible, skipped }
}
