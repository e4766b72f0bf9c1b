import type { DeliveryOutcome, Recipient, SendOutcome } from '../index'

export type RunReportEntry = {
  recipient: Recipient
  send: SendOutcome
  /** Present only when `send.kind` is `sent` and polling ran. */
  delivery?: DeliveryOutcome
  pollAttempts?: number
}

export type RunCounts = {
  total: number
  sent: number
  sendFailed: number
  skippedInvalidPhone: number
  skippedOptedOut: number
  delivered: number
  failed: number
  unknown: number
}

export type RunReport = {
  entries: RunReportEntry[]
  startedAt: Date
  finishedAt: Date
  durationMs: number
  counts: RunCounts
  /** Set when the run was cancelled before polling. */
  cancelled: boolean
}

export function countOutcomes(entries: readonly RunReportEntry[]): RunCounts {
  const counts: RunCounts = {
    total: entries.length,
    sent: 0,
    sendFailed: 0,
    skippedInvalidPhone: 0,
    skippedOptedOut: 0,
    delivered: 0,
    failed: 0,
    unknown: 0,
  }
  for (const entry of entries) {
    switch (entry.send.kind) {
      case 'sent':
        counts.sent++
        break
      case 'send_failed':
        counts.sendFailed++
        break
      case 'skipped_invalid_phone':
        counts.skippedInvalidPhone++
        break
      case 'skipped_opted_out':
        counts.skippedOptedOut++
        break
    }
    if (entry.delivery) counts[entry.delivery]++
  }
  return counts
}

export function describeOutcome(entry: RunReportEntry): string {
  switch (entry.send.kind) {
    case 'skipped_invalid_phone':
      return 'skipped: invalid phone number'
    case 'skipped_opted_out':
      return 'skipped: opted out'
    case 'send_failed':
      return `send failed: ${entry.send.reason}`
    case 'sent':
      return entry.delivery ? `sent (${entry.send.messageId}), ${entry.delivery}` : `sent (${entry.send.messageId})`
  }
}
