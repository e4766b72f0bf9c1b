import { describeOutcome, type ProgressSink, type RunReport } from '@textrun/core'

export function createTerminalProgress(write: (line: string) => void): ProgressSink {
  return {
    onStateChange: (state) => {
      if (state === 'polling') write('Checking delivery status...')
      if (state === 'cancelled') write('Cancelled.')
    },
    onDispatchProgress: (completed, total) => write(`Sent ${completed}/${total}`),
  }
}

export function formatSummary(report: RunReport): string[] {
  const { counts } = report
  const lines = report.entries.map(
    (entry) => `${entry.recipient.name} <${entry.recipient.phone}>: ${describeOutcome(entry)}`
  )
  lines.push(
    `Recipients ${counts.total}: sent ${counts.sent}, send failed ${counts.sendFailed}, ` +
      `invalid phone ${counts.skippedInvalidPhone}, opted out ${counts.skippedOptedOut}`
  )
  if (!report.cancelled) {
    lines.push(`Delivered ${counts.delivered}, failed ${counts.failed}, unknown ${counts.unknown}`)
  }
  lines.push(`${report.cancelled ? 'Cancelled' : 'Finished'} in ${(report.durationMs / 1000).toFixed(1)}s`)
  return lines
}
