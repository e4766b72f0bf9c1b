import type {
  DispatchJob,
  MessagingProvider,
  MessagingProviderFactory,
  OptOutSource,
  ProviderCredentials,
  Recipient,
  SendOutcome,
  TemplateEngine,
} from '../index'
import { systemClock, type Clock } from '../clock'
import { resolveEngineConfig, type EngineConfig } from '../config'
import { PreflightError, RunCancelledError, describeError } from '../errors'
import { isolateLogger, silentLogger, type Logger } from '../logging/logger'
import { filterRecipients } from '../recipients/filter'
import { placeholderTemplateEngine } from '../templates/render'
import { dispatchJobs, type DispatchResult } from '../dispatch/pool'
import { pollAll, type SentMessage } from '../delivery/poller'
import { countOutcomes, type RunReport, type RunReportEntry } from './report'

export type RunState = 'idle' | 'filtering' | 'dispatching' | 'polling' | 'completed' | 'cancelled'

export interface ProgressSink {
  onStateChange?(state: RunState): void
  onDispatchProgress?(completed: number, total: number): void
  onComplete?(report: RunReport): void
}

export type RunInput = {
  recipients: readonly Recipient[]
  template: string
  credentials: Partial<ProviderCredentials>
  optOuts?: OptOutSource
  /** Checked between phases; in-flight sends and polls always run to completion. */
  signal?: AbortSignal
}

export type RunDependencies = {
  createProvider: MessagingProviderFactory
  config?: Partial<EngineConfig>
  logger?: Logger
  clock?: Clock
  templates?: TemplateEngine
  progress?: ProgressSink
}

const EMPTY_OPT_OUTS: ReadonlySet<string> = new Set()

function completeCredentials(credentials: Partial<ProviderCredentials>): ProviderCredentials | null {
  const { accountId, authToken, senderAddress } = credentials
  if (!accountId || !authToken || !senderAddress) return null
  return { accountId, authToken, senderAddress }
}

/**
 * One execution of filter, render, dispatch and poll over a fixed recipient list.
 * Instances are single-use; start a new run with a new instance.
 */
export class DispatchRun {
  private current: RunState = 'idle'
  private started = false
  private readonly config: EngineConfig
  private readonly logger: Logger
  private readonly clock: Clock
  private readonly templates: TemplateEngine

  constructor(private readonly deps: RunDependencies) {
    this.config = resolveEngineConfig(deps.config)
    this.logger = isolateLogger(deps.logger ?? silentLogger)
    this.clock = deps.clock ?? systemClock
    this.templates = deps.templates ?? placeholderTemplateEngine
  }

  get state(): RunState {
    return this.current
  }

  async execute(input: RunInput): Promise<RunReport> {
    if (this.started) throw new Error('DispatchRun instances are single-use; create a new one per run')
    this.started = true

    const { provider, credentials } = await this.preflight(input)

    const startedAt = this.clock.now()
    this.logger.info('SMS sending started', { startedAt: startedAt.toISOString(), recipients: input.recipients.length })

    this.transition('filtering')
    const optOuts = input.optOuts ? await input.optOuts.snapshot() : EMPTY_OPT_OUTS
    const { eligible, skipped } = filterRecipients(input.recipients, optOuts, this.logger)
    const outcomes = new Array<SendOutcome | undefined>(input.recipients.length)
    for (const s of skipped) outcomes[s.index] = s.outcome

    if (input.signal?.aborted) {
      this.transition('cancelled')
      this.logger.warn('Run cancelled before dispatching', { eligible: eligible.length })
      throw new RunCancelledError()
    }

    this.transition('dispatching')
    const jobs: DispatchJob[] = eligible.map(({ index, recipient }) => ({
      index,
      recipient,
      body: this.templates.render(input.template, recipient),
    }))
    const dispatched = await dispatchJobs(jobs, provider, {
      from: credentials.senderAddress,
      concurrency: this.config.concurrency,
      logger: this.logger,
      onProgress: (completed, total) => this.deps.progress?.onDispatchProgress?.(completed, total),
    })
    for (const { job, outcome } of dispatched) outcomes[job.index] = outcome

    const entries: RunReportEntry[] = input.recipients.map((recipient, index) => {
      const send = outcomes[index]
      // Every index is filled by either the filter or the dispatch pool
      if (!send) throw new Error(`No send outcome recorded for recipient #${index}`)
      return { recipient, send }
    })

    let cancelled = false
    if (input.signal?.aborted) {
      cancelled = true
      this.transition('cancelled')
      this.logger.warn('Run cancelled before polling delivery status', { sent: countSent(dispatched) })
    } else {
      this.transition('polling')
      const polled = await pollAll(sentMessages(dispatched), provider, {
        maxAttempts: this.config.pollAttempts,
        intervalMs: this.config.pollIntervalMs,
        concurrency: this.config.pollConcurrency,
        clock: this.clock,
        logger: this.logger,
      })
      for (const p of polled) {
        entries[p.index] = { ...entries[p.index], delivery: p.outcome, pollAttempts: p.attempts }
      }
    }

    const finishedAt = this.clock.now()
    const report: RunReport = {
      entries,
      startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      counts: countOutcomes(entries),
      cancelled,
    }
    if (!cancelled) this.transition('completed')
    this.logger.info('SMS sending finished', {
      finishedAt: finishedAt.toISOString(),
      durationMs: report.durationMs,
      ...report.counts,
    })
    this.notify(() => this.deps.progress?.onComplete?.(report))
    return report
  }

  private async preflight(input: RunInput): Promise<{ provider: MessagingProvider; credentials: ProviderCredentials }> {
    if (input.recipients.length === 0) {
      return this.fail(new PreflightError('missing_recipients', 'Please load recipient data first.'))
    }
    const credentials = completeCredentials(input.credentials)
    if (!credentials) {
      return this.fail(new PreflightError('missing_credentials', 'Please enter all provider credentials.'))
    }
    if (input.template === '') {
      return this.fail(new PreflightError('missing_template', 'Please enter the message text.'))
    }
    try {
      const provider = this.deps.createProvider(credentials)
      await provider.verifyCredentials()
      return { provider, credentials }
    } catch (error) {
      return this.fail(
        new PreflightError('authentication_failed', 'Failed to authenticate provider credentials.', { cause: error }),
        describeError(error)
      )
    }
  }

  private fail(error: PreflightError, detail?: string): never {
    this.logger.error(error.message, detail ? { reason: error.reason, detail } : { reason: error.reason })
    throw error
  }

  private transition(next: RunState) {
    this.current = next
    this.notify(() => this.deps.progress?.onStateChange?.(next))
  }

  private notify(callback: () => void) {
    try {
      callback()
    } catch (error) {
      this.logger.warn('Progress listener failed', { reason: describeError(error) })
    }
  }
}

function sentMessages(results: readonly DispatchResult[]): SentMessage[] {
  const sent: SentMessage[] = []
  for (const { job, outcome } of results) {
    if (outcome.kind === 'sent') sent.push({ index: job.index, recipient: job.recipient, messageId: outcome.messageId })
  }
  return sent
}

function countSent(results: readonly DispatchResult[]) {
  return results.filter((r) => r.outcome.kind === 'sent').length
}

export function runDispatch(input: RunInput, deps: RunDependencies): Promise<RunReport> {
  return new DispatchRun(deps).execute(input)
}
