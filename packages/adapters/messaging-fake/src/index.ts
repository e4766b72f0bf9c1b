import { AuthenticationError, SendError, type MessagingProvider, type MessageStatus } from '@textrun/core'

export type FakeMessagingOptions = {
  /** Statuses handed out by successive fetchStatus calls for every message; the last one repeats. */
  statusSequence?: MessageStatus[]
  /** Phone numbers whose sends are rejected. */
  rejectNumbers?: Iterable<string>
  rejectCredentials?: boolean
}

export type FakeSentMessage = { providerId: string; to: string; body: string; from?: string }

export class FakeMessagingProvider implements MessagingProvider {
  readonly sent: FakeSentMessage[] = []
  private readonly polls = new Map<string, number>()
  private readonly rejected: Set<string>

  constructor(private readonly options: FakeMessagingOptions = {}) {
    this.rejected = new Set(options.rejectNumbers ?? [])
  }

  async verifyCredentials(): Promise<void> {
    if (this.options.rejectCredentials) throw new AuthenticationError('Fake provider rejected the credentials')
  }

  async send(input: { to: string; body: string; from?: string }): Promise<{ providerId: string; status: MessageStatus }> {
    if (this.rejected.has(input.to)) throw new SendError(`Fake provider rejected ${input.to}`)
    const providerId = `fake_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`
    this.sent.push({ providerId, ...input })
    return { providerId, status: 'sent' }
  }

  async fetchStatus(providerId: string): Promise<MessageStatus> {
    if (!this.sent.some((m) => m.providerId === providerId)) return 'unknown'
    const attempt = this.polls.get(providerId) ?? 0
    this.polls.set(providerId, attempt + 1)
    const sequence = this.options.statusSequence ?? ['delivered']
    if (sequence.length === 0) return 'delivered'
    return sequence[Math.min(attempt, sequence.length - 1)]
  }
}
