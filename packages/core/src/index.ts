export type MessageStatus = 'queued' | 'sent' | 'delivered' | 'failed' | 'undelivered' | 'unknown'

export type Recipient = {
  readonly name: string
  readonly phone: string
}

export type ProviderCredentials = {
  accountId: string
  authToken: string
  senderAddress: string
}

export interface MessagingProvider {
  /** Rejects with an AuthenticationError when the provider refuses the credentials. */
  verifyCredentials(): Promise<void>
  send(input: { to: string; body: string; from?: string }): Promise<{
    providerId: string
    status: MessageStatus
  }>
  fetchStatus(providerId: string): Promise<MessageStatus>
}

export type MessagingProviderFactory = (credentials: ProviderCredentials) => MessagingProvider

export interface TemplateEngine {
  render(template: string, recipient: Recipient): string
}

export type SkipOutcome = { kind: 'skipped_invalid_phone' } | { kind: 'skipped_opted_out' }

export type DispatchOutcome = { kind: 'sent'; messageId: string } | { kind: 'send_failed'; reason: string }

export type SendOutcome = DispatchOutcome | SkipOutcome

export type DeliveryOutcome = 'delivered' | 'failed' | 'unknown'

export type DispatchJob = {
  /** Position of the recipient in the input list. */
  index: number
  recipient: Recipient
  body: string
}

export interface OptOutSource {
  snapshot(): ReadonlySet<string> | Promise<ReadonlySet<string>>
}

export * from './clock'
export * from './config'
export * from './errors'
export * from './logging/logger'
export * from './concurrency/workerPool'
export * from './consent/optOuts'
export * from './recipients/filter'
export * from './templates/render'
export * from './dispatch/pool'
export * from './delivery/poller'
export * from './run/report'
export * from './run/coordinator'
