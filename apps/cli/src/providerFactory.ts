import type { MessagingProviderFactory, ProviderCredentials } from '@textrun/core'
import { FakeMessagingProvider } from '@textrun/messaging-fake'
import { TwilioMessagingProvider } from '@textrun/messaging-twilio'
import type { CliEnv } from './env'

export type ProviderKind = 'twilio' | 'fake'

const FAKE_SENDER = '+15550000000'

export function createProviderFactory(kind: ProviderKind): MessagingProviderFactory {
  if (kind === 'fake') return () => new FakeMessagingProvider()
  return (credentials) =>
    new TwilioMessagingProvider({ accountSid: credentials.accountId, authToken: credentials.authToken })
}

// The fake provider ignores credentials, so it gets placeholders. Twilio sends from the
// configured number, else through the configured Messaging Service.
export function credentialsFor(kind: ProviderKind, env: CliEnv): Partial<ProviderCredentials> {
  if (kind === 'fake') {
    return { accountId: 'fake', authToken: 'fake', senderAddress: env.TWILIO_FROM_E164 ?? FAKE_SENDER }
  }
  return {
    accountId: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    senderAddress: env.TWILIO_FROM_E164 ?? env.TWILIO_MESSAGING_SERVICE_SID,
  }
}
