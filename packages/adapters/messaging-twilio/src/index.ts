import { AuthenticationError, SendError, describeError, type MessagingProvider, type MessageStatus } from '@textrun/core'
import twilio from 'twilio'

type TwilioClient = ReturnType<typeof twilio>
type MessageCreateOptions = Parameters<TwilioClient['messages']['create']>[0]

export function toMessageStatus(status: string): MessageStatus {
  switch (status) {
    case 'accepted':
    case 'scheduled':
    case 'queued':
    case 'sending':
      return 'queued'
    case 'sent':
      return 'sent'
    case 'delivered':
    case 'read':
      return 'delivered'
    case 'failed':
    case 'canceled':
      return 'failed'
    case 'undelivered':
      return 'undelivered'
    default:
      return 'unknown'
  }
}

function errorCode(error: unknown): string | number | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined
  const { code } = error
  return typeof code === 'string' || typeof code === 'number' ? code : undefined
}

const MESSAGING_SERVICE_SID = /^MG[0-9a-fA-F]{32}$/

export function isMessagingServiceSid(sender: string) {
  return MESSAGING_SERVICE_SID.test(sender)
}

/** Sends through Twilio. A sender that is a Messaging Service SID is passed as `messagingServiceSid`. */
export class TwilioMessagingProvider implements MessagingProvider {
  private client: TwilioClient
  private accountSid: string

  constructor(args: { accountSid: string; authToken: string }) {
    this.client = twilio(args.accountSid, args.authToken)
    this.accountSid = args.accountSid
  }

  async verifyCredentials(): Promise<void> {
    try {
      await this.client.api.v2010.accounts(this.accountSid).fetch()
    } catch (error) {
      throw new AuthenticationError(`Twilio rejected the credentials: ${describeError(error)}`, { cause: error })
    }
  }

  async send(input: { to: string; body: string; from?: string }): Promise<{ providerId: string; status: MessageStatus }> {
    const params: MessageCreateOptions = {
      to: input.to,
      body: input.body,
    }
    if (input.from && isMessagingServiceSid(input.from)) {
      params.messagingServiceSid = input.from
    } else if (input.from) {
      params.from = input.from
    }
    try {
      const message = await this.client.messages.create(params)
      return { providerId: message.sid, status: toMessageStatus(message.status) }
    } catch (error) {
      throw new SendError(describeError(error, 'Twilio send failed'), { cause: error, code: errorCode(error) })
    }
  }

  async fetchStatus(providerId: string): Promise<MessageStatus> {
    const message = await this.client.messages(providerId).fetch()
    return toMessageStatus(message.status)
  }
}
