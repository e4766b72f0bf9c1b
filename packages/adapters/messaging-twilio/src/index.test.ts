import { describe, it, expect, vi, beforeEach } from 'vitest'
import { AuthenticationError, SendError } from '@textrun/core'
import { TwilioMessagingProvider, isMessagingServiceSid, toMessageStatus } from './index'

const twilioMock = vi.hoisted(() => {
  const create = vi.fn()
  const fetchMessage = vi.fn()
  const fetchAccount = vi.fn()
  const messages = Object.assign(vi.fn(() => ({ fetch: fetchMessage })), { create })
  const accounts = vi.fn(() => ({ fetch: fetchAccount }))
  const factory = vi.fn(() => ({ messages, api: { v2010: { accounts } } }))
  return { create, fetchMessage, fetchAccount, messages, accounts, factory }
})

vi.mock('twilio', () => ({ default: twilioMock.factory }))

const SERVICE_SID = `MG${'0'.repeat(32)}`

function provider() {
  return new TwilioMessagingProvider({ accountSid: 'AC-test', authToken: 'test-secret' })
}

describe('TwilioMessagingProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('builds the client from the account credentials', () => {
    provider()
    expect(twilioMock.factory).toHaveBeenCalledWith('AC-test', 'test-secret')
  })

  it('sends from the given number', async () => {
    twilioMock.create.mockResolvedValue({ sid: 'SM1', status: 'queued' })
    const result = await provider().send({ to: '+15551234567', body: 'Hi Alice!', from: '+15550000000' })
    expect(twilioMock.create).toHaveBeenCalledWith({ to: '+15551234567', body: 'Hi Alice!', from: '+15550000000' })
    expect(result).toEqual({ providerId: 'SM1', status: 'queued' })
  })

  it('sends through a messaging service when the sender is a service SID', async () => {
    twilioMock.create.mockResolvedValue({ sid: 'SM2', status: 'accepted' })
    const result = await provider().send({ to: '+15551234567', body: 'Hi', from: SERVICE_SID })
    expect(twilioMock.create).toHaveBeenCalledWith({ to: '+15551234567', body: 'Hi', messagingServiceSid: SERVICE_SID })
    expect(result).toEqual({ providerId: 'SM2', status: 'queued' })
  })

  it('wraps send failures in a SendError carrying the Twilio code', async () => {
    twilioMock.create.mockRejectedValue(Object.assign(new Error("The 'To' number bad-phone is not a valid phone number."), { code: 21211 }))
    const error = await provider().send({ to: 'bad-phone', body: 'Hi' }).catch((e: unknown) => e)
    expect(error).toBeInstanceOf(SendError)
    expect(error).toMatchObject({ message: "The 'To' number bad-phone is not a valid phone number.", code: 21211 })
  })

  it('maps fetched statuses', async () => {
    twilioMock.fetchMessage.mockResolvedValue({ sid: 'SM1', status: 'undelivered' })
    await expect(provider().fetchStatus('SM1')).resolves.toBe('undelivered')
    expect(twilioMock.messages).toHaveBeenCalledWith('SM1')
  })

  it('verifies credentials by fetching the account', async () => {
    twilioMock.fetchAccount.mockResolvedValue({ sid: 'AC-test', status: 'active' })
    await provider().verifyCredentials()
    expect(twilioMock.accounts).toHaveBeenCalledWith('AC-test')
  })

  it('raises an AuthenticationError when the account fetch fails', async () => {
    twilioMock.fetchAccount.mockRejectedValue(new Error('Authenticate'))
    await expect(provider().verifyCredentials()).rejects.toBeInstanceOf(AuthenticationError)
  })
})

describe('isMessagingServiceSid', () => {
  it('recognises MG SIDs and nothing else', () => {
    expect(isMessagingServiceSid(SERVICE_SID)).toBe(true)
    expect(isMessagingServiceSid('+15550000000')).toBe(false)
    expect(isMessagingServiceSid('MG-test')).toBe(false)
  })
})

describe('toMessageStatus', () => {
  it('collapses Twilio statuses onto the engine vocabulary', () => {
    expect(toMessageStatus('sending')).toBe('queued')
    expect(toMessageStatus('scheduled')).toBe('queued')
    expect(toMessageStatus('sent')).toBe('sent')
    expect(toMessageStatus('read')).toBe('delivered')
    expect(toMessageStatus('canceled')).toBe('failed')
    expect(toMessageStatus('undelivered')).toBe('undelivered')
    expect(toMessageStatus('receiving')).toBe('unknown')
  })
})
