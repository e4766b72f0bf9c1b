import type { OptOutSource } from '../index'

export type ConsentAction = 'stop' | 'start' | 'help'

const STOP_WORDS = /\b(STOP|STOPALL|UNSUBSCRIBE|CANCEL|END|QUIT)\b/i
const START_WORDS = /\b(START|YES|UNSTOP)\b/i
const HELP_WORDS = /\b(HELP|INFO)\b/i

export function parseConsentKeyword(body: string): ConsentAction | undefined {
  const text = body.trim()
  if (STOP_WORDS.test(text)) return 'stop'
  if (START_WORDS.test(text)) return 'start'
  if (HELP_WORDS.test(text)) return 'help'
  return undefined
}

// In-process opt-out state, mutated by reply handling between runs
export class OptOutList implements OptOutSource {
  private readonly phones: Set<string>

  constructor(initial: Iterable<string> = []) {
    this.phones = new Set(initial)
  }

  get size() {
    return this.phones.size
  }

  has(phone: string) {
    return this.phones.has(phone)
  }

  optOut(phone: string) {
    this.phones.add(phone)
  }

  optIn(phone: string) {
    this.phones.delete(phone)
  }

  applyInbound(from: string, body: string): ConsentAction | undefined {
    const action = parseConsentKeyword(body)
    if (action === 'stop') this.optOut(from)
    else if (action === 'start') this.optIn(from)
    return action
  }

  snapshot(): ReadonlySet<string> {
    return new Set(this.phones)
  }
}
