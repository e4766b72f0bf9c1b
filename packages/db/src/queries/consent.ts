import type { SupabaseClient } from '@supabase/supabase-js'
import type { ConsentAction, OptOutSource } from '@textrun/core'
import { z } from 'zod'

const PhoneRow = z.object({ phone: z.string().nullable() })

export class SupabaseOptOutSource implements OptOutSource {
  constructor(private readonly sb: SupabaseClient, private readonly tenantId: string) {}

  async snapshot(): Promise<ReadonlySet<string>> {
    const { data, error } = await this.sb
      .from('leads')
      .select('phone')
      .eq('tenant_id', this.tenantId)
      .eq('consent_sms', false)
    if (error) throw error
    const phones = z.array(PhoneRow).parse(data ?? []).flatMap((row) => (row.phone ? [row.phone] : []))
    return new Set(phones)
  }
}

/** Flips consent_sms on every lead with this phone in the tenant. Returns false for `help`, which changes nothing. */
export async function recordConsent(
  sb: SupabaseClient,
  tenantId: string,
  phone: string,
  action: ConsentAction
): Promise<boolean> {
  if (action === 'help') return false
  const { error } = await sb
    .from('leads')
    .update({ consent_sms: action === 'start' })
    .eq('tenant_id', tenantId)
    .eq('phone', phone)
  if (error) throw error
  return true
}
