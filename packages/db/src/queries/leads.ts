import type { SupabaseClient } from '@supabase/supabase-js'
import type { Recipient } from '@textrun/core'
import { z } from 'zod'

export const LeadRow = z.object({
  first_name: z.string().nullable().optional(),
  last_name: z.string().nullable().optional(),
  phone: z.string().nullable(),
})

export function leadDisplayName(lead: z.infer<typeof LeadRow>): string {
  return [lead.first_name, lead.last_name]
    .map((part) => (part ?? '').trim())
    .filter(Boolean)
    .join(' ')
}

// Opted-out leads are included; the run reports them as skipped
export async function listSmsRecipients(sb: SupabaseClient, tenantId: string): Promise<Recipient[]> {
  const { data, error } = await sb
    .from('leads')
    .select('first_name, last_name, phone')
    .eq('tenant_id', tenantId)
    .not('phone', 'is', null)
    .order('created_at', { ascending: true })
  if (error) throw error
  return z
    .array(LeadRow)
    .parse(data ?? [])
    .flatMap((lead) => (lead.phone ? [{ name: leadDisplayName(lead), phone: lead.phone.trim() }] : []))
}
