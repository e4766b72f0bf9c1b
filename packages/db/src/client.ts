import { createClient, type SupabaseClient } from '@supabase/supabase-js'

export function createServiceClient(url: string, serviceKey: string, options: { fetch?: typeof fetch } = {}): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
  })
}
