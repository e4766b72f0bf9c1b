import { z } from 'zod'

const optional = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined))

export const CliEnvSchema = z.object({
  TWILIO_ACCOUNT_SID: optional,
  TWILIO_AUTH_TOKEN: optional,
  TWILIO_FROM_E164: optional,
  TWILIO_MESSAGING_SERVICE_SID: optional,
  SUPABASE_URL: optional.pipe(z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optional,
  SUPABASE_TENANT_ID: optional,
})

export type CliEnv = z.infer<typeof CliEnvSchema>

export function loadCliEnv(env: Record<string, string | undefined>): CliEnv {
  return CliEnvSchema.parse(env)
}
