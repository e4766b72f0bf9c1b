import { z } from 'zod'

export const EngineConfigSchema = z.object({
  concurrency: z.number().int().min(1).default(5),
  pollAttempts: z.number().int().min(1).default(10),
  pollIntervalMs: z.number().int().min(0).default(2000),
  pollConcurrency: z.number().int().min(1).default(1),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({})

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return EngineConfigSchema.parse(overrides)
}

const EngineEnvSchema = z.object({
  SMS_CONCURRENCY: z.coerce.number().int().min(1).optional(),
  SMS_POLL_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  SMS_POLL_INTERVAL_MS: z.coerce.number().int().min(0).optional(),
  SMS_POLL_CONCURRENCY: z.coerce.number().int().min(1).optional(),
})

// Blank variables count as unset
function dropBlank(env: Record<string, string | undefined>) {
  return Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''))
}

export function engineConfigFromEnv(env: Record<string, string | undefined>): EngineConfig {
  const parsed = EngineEnvSchema.parse(dropBlank(env))
  return resolveEngineConfig({
    concurrency: parsed.SMS_CONCURRENCY,
    pollAttempts: parsed.SMS_POLL_ATTEMPTS,
    pollIntervalMs: parsed.SMS_POLL_INTERVAL_MS,
    pollConcurrency: parsed.SMS_POLL_CONCURRENCY,
  })
}
