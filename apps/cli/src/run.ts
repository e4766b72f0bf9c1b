import { appendFileSync } from 'node:fs'
import { ZodError } from 'zod'
import {
  OptOutList,
  PreflightError,
  RunCancelledError,
  createConsoleLogger,
  describeError,
  engineConfigFromEnv,
  runDispatch,
  type EngineConfig,
  type Logger,
  type OptOutSource,
  type Recipient,
} from '@textrun/core'
import { SupabaseOptOutSource, createServiceClient, listSmsRecipients } from '@textrun/db'
import { CliUsageError, USAGE, parseCliArgs, type CliOptions } from './args'
import { loadCliEnv, type CliEnv } from './env'
import { mergeOptOutSources, readOptOutFile, readRecipientsFile, readTemplate } from './inputs'
import { createTerminalProgress, formatSummary } from './output'
import { createProviderFactory, credentialsFor } from './providerFactory'

export type CliIO = {
  stdout(line: string): void
  stderr(line: string): void
}

type LoadedInputs = {
  recipients: Recipient[]
  optOuts: OptOutSource
  template: string
}

export const CANCEL_NOTICE = 'Cancelling after the current phase. Press Ctrl-C again to stop immediately.'

// The log file is best effort: after the first failed write, lines go to stderr only
function createCliLogger(io: CliIO, logFile?: string): Logger {
  let fileWritable = Boolean(logFile)
  return createConsoleLogger({
    write: (line) => {
      io.stderr(line)
      if (!logFile || !fileWritable) return
      try {
        appendFileSync(logFile, `${line}\n`)
      } catch (error) {
        fileWritable = false
        io.stderr(`Failed to write log file ${logFile}: ${describeError(error)}`)
      }
    },
  })
}

function describeConfigError(error: unknown): string {
  if (!(error instanceof ZodError)) return describeError(error)
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
}

async function loadInputs(options: CliOptions, env: CliEnv): Promise<LoadedInputs> {
  const fileOptOuts = new OptOutList(options.optOuts ? await readOptOutFile(options.optOuts) : [])
  const template = await readTemplate(options)
  if (options.source === 'supabase') {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY || !env.SUPABASE_TENANT_ID) {
      throw new Error('Missing env: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, SUPABASE_TENANT_ID')
    }
    const sb = createServiceClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY)
    return {
      recipients: await listSmsRecipients(sb, env.SUPABASE_TENANT_ID),
      optOuts: mergeOptOutSources([new SupabaseOptOutSource(sb, env.SUPABASE_TENANT_ID), fileOptOuts]),
      template,
    }
  }
  return {
    recipients: options.recipients ? await readRecipientsFile(options.recipients) : [],
    optOuts: fileOptOuts,
    template,
  }
}

/** Runs one dispatch from command-line arguments and returns the process exit code. */
export async function runCli(
  argv: string[],
  rawEnv: Record<string, string | undefined>,
  io: CliIO,
  signal?: AbortSignal
): Promise<number> {
  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error
    io.stderr(error.message)
    io.stderr(USAGE)
    return 1
  }
  if (options.help) {
    io.stdout(USAGE)
    return 0
  }

  const logger = createCliLogger(io, options.logFile)
  let env: CliEnv
  let config: EngineConfig
  try {
    env = loadCliEnv(rawEnv)
    config = engineConfigFromEnv(rawEnv)
  } catch (error) {
    logger.error(`Invalid configuration: ${describeConfigError(error)}`)
    return 1
  }
  signal?.addEventListener('abort', () => io.stderr(CANCEL_NOTICE), { once: true })

  let inputs: LoadedInputs
  try {
    inputs = await loadInputs(options, env)
  } catch (error) {
    logger.error(`Failed to load data: ${describeError(error)}`)
    return 1
  }

  try {
    const report = await runDispatch(
      { ...inputs, credentials: credentialsFor(options.provider, env), signal },
      {
        createProvider: createProviderFactory(options.provider),
        config,
        logger,
        progress: createTerminalProgress(io.stdout),
      }
    )
    for (const line of formatSummary(report)) io.stdout(line)
    return 0
  } catch (error) {
    if (error instanceof PreflightError || error instanceof RunCancelledError) {
      io.stderr(error.message)
      return 1
    }
    throw error
  }
}
