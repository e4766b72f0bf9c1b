import { parseArgs } from 'node:util'
import { describeError } from '@textrun/core'
import { z } from 'zod'

export const USAGE = `Usage: textrun [options]

  -r, --recipients <file>    JSON array of rows with "Name" and "Phone Number"
  -t, --template <text>      Message text; {Name} is replaced per recipient
      --template-file <file> Read the message text from a file
      --opt-outs <file>      Phone numbers that must not be messaged, one per line
      --source <file|supabase>  Where recipients and opt-outs come from (default: file)
      --provider <twilio|fake>  Messaging provider (default: twilio)
      --log-file <file>      Also append log lines to this file
  -h, --help                 Show this help`

const CliOptionsSchema = z
  .object({
    recipients: z.string().optional(),
    template: z.string().optional(),
    templateFile: z.string().optional(),
    optOuts: z.string().optional(),
    source: z.enum(['file', 'supabase']),
    provider: z.enum(['twilio', 'fake']),
    logFile: z.string().optional(),
    help: z.boolean(),
  })
  .refine((o) => o.help || o.source !== 'file' || o.recipients, {
    message: '--recipients is required when --source is file',
    path: ['recipients'],
  })
  .refine((o) => !(o.template !== undefined && o.templateFile), {
    message: 'Use either --template or --template-file, not both',
    path: ['template'],
  })

export type CliOptions = z.infer<typeof CliOptionsSchema>

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        recipients: { type: 'string', short: 'r' },
        template: { type: 'string', short: 't' },
        'template-file': { type: 'string' },
        'opt-outs': { type: 'string' },
        source: { type: 'string', default: 'file' },
        provider: { type: 'string', default: 'twilio' },
        'log-file': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    }).values
  } catch (error) {
    throw new CliUsageError(describeError(error))
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv)
  const parsed = CliOptionsSchema.safeParse({
    recipients: values.recipients,
    template: values.template,
    templateFile: values['template-file'],
    optOuts: values['opt-outs'],
    source: values.source,
    provider: values.provider,
    logFile: values['log-file'],
    help: values.help,
  })
  if (!parsed.success) {
    throw new CliUsageError(parsed.error.issues.map((i) => i.message).join('; '))
  }
  return parsed.data
}
