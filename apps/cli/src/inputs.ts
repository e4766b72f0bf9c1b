import { readFile } from 'node:fs/promises'
import type { OptOutSource, Recipient } from '@textrun/core'
import { z } from 'zod'

const Cell = z.union([z.string(), z.number()]).transform((v) => String(v).trim())

// Column names match the spreadsheets the recipient lists are exported from
const RecipientRow = z.object({
  Name: Cell,
  'Phone Number': Cell,
})

export const RecipientRows = z.array(RecipientRow)

export function toRecipients(rows: unknown): Recipient[] {
  return RecipientRows.parse(rows).map((row) => ({ name: row.Name, phone: row['Phone Number'] }))
}

export async function readRecipientsFile(path: string): Promise<Recipient[]> {
  const raw = await readFile(path, 'utf8')
  return toRecipients(JSON.parse(raw))
}

export function parseOptOutList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
}

export async function readOptOutFile(path: string): Promise<string[]> {
  return parseOptOutList(await readFile(path, 'utf8'))
}

export async function readTemplate(options: { template?: string; templateFile?: string }): Promise<string> {
  if (options.templateFile) {
    const text = await readFile(options.templateFile, 'utf8')
    return text.replace(/\r?\n$/, '')
  }
  return options.template ?? ''
}

export function mergeOptOutSources(sources: readonly OptOutSource[]): OptOutSource {
  return {
    async snapshot() {
      const merged = new Set<string>()
      for (const source of sources) {
        for (const phone of await source.snapshot()) merged.add(phone)
      }
      return merged
    },
  }
}
