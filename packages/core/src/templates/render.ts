import type { Recipient, TemplateEngine } from '../index'

const NAME_PLACEHOLDER = /\{Name\}/g

// Replacer function so `$&` and friends in a name are inserted literally
export function renderTemplate(template: string, recipient: Recipient): string {
  return template.replace(NAME_PLACEHOLDER, () => recipient.name)
}

export const placeholderTemplateEngine: TemplateEngine = {
  render: renderTemplate,
}
