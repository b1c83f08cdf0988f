import { readFileSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { MessagesError } from './errors.js'
import { logger } from './logger.js'

const __dirname = dirname(fileURLToPath(import.meta.url))

const messagesSchema = z.record(z.string())

export type Messages = z.infer<typeof messagesSchema>

export type MessageVars = Record<string, string | number>

export interface MessageRenderer {
  render(key: string, vars?: MessageVars): string
  has(key: string): boolean
}

export function loadMessages(filePath?: string): Messages {
  const path = filePath ?? join(__dirname, 'messages', 'en.json')

  try {
    const content = readFileSync(path, 'utf-8')
    const messages = messagesSchema.parse(JSON.parse(content))
    logger.info({ event: 'messages_loaded', path, count: Object.keys(messages).length })
    return messages
  } catch (err) {
    logger.error({ event: 'messages_load_failed', path, error: err })
    throw new MessagesError(`Failed to load messages from ${path}`, { cause: err })
  }
}

export function createMessageRenderer(messages: Messages): MessageRenderer {
  function render(key: string, vars: MessageVars = {}): string {
    const template = messages[key]
    if (template === undefined) {
      return `[Missing message: ${key}]`
    }
    return template.replace(/\{(\w+)\}/g, (match, name: string) => {
      const value = vars[name]
      return value === undefined ? match : String(value)
    })
  }

  function has(key: string): boolean {
    return messages[key] !== undefined
  }

  return { render, has }
}
