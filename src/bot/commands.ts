import type { ReplyMarkup } from '../telegram/client.js'
import type { TelegramMessage } from '../telegram/types.js'

export const BOT_REPLIES = {
  start: "Hello! I'm your content organizer bot. Send me any message or forward content to me, and I'll help you tag it.",
  help:
    'Available commands:\n' +
    '/start - Get started\n' +
    '/help - Show this help message\n' +
    '/miniapp - Open mini-app to view your tags\n\n' +
    'You can also send me any message or forward content to me.',
  miniApp: 'Open the mini-app to view your tags:',
  miniAppButton: '🏷️ View My Tags',
  miniAppMissing: 'The mini-app is not configured yet.',
  unknownCommand: 'Unknown command. Use /help to see available commands.',
  saveFailed: "Sorry, I couldn't save your message. Please try again.",
  alreadySaved: 'This message is already saved.',
  tagFailed: 'Something went wrong while saving the tag. Please try again.',
} as const

export interface CommandReply {
  text: string
  replyMarkup?: ReplyMarkup
}

/**
 * Returns the command name (`start`, `help`, ...) when the message opens with
 * a bot command, with any `@botname` suffix removed; null otherwise.
 */
export function parseCommand(message: TelegramMessage): string | null {
  const text = message.text
  if (!text || !text.startsWith('/')) return null

  const entity = message.entities?.find(e => e.type === 'bot_command' && e.offset === 0)
  const raw = entity ? text.slice(1, entity.length) : (text.slice(1).split(/\s/)[0] ?? '')
  const name = raw.split('@')[0]?.toLowerCase() ?? ''
  return name === '' ? null : name
}

export function replyToCommand(command: string, miniAppUrl?: string): CommandReply {
  switch (command) {
    case 'start':
      return { text: BOT_REPLIES.start }
    case 'help':
      return { text: BOT_REPLIES.help }
    case 'miniapp':
      if (!miniAppUrl) return { text: BOT_REPLIES.miniAppMissing }
      return {
        text: BOT_REPLIES.miniApp,
        replyMarkup: {
          type: 'inline_keyboard',
          rows: [[{ label: BOT_REPLIES.miniAppButton, webAppUrl: miniAppUrl }]],
        },
      }
    default:
      return { text: BOT_REPLIES.unknownCommand }
  }
}
