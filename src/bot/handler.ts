/**
 * Update router: one webhook update in, at most one conversation step out.
 *
 * Order of checks for a message: commands, replies to one of our pickers,
 * then ingestion of anything else followed by the tag picker. Callback
 * queries always go to the tag flow's button path.
 */

import { extractMetadata } from '../metadata/extractor.js'
import { hasMarker, type ConversationCodec } from '../conversation/codec.js'
import { PICKER_PHRASES } from '../conversation/replies.js'
import { TagSelectionFlow, type TagFlowOutcome } from '../conversation/tag-flow.js'
import type { MessagingClient } from '../telegram/client.js'
import type { CallbackQuery, TelegramMessage, TelegramUpdate, TelegramUser } from '../telegram/types.js'
import type {
  MessageRepository,
  SaveMessageResult,
  TagRepository,
  UserRepository,
} from '../store/types.js'
import { safeError } from '../utils/safe-log.js'
import { BOT_REPLIES, parseCommand, replyToCommand } from './commands.js'

export interface BotDeps {
  users: UserRepository
  messages: MessageRepository
  tags: TagRepository
  client: MessagingClient
  miniAppUrl?: string
  codec?: ConversationCodec
}

export type UpdateOutcome =
  | { type: 'ignored'; reason: string }
  | { type: 'command'; command: string }
  | { type: 'ingest_failed'; reason: 'user_upsert_failed' | 'duplicate' | 'save_failed' }
  | { type: 'flow'; outcome: TagFlowOutcome }

function isPickerReply(message: TelegramMessage): boolean {
  const original = message.reply_to_message
  if (!original?.from?.is_bot || !original.text) return false
  const promptText = original.text
  return hasMarker(promptText) || PICKER_PHRASES.some(phrase => promptText.includes(phrase))
}

export class UpdateRouter {
  private readonly flow: TagSelectionFlow

  constructor(private readonly deps: BotDeps) {
    this.flow = new TagSelectionFlow({
      tags: deps.tags,
      messages: deps.messages,
      client: deps.client,
      codec: deps.codec,
    })
  }

  async handleUpdate(update: TelegramUpdate): Promise<UpdateOutcome> {
    if (update.callback_query) return this.handleCallback(update.callback_query)
    if (update.message) return this.handleMessage(update.message)
    return { type: 'ignored', reason: 'unsupported_update' }
  }

  private async handleMessage(message: TelegramMessage): Promise<UpdateOutcome> {
    const sender = message.from
    if (!sender || sender.is_bot) return { type: 'ignored', reason: 'no_human_sender' }

    console.log(`[Bot] message from=${sender.username ?? sender.id} id=${message.message_id}`)
    const userId = await this.upsertUser(sender)
    const chatId = message.chat.id

    const command = parseCommand(message)
    if (command !== null) {
      const reply = replyToCommand(command, this.deps.miniAppUrl)
      await this.deps.client.send(chatId, reply.text, {
        replyTo: message.message_id,
        replyMarkup: reply.replyMarkup,
      })
      return { type: 'command', command }
    }

    if (userId === null) {
      await this.deps.client.send(chatId, BOT_REPLIES.saveFailed, { replyTo: message.message_id })
      return { type: 'ingest_failed', reason: 'user_upsert_failed' }
    }

    if (isPickerReply(message) && message.reply_to_message?.text) {
      const outcome = await this.flow.handleReply({
        chatId,
        userId,
        replyText: message.text ?? message.caption ?? '',
        promptText: message.reply_to_message.text,
      })
      return { type: 'flow', outcome }
    }

    const saved = await this.saveMessage(message, userId)
    if (saved === null) {
      await this.deps.client.send(chatId, BOT_REPLIES.saveFailed, { replyTo: message.message_id })
      return { type: 'ingest_failed', reason: 'save_failed' }
    }

    if (saved.type === 'conflict') {
      console.warn(`[Bot] Message ${message.message_id} of user=${userId} already stored`)
      await this.deps.client.send(chatId, BOT_REPLIES.alreadySaved, { replyTo: message.message_id })
      return { type: 'ingest_failed', reason: 'duplicate' }
    }

    const outcome = await this.flow.prompt({ chatId, userId, platformMessageId: message.message_id })
    return { type: 'flow', outcome }
  }

  private async handleCallback(query: CallbackQuery): Promise<UpdateOutcome> {
    const chatId = query.message?.chat.id
    if (chatId === undefined) {
      // Inline-mode buttons carry no chat; nothing to reply to
      await this.deps.client.answerCallback(query.id)
      return { type: 'ignored', reason: 'callback_without_chat' }
    }

    const userId = await this.upsertUser(query.from)
    if (userId === null) {
      await this.deps.client.answerCallback(query.id)
      await this.deps.client.send(chatId, BOT_REPLIES.tagFailed)
      return { type: 'ingest_failed', reason: 'user_upsert_failed' }
    }

    const outcome = await this.flow.handleCallback({
      callbackId: query.id,
      chatId,
      userId,
      data: query.data ?? '',
      pickerMessageId: query.message?.message_id,
    })
    return { type: 'flow', outcome }
  }

  private async saveMessage(message: TelegramMessage, userId: number): Promise<SaveMessageResult | null> {
    try {
      return await this.deps.messages.save({
        userId,
        platformMessageId: message.message_id,
        ...extractMetadata(message),
      })
    } catch (err) {
      console.error(`[Bot] Failed to save message ${message.message_id}:`, safeError(err))
      return null
    }
  }

  private async upsertUser(user: TelegramUser): Promise<number | null> {
    try {
      return await this.deps.users.upsert({
        telegramId: user.id,
        username: user.username,
        firstName: user.first_name,
        lastName: user.last_name,
      })
    } catch (err) {
      console.error(`[Bot] Failed to save user ${user.id}:`, safeError(err))
      return null
    }
  }
}
