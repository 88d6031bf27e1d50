/**
 * Tag selection state machine
 *
 *   ingest ──prompt()──▶ awaiting_tag_choice ──reply / button──▶ resolved
 *                                    │                          └──▶ failed
 *                                    └── new_tag button ──▶ awaiting_tag_choice
 *
 * Nothing is stored between turns. Every transition re-derives its context
 * from the prompt the user replied to or the button they pressed, via the
 * codec. Every failure sends exactly one message and ends the exchange; the
 * prompt marker stays valid, so the user can simply reply again.
 *
 * Numeric replies index into the tag listing as it is at reply time. If tags
 * were added between prompt and reply, the index can land on a different tag
 * than the one shown; no lock spans the two turns.
 */

import type { ClientResult, MessagingClient, SendOptions } from '../telegram/client.js'
import type { MessageRepository, TagRepository } from '../store/types.js'
import { safeError } from '../utils/safe-log.js'
import { markerCodec, type ConversationCodec } from './codec.js'
import { REPLIES } from './replies.js'
import { renderPicker, type RenderedPicker, type UIMode } from './ui-mode.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export type TagFlowFailure =
  | { type: 'parse_error'; reason: string }
  | { type: 'not_found'; reason: string }
  | { type: 'validation_error'; reason: string; userMessage: string }
  | { type: 'store_error'; reason: string }
  | { type: 'delivery_error'; reason: string }

export type TagFlowOutcome =
  | { state: 'awaiting_tag_choice'; platformMessageId: number; mode: UIMode | 'new_tag_name' }
  | { state: 'resolved'; messageId: number; tagId: number; tagName: string }
  | { state: 'failed'; failure: TagFlowFailure }

export interface PromptContext {
  chatId: number
  userId: number
  /** Telegram id of the stored message; the picker replies to it. */
  platformMessageId: number
}

export interface ReplyContext {
  chatId: number
  userId: number
  replyText: string
  /** Text of the bot message being replied to. */
  promptText: string
}

export interface CallbackContext {
  callbackId: string
  chatId: number
  userId: number
  data: string
  /** The picker message carrying the pressed button, when Telegram includes it. */
  pickerMessageId?: number
}

export interface TagFlowDeps {
  tags: TagRepository
  messages: MessageRepository
  client: MessagingClient
  codec?: ConversationCodec
}

const INDEX_REPLY = /^[+-]?\d+$/

function failed(failure: TagFlowFailure): TagFlowOutcome {
  return { state: 'failed', failure }
}

function userMessageFor(failure: TagFlowFailure): string {
  switch (failure.type) {
    case 'parse_error':
    case 'not_found':
      // Same text for "missing" and "someone else's" so ids cannot be probed
      return REPLIES.originalNotFound
    case 'validation_error':
      return failure.userMessage
    case 'store_error':
    case 'delivery_error':
      return REPLIES.storeFailure
  }
}

// ─── State machine ──────────────────────────────────────────────────────────

export class TagSelectionFlow {
  private readonly tags: TagRepository
  private readonly messages: MessageRepository
  private readonly client: MessagingClient
  private readonly codec: ConversationCodec

  constructor(deps: TagFlowDeps) {
    this.tags = deps.tags
    this.messages = deps.messages
    this.client = deps.client
    this.codec = deps.codec ?? markerCodec
  }

  /** Send the picker for a freshly stored message. */
  async prompt(ctx: PromptContext): Promise<TagFlowOutcome> {
    const picker = await this.loadPicker(ctx)
    if (!picker) {
      await this.notify(ctx.chatId, REPLIES.tagsUnavailable)
      return failed({ type: 'store_error', reason: 'list_tags_failed' })
    }

    const sent = await this.notify(ctx.chatId, picker.text, {
      replyTo: ctx.platformMessageId,
      replyMarkup: picker.replyMarkup,
    })
    if (!sent.ok) return failed({ type: 'delivery_error', reason: 'picker_not_sent' })
    console.log(`[TagFlow] Picker sent user=${ctx.userId} msg=${ctx.platformMessageId} mode=${picker.mode}`)
    return { state: 'awaiting_tag_choice', platformMessageId: ctx.platformMessageId, mode: picker.mode }
  }

  /** Resolve a text reply to one of our prompts (numbered list or new-tag prompt). */
  async handleReply(ctx: ReplyContext): Promise<TagFlowOutcome> {
    const outcome = await this.resolveReply(ctx)
    await this.finish(ctx.chatId, ctx.userId, outcome)
    return outcome
  }

  /** Resolve an inline-button press. The callback is answered whatever happens. */
  async handleCallback(ctx: CallbackContext): Promise<TagFlowOutcome> {
    const ack = await this.client.answerCallback(ctx.callbackId)
    if (!ack.ok) console.warn(`[TagFlow] answerCallback failed: ${ack.error}`)

    const decoded = this.codec.decodeCallback(ctx.data)
    if (!decoded.ok) {
      console.warn(`[TagFlow] Bad callback data "${ctx.data}": ${decoded.reason}`)
      const outcome = failed({ type: 'parse_error', reason: decoded.reason })
      await this.finish(ctx.chatId, ctx.userId, outcome)
      return outcome
    }

    const action = decoded.value
    if (action.type === 'new_tag') {
      await this.notify(ctx.chatId, this.codec.encodePrompt(REPLIES.askNewTagName, action.messageId), {
        replyMarkup: { type: 'force_reply' },
      })
      if (ctx.pickerMessageId !== undefined) {
        await this.client.editText(ctx.chatId, ctx.pickerMessageId, REPLIES.waitingForNewTagName)
      }
      return { state: 'awaiting_tag_choice', platformMessageId: action.messageId, mode: 'new_tag_name' }
    }

    const { tagId, messageId: platformMessageId } = action
    const outcome = await this.withStore(async () => {
      const messageId = await this.messages.resolveId(ctx.userId, platformMessageId)
      if (messageId === null) return failed({ type: 'not_found', reason: 'message_not_found' })

      // Scoped by owner: a tag id from another account resolves to nothing
      const tag = await this.tags.findOwnedTag(ctx.userId, tagId)
      if (!tag) return failed({ type: 'not_found', reason: 'tag_not_owned' })

      await this.tags.link(messageId, tag.id)
      return { state: 'resolved', messageId, tagId: tag.id, tagName: tag.name }
    })

    await this.finish(ctx.chatId, ctx.userId, outcome)
    if (outcome.state === 'resolved' && ctx.pickerMessageId !== undefined) {
      await this.client.editText(ctx.chatId, ctx.pickerMessageId, REPLIES.taggedEdit(outcome.tagName))
    }
    return outcome
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async loadPicker(ctx: PromptContext): Promise<RenderedPicker | null> {
    try {
      const tags = await this.tags.listForUser(ctx.userId)
      return renderPicker(tags, ctx.platformMessageId, this.codec)
    } catch (err) {
      console.error(`[TagFlow] Could not load tags for user=${ctx.userId}:`, safeError(err))
      return null
    }
  }

  private async resolveReply(ctx: ReplyContext): Promise<TagFlowOutcome> {
    const decoded = this.codec.decodePrompt(ctx.promptText)
    if (!decoded.ok) return failed({ type: 'parse_error', reason: decoded.reason })
    const platformMessageId = decoded.value

    return this.withStore(async () => {
      const messageId = await this.messages.resolveId(ctx.userId, platformMessageId)
      if (messageId === null) return failed({ type: 'not_found', reason: 'message_not_found' })

      const input = ctx.replyText.trim()
      if (input === '') {
        return failed({ type: 'validation_error', reason: 'empty_name', userMessage: REPLIES.emptyTagName })
      }

      let tagName = input
      const index = Number(input)
      // Digits past the safe-integer range are a name, not an index
      if (INDEX_REPLY.test(input) && Number.isSafeInteger(index)) {
        const tags = await this.tags.listForUser(ctx.userId)
        const picked = index >= 1 ? tags[index - 1] : undefined
        if (!picked) {
          return failed({
            type: 'validation_error',
            reason: 'index_out_of_range',
            userMessage: REPLIES.invalidTagNumber,
          })
        }
        tagName = picked.name
      }

      const tagId = await this.tags.getOrCreate(ctx.userId, tagName)
      await this.tags.link(messageId, tagId)
      return { state: 'resolved', messageId, tagId, tagName }
    })
  }

  private async withStore(work: () => Promise<TagFlowOutcome>): Promise<TagFlowOutcome> {
    try {
      return await work()
    } catch (err) {
      console.error('[TagFlow] Store operation failed:', safeError(err))
      return failed({ type: 'store_error', reason: 'query_failed' })
    }
  }

  private async finish(chatId: number, userId: number, outcome: TagFlowOutcome): Promise<void> {
    if (outcome.state === 'resolved') {
      console.log(`[TagFlow] Tagged message=${outcome.messageId} tag=${outcome.tagId} user=${userId}`)
      await this.notify(chatId, REPLIES.tagged(outcome.tagName))
    } else if (outcome.state === 'failed') {
      console.warn(`[TagFlow] Failed user=${userId} ${outcome.failure.type}: ${outcome.failure.reason}`)
      await this.notify(chatId, userMessageFor(outcome.failure))
    }
  }

  private async notify(chatId: number, text: string, options?: SendOptions): Promise<ClientResult> {
    const result = await this.client.send(chatId, text, options)
    if (!result.ok) console.warn(`[TagFlow] Could not send to chat=${chatId}: ${result.error}`)
    return result
  }
}
