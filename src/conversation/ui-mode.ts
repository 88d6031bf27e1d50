/**
 * Picker rendering. Up to 20 tags fit an inline keyboard comfortably; beyond
 * that the picker becomes a numbered list answered by a forced reply.
 */

import type { InlineButton, ReplyMarkup } from '../telegram/client.js'
import type { Tag } from '../store/types.js'
import type { ConversationCodec } from './codec.js'
import { REPLIES } from './replies.js'

export const BUTTON_MODE_MAX_TAGS = 20
const BUTTONS_PER_ROW = 2

export type UIMode = 'buttons' | 'text'

export interface RenderedPicker {
  mode: UIMode
  text: string
  replyMarkup: ReplyMarkup
}

export function chooseMode(tagCount: number): UIMode {
  return tagCount <= BUTTON_MODE_MAX_TAGS ? 'buttons' : 'text'
}

function renderButtons(tags: Tag[], messageId: number, codec: ConversationCodec): RenderedPicker {
  const rows: InlineButton[][] = []
  for (let i = 0; i < tags.length; i += BUTTONS_PER_ROW) {
    rows.push(
      tags.slice(i, i + BUTTONS_PER_ROW).map(tag => ({
        label: tag.name,
        callbackData: codec.encodeTagChoice(tag.id, messageId),
      }))
    )
  }
  rows.push([{ label: REPLIES.createNewTagButton, callbackData: codec.encodeNewTag(messageId) }])

  const intro = tags.length === 0 ? REPLIES.noTagsYet : REPLIES.chooseTag
  return {
    mode: 'buttons',
    text: codec.encodePrompt(intro, messageId),
    replyMarkup: { type: 'inline_keyboard', rows },
  }
}

function renderNumberedList(tags: Tag[], messageId: number, codec: ConversationCodec): RenderedPicker {
  const lines = tags.map((tag, index) => `${index + 1}. ${tag.name}`)
  const text = `${REPLIES.manyTags(tags.length)}\n\n${lines.join('\n')}\n\n${REPLIES.typeNameOrNumber}`
  return {
    mode: 'text',
    text: codec.encodePrompt(text, messageId),
    replyMarkup: { type: 'force_reply' },
  }
}

/** `tags` must already be in listForUser() order: list positions are the reply indexes. */
export function renderPicker(tags: Tag[], messageId: number, codec: ConversationCodec): RenderedPicker {
  return chooseMode(tags.length) === 'buttons'
    ? renderButtons(tags, messageId, codec)
    : renderNumberedList(tags, messageId, codec)
}
