/**
 * Conversation codec
 *
 * Telegram's reply chain is the only session store: the id of the message
 * being tagged rides along in the bot's prompt text (`[MSG_ID:<id>]`) and in
 * inline-button callback data (`tag:<tagId>:<msgId>`, `new_tag:<msgId>`).
 * Decoding never throws; malformed input comes back as a parse error.
 */

export const MARKER_PREFIX = '[MSG_ID:'
const MARKER_SUFFIX = ']'
const DECIMAL = /^\d+$/

export type CallbackAction =
  | { type: 'choose_tag'; tagId: number; messageId: number }
  | { type: 'new_tag'; messageId: number }

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string }

export interface ConversationCodec {
  encodePrompt(text: string, messageId: number): string
  decodePrompt(text: string): DecodeResult<number>
  encodeTagChoice(tagId: number, messageId: number): string
  encodeNewTag(messageId: number): string
  decodeCallback(data: string): DecodeResult<CallbackAction>
}

function parseId(raw: string): number | null {
  if (!DECIMAL.test(raw)) return null
  const id = Number(raw)
  return Number.isSafeInteger(id) ? id : null
}

export function encodePrompt(text: string, messageId: number): string {
  return `${text}\n\n${MARKER_PREFIX}${messageId}${MARKER_SUFFIX}`
}

export function hasMarker(text: string): boolean {
  return text.includes(MARKER_PREFIX)
}

export function decodePrompt(text: string): DecodeResult<number> {
  // The marker is appended last; tag names listed above it may contain the prefix too
  const start = text.lastIndexOf(MARKER_PREFIX)
  if (start === -1) return { ok: false, reason: 'marker_missing' }

  const idStart = start + MARKER_PREFIX.length
  const end = text.indexOf(MARKER_SUFFIX, idStart)
  if (end === -1) return { ok: false, reason: 'marker_unterminated' }

  const id = parseId(text.slice(idStart, end))
  if (id === null) return { ok: false, reason: 'marker_not_numeric' }
  return { ok: true, value: id }
}

export function encodeTagChoice(tagId: number, messageId: number): string {
  return `tag:${tagId}:${messageId}`
}

export function encodeNewTag(messageId: number): string {
  return `new_tag:${messageId}`
}

export function decodeCallback(data: string): DecodeResult<CallbackAction> {
  const parts = data.split(':')

  switch (parts[0]) {
    case 'tag': {
      if (parts.length !== 3) return { ok: false, reason: 'tag_arity' }
      const tagId = parseId(parts[1] ?? '')
      const messageId = parseId(parts[2] ?? '')
      if (tagId === null || messageId === null) return { ok: false, reason: 'tag_not_numeric' }
      return { ok: true, value: { type: 'choose_tag', tagId, messageId } }
    }
    case 'new_tag': {
      if (parts.length !== 2) return { ok: false, reason: 'new_tag_arity' }
      const messageId = parseId(parts[1] ?? '')
      if (messageId === null) return { ok: false, reason: 'new_tag_not_numeric' }
      return { ok: true, value: { type: 'new_tag', messageId } }
    }
    default:
      return { ok: false, reason: 'unknown_callback' }
  }
}

export const markerCodec: ConversationCodec = {
  encodePrompt,
  decodePrompt,
  encodeTagChoice,
  encodeNewTag,
  decodeCallback,
}
