/**
 * Metadata extraction for inbound messages.
 *
 * Pure functions, no I/O. Hashtag and mention matching is loose:
 * `#` inside a URL fragment and the domain label of an email address are
 * extracted like any other token.
 */

import type { BaseTelegramMessage, MessageOrigin, TelegramChat, TelegramUser } from '../telegram/types.js'
import type {
  ClassifiedMessage,
  ExtractedMetadata,
  FileDescriptor,
  MessageType,
  Provenance,
} from './types.js'

export const PREVIEW_MAX_LENGTH = 150
const TRUNCATION_MARKER = '...'

const URL_PATTERN = /https?:\/\/\S+/g
const HASHTAG_PATTERN = /#\w+/g
const MENTION_PATTERN = /@\w+/g

// ─── Classification ─────────────────────────────────────────────────────────

export function classifyMessage(message: BaseTelegramMessage): ClassifiedMessage {
  if (message.photo) return { type: 'photo', photo: message.photo }
  if (message.video) return { type: 'video', video: message.video }
  if (message.document) return { type: 'document', document: message.document }
  if (message.audio) return { type: 'audio', audio: message.audio }
  if (message.voice) return { type: 'voice', voice: message.voice }
  if (message.video_note) return { type: 'video_note', videoNote: message.video_note }
  if (message.sticker) return { type: 'sticker', sticker: message.sticker }
  return { type: 'text' }
}

export function classify(message: BaseTelegramMessage): MessageType {
  return classifyMessage(message).type
}

// ─── Token scanning ─────────────────────────────────────────────────────────

function scan(pattern: RegExp, text?: string | null, caption?: string | null): string[] {
  const found: string[] = []
  for (const source of [text, caption]) {
    if (!source) continue
    found.push(...(source.match(pattern) ?? []))
  }
  return found
}

export function extractURLs(text?: string | null, caption?: string | null): string[] {
  return scan(URL_PATTERN, text, caption)
}

export function extractHashtags(text?: string | null, caption?: string | null): string[] {
  return scan(HASHTAG_PATTERN, text, caption).map(tag => tag.slice(1))
}

export function extractMentions(text?: string | null, caption?: string | null): string[] {
  return scan(MENTION_PATTERN, text, caption).map(mention => mention.slice(1))
}

// ─── File metadata ──────────────────────────────────────────────────────────

// Telegram omits or zeroes fields it does not know; both mean "not present".
function optionalText(value: string | undefined): string | null {
  return value ? value : null
}

function optionalNumber(value: number | undefined): number | null {
  return value ? value : null
}

const EMPTY_FILE: FileDescriptor = {
  fileId: null,
  fileName: null,
  mimeType: null,
  fileSize: null,
  duration: null,
}

export function fileMetadata(classified: ClassifiedMessage): FileDescriptor {
  switch (classified.type) {
    case 'photo': {
      // Telegram lists sizes smallest first
      const smallest = classified.photo[0]
      if (!smallest) return { ...EMPTY_FILE }
      return { ...EMPTY_FILE, fileId: smallest.file_id, fileSize: optionalNumber(smallest.file_size) }
    }
    case 'video':
      return {
        fileId: classified.video.file_id,
        fileName: optionalText(classified.video.file_name),
        mimeType: optionalText(classified.video.mime_type),
        fileSize: optionalNumber(classified.video.file_size),
        duration: optionalNumber(classified.video.duration),
      }
    case 'document':
      return {
        ...EMPTY_FILE,
        fileId: classified.document.file_id,
        fileName: optionalText(classified.document.file_name),
        mimeType: optionalText(classified.document.mime_type),
        fileSize: optionalNumber(classified.document.file_size),
      }
    case 'audio':
      return {
        fileId: classified.audio.file_id,
        fileName: optionalText(classified.audio.file_name),
        mimeType: optionalText(classified.audio.mime_type),
        fileSize: optionalNumber(classified.audio.file_size),
        duration: optionalNumber(classified.audio.duration),
      }
    case 'voice':
      return {
        ...EMPTY_FILE,
        fileId: classified.voice.file_id,
        mimeType: optionalText(classified.voice.mime_type),
        fileSize: optionalNumber(classified.voice.file_size),
        duration: optionalNumber(classified.voice.duration),
      }
    case 'video_note':
      return {
        ...EMPTY_FILE,
        fileId: classified.videoNote.file_id,
        fileSize: optionalNumber(classified.videoNote.file_size),
        duration: optionalNumber(classified.videoNote.duration),
      }
    case 'sticker':
    case 'text':
      return { ...EMPTY_FILE }
  }
}

// ─── Forward provenance ─────────────────────────────────────────────────────

function userLabel(user: TelegramUser): string {
  let label = user.first_name
  if (user.last_name) label += ` ${user.last_name}`
  if (user.username) label += ` (@${user.username})`
  return label.trim()
}

function chatLabel(chat: TelegramChat, signature?: string): string {
  let label = chat.title ?? [chat.first_name, chat.last_name].filter(Boolean).join(' ')
  if (chat.username) label += ` (@${chat.username})`
  if (signature) label += `, ${signature}`
  return label.trim()
}

function originLabel(origin: MessageOrigin): string {
  switch (origin.type) {
    case 'user':
      return userLabel(origin.sender_user)
    case 'hidden_user':
      return origin.sender_user_name
    case 'chat':
      return chatLabel(origin.sender_chat, origin.author_signature)
    case 'channel':
      return chatLabel(origin.chat, origin.author_signature)
  }
}

function fromUnix(seconds: number | undefined): Date | null {
  return seconds ? new Date(seconds * 1000) : null
}

export function forwardProvenance(message: BaseTelegramMessage): Provenance {
  if (message.forward_origin) {
    return {
      forwardedDate: fromUnix(message.forward_origin.date),
      forwardedFrom: originLabel(message.forward_origin),
    }
  }

  let forwardedFrom: string | null = null
  if (message.forward_from) {
    forwardedFrom = userLabel(message.forward_from)
  } else if (message.forward_from_chat) {
    forwardedFrom = chatLabel(message.forward_from_chat, message.forward_signature)
  } else if (message.forward_sender_name) {
    forwardedFrom = message.forward_sender_name
  }

  if (forwardedFrom === null && !message.forward_date) {
    return { forwardedDate: null, forwardedFrom: null }
  }
  return { forwardedDate: fromUnix(message.forward_date), forwardedFrom }
}

// ─── Previews ───────────────────────────────────────────────────────────────

/** Cuts on code points so surrogate pairs (emoji) are never split. */
export function truncatePreview(text: string, maxLength = PREVIEW_MAX_LENGTH): string {
  const chars = Array.from(text)
  if (chars.length <= maxLength) return text
  return chars.slice(0, maxLength).join('') + TRUNCATION_MARKER
}

function preview(value: string | undefined): string | null {
  return value ? truncatePreview(value) : null
}

// ─── Entry point ────────────────────────────────────────────────────────────

/** Extraction runs on the full text and caption; only previews are stored. */
export function extractMetadata(message: BaseTelegramMessage): ExtractedMetadata {
  const classified = classifyMessage(message)
  return {
    type: classified.type,
    textPreview: preview(message.text),
    captionPreview: preview(message.caption),
    file: fileMetadata(classified),
    provenance: forwardProvenance(message),
    urls: extractURLs(message.text, message.caption),
    hashtags: extractHashtags(message.text, message.caption),
    mentions: extractMentions(message.text, message.caption),
  }
}
