/**
 * Store contracts. The pg-backed classes implement these; the conversation
 * flow and the router only see the interfaces.
 */

import type { ExtractedMetadata, MessageType } from '../metadata/types.js'

// ─── Users ──────────────────────────────────────────────────────────────────

export interface UserProfile {
  telegramId: number
  username?: string
  firstName?: string
  lastName?: string
}

export interface UserRepository {
  /** Insert or refresh the profile; returns the internal user id. */
  upsert(profile: UserProfile): Promise<number>
  findIdByTelegramId(telegramId: number): Promise<number | null>
}

// ─── Messages ───────────────────────────────────────────────────────────────

export interface NewMessage extends ExtractedMetadata {
  userId: number
  platformMessageId: number
}

export type SaveMessageResult =
  | { type: 'saved'; id: number }
  | { type: 'conflict' }

export interface MessageRepository {
  save(message: NewMessage): Promise<SaveMessageResult>
  resolveId(userId: number, platformMessageId: number): Promise<number | null>
}

// ─── Tags ───────────────────────────────────────────────────────────────────

export interface Tag {
  id: number
  userId: number
  name: string
  color: string | null
}

export interface TagWithCount extends Tag {
  createdAt: Date
  messageCount: number
}

export interface MessageSummary {
  id: number
  telegramMessageId: number
  messageType: MessageType
  textContent: string | null
  caption: string | null
  fileName: string | null
  fileSize: number | null
  createdAt: Date
  forwardedFrom: string | null
  urls: string[]
  hashtags: string[]
}

export type TagMessagesResult =
  | { type: 'ok'; messages: MessageSummary[] }
  | { type: 'not_found_or_forbidden' }

export interface TagRepository {
  /** Name ascending; numbered-text prompts index into this order. */
  listForUser(userId: number): Promise<Tag[]>
  getOrCreate(userId: number, name: string): Promise<number>
  link(messageId: number, tagId: number): Promise<void>
  findOwnedTag(userId: number, tagId: number): Promise<Tag | null>
  listWithCounts(userId: number): Promise<TagWithCount[]>
  listMessagesForTag(userId: number, tagId: number): Promise<TagMessagesResult>
}
