/**
 * In-process stand-ins for the stores and the Telegram client.
 * The store enforces the same unique constraints as the schema.
 */

import type {
  MessageRepository,
  MessageSummary,
  NewMessage,
  SaveMessageResult,
  Tag,
  TagMessagesResult,
  TagRepository,
  TagWithCount,
  UserProfile,
  UserRepository,
} from '../store/types.js'
import type { ClientResult, MessagingClient, SendOptions } from '../telegram/client.js'

interface StoredMessage extends NewMessage {
  id: number
  createdAt: Date
}

export class InMemoryStore {
  readonly userRows: Array<UserProfile & { id: number }> = []
  readonly messageRows: StoredMessage[] = []
  readonly tagRows: Array<Tag & { createdAt: Date }> = []
  readonly links: Array<{ messageId: number; tagId: number }> = []
  /** When set, every store call rejects with this error. */
  failWith: Error | null = null

  private nextId = 1

  private guard(): void {
    if (this.failWith) throw this.failWith
  }

  private allocateId(): number {
    return this.nextId++
  }

  // ─── Test setup helpers ───────────────────────────────────────────────────

  addUser(telegramId: number): number {
    const id = this.allocateId()
    this.userRows.push({ id, telegramId })
    return id
  }

  addTag(userId: number, name: string): Tag {
    const tag = { id: this.allocateId(), userId, name, color: null, createdAt: new Date() }
    this.tagRows.push(tag)
    return { id: tag.id, userId, name, color: null }
  }

  addMessage(userId: number, platformMessageId: number): number {
    const id = this.allocateId()
    this.messageRows.push({
      id,
      createdAt: new Date(),
      userId,
      platformMessageId,
      type: 'text',
      textPreview: `message ${platformMessageId}`,
      captionPreview: null,
      file: { fileId: null, fileName: null, mimeType: null, fileSize: null, duration: null },
      provenance: { forwardedDate: null, forwardedFrom: null },
      urls: [],
      hashtags: [],
      mentions: [],
    })
    return id
  }

  tagNamesOf(messageId: number): string[] {
    return this.links
      .filter(link => link.messageId === messageId)
      .map(link => this.tagRows.find(tag => tag.id === link.tagId)?.name ?? '?')
      .sort()
  }

  // ─── Repositories ─────────────────────────────────────────────────────────

  readonly users: UserRepository = {
    upsert: async (profile: UserProfile): Promise<number> => {
      this.guard()
      const existing = this.userRows.find(row => row.telegramId === profile.telegramId)
      if (existing) {
        Object.assign(existing, profile)
        return existing.id
      }
      const id = this.allocateId()
      this.userRows.push({ ...profile, id })
      return id
    },
    findIdByTelegramId: async (telegramId: number): Promise<number | null> => {
      this.guard()
      return this.userRows.find(row => row.telegramId === telegramId)?.id ?? null
    },
  }

  readonly messages: MessageRepository = {
    save: async (message: NewMessage): Promise<SaveMessageResult> => {
      this.guard()
      const duplicate = this.messageRows.some(
        row => row.userId === message.userId && row.platformMessageId === message.platformMessageId
      )
      if (duplicate) return { type: 'conflict' }
      const id = this.allocateId()
      this.messageRows.push({ ...message, id, createdAt: new Date() })
      return { type: 'saved', id }
    },
    resolveId: async (userId: number, platformMessageId: number): Promise<number | null> => {
      this.guard()
      const row = this.messageRows.find(
        m => m.userId === userId && m.platformMessageId === platformMessageId
      )
      return row?.id ?? null
    },
  }

  readonly tags: TagRepository = {
    listForUser: async (userId: number): Promise<Tag[]> => {
      this.guard()
      return this.tagRows
        .filter(tag => tag.userId === userId)
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : a.id - b.id))
        .map(({ id, name, color }) => ({ id, userId, name, color }))
    },
    getOrCreate: async (userId: number, name: string): Promise<number> => {
      this.guard()
      const existing = this.tagRows.find(tag => tag.userId === userId && tag.name === name)
      if (existing) return existing.id
      return this.addTag(userId, name).id
    },
    link: async (messageId: number, tagId: number): Promise<void> => {
      this.guard()
      const exists = this.links.some(link => link.messageId === messageId && link.tagId === tagId)
      if (!exists) this.links.push({ messageId, tagId })
    },
    findOwnedTag: async (userId: number, tagId: number): Promise<Tag | null> => {
      this.guard()
      const tag = this.tagRows.find(row => row.id === tagId && row.userId === userId)
      return tag ? { id: tag.id, userId: tag.userId, name: tag.name, color: tag.color } : null
    },
    listWithCounts: async (userId: number): Promise<TagWithCount[]> => {
      this.guard()
      return this.tagRows
        .filter(tag => tag.userId === userId)
        .map(tag => ({
          ...tag,
          messageCount: this.links.filter(link => link.tagId === tag.id).length,
        }))
        .sort((a, b) => b.messageCount - a.messageCount || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    },
    listMessagesForTag: async (userId: number, tagId: number): Promise<TagMessagesResult> => {
      this.guard()
      if (!this.tagRows.some(tag => tag.id === tagId && tag.userId === userId)) {
        return { type: 'not_found_or_forbidden' }
      }
      const linked = new Set(this.links.filter(link => link.tagId === tagId).map(link => link.messageId))
      const messages: MessageSummary[] = this.messageRows
        .filter(row => row.userId === userId && linked.has(row.id))
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
        .map(row => ({
          id: row.id,
          telegramMessageId: row.platformMessageId,
          messageType: row.type,
          textContent: row.textPreview,
          caption: row.captionPreview,
          fileName: row.file.fileName,
          fileSize: row.file.fileSize,
          createdAt: row.createdAt,
          forwardedFrom: row.provenance.forwardedFrom,
          urls: row.urls,
          hashtags: row.hashtags,
        }))
      return { type: 'ok', messages }
    },
  }
}

// ─── Messaging client ───────────────────────────────────────────────────────

export type ClientCall =
  | { method: 'send'; chatId: number; text: string; options: SendOptions }
  | { method: 'editText'; chatId: number; messageId: number; text: string }
  | { method: 'answerCallback'; callbackId: string }

export class RecordingClient implements MessagingClient {
  readonly calls: ClientCall[] = []
  /** When set, every `send` is recorded and then refused with this description. */
  refuseSendsWith: string | null = null
  private nextMessageId = 9000

  async send(chatId: number, text: string, options: SendOptions = {}): Promise<ClientResult> {
    this.calls.push({ method: 'send', chatId, text, options })
    if (this.refuseSendsWith !== null) return { ok: false, error: this.refuseSendsWith }
    return { ok: true, messageId: this.nextMessageId++ }
  }

  async editText(chatId: number, messageId: number, text: string): Promise<ClientResult> {
    this.calls.push({ method: 'editText', chatId, messageId, text })
    return { ok: true }
  }

  async answerCallback(callbackId: string): Promise<ClientResult> {
    this.calls.push({ method: 'answerCallback', callbackId })
    return { ok: true }
  }

  /** Texts of every `send`, in order. */
  get sentTexts(): string[] {
    return this.calls.flatMap(call => (call.method === 'send' ? [call.text] : []))
  }

  get lastSend(): Extract<ClientCall, { method: 'send' }> | undefined {
    const sends = this.calls.filter((call): call is Extract<ClientCall, { method: 'send' }> => call.method === 'send')
    return sends[sends.length - 1]
  }
}
