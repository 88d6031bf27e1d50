/**
 * Tag persistence
 *
 * Concurrent invocations for the same user rely on the unique constraints on
 * tags(user_id, name) and message_tags(message_id, tag_id): a conflicting
 * insert means the row already exists, never a failure.
 */

import type { Queryable } from '../db/pool.js'
import {
  allRows,
  firstRow,
  IdRowSchema,
  MessageSummaryRowSchema,
  TagRowSchema,
  TagWithCountRowSchema,
} from './rows.js'
import type { Tag, TagMessagesResult, TagRepository, TagWithCount } from './types.js'

function toTag(row: { id: number; user_id: number; name: string; color: string | null }): Tag {
  return { id: row.id, userId: row.user_id, name: row.name, color: row.color }
}

export class PgTagStore implements TagRepository {
  constructor(private readonly db: Queryable) {}

  async listForUser(userId: number): Promise<Tag[]> {
    const { rows } = await this.db.query(
      `SELECT id, user_id, name, color FROM tags WHERE user_id = $1 ORDER BY name ASC, id ASC`,
      [userId]
    )
    return allRows(TagRowSchema, rows).map(toTag)
  }

  async getOrCreate(userId: number, name: string): Promise<number> {
    const existing = await this.findIdByName(userId, name)
    if (existing !== null) return existing

    const { rows } = await this.db.query(
      `INSERT INTO tags (user_id, name)
       VALUES ($1, $2)
       ON CONFLICT (user_id, name) DO NOTHING
       RETURNING id`,
      [userId, name]
    )
    const inserted = firstRow(IdRowSchema, rows)
    if (inserted) return inserted.id

    // Another invocation created it between our lookup and insert
    const raced = await this.findIdByName(userId, name)
    if (raced === null) throw new Error(`Tag "${name}" vanished after conflicting insert`)
    return raced
  }

  async link(messageId: number, tagId: number): Promise<void> {
    await this.db.query(
      `INSERT INTO message_tags (message_id, tag_id)
       VALUES ($1, $2)
       ON CONFLICT (message_id, tag_id) DO NOTHING`,
      [messageId, tagId]
    )
  }

  async findOwnedTag(userId: number, tagId: number): Promise<Tag | null> {
    const { rows } = await this.db.query(
      `SELECT id, user_id, name, color FROM tags WHERE id = $1 AND user_id = $2`,
      [tagId, userId]
    )
    const row = firstRow(TagRowSchema, rows)
    return row ? toTag(row) : null
  }

  async listWithCounts(userId: number): Promise<TagWithCount[]> {
    const { rows } = await this.db.query(
      `SELECT t.id, t.user_id, t.name, t.color, t.created_at,
              COUNT(mt.message_id) AS message_count
       FROM tags t
       LEFT JOIN message_tags mt ON t.id = mt.tag_id
       WHERE t.user_id = $1
       GROUP BY t.id, t.user_id, t.name, t.color, t.created_at
       ORDER BY message_count DESC, t.name ASC`,
      [userId]
    )
    return allRows(TagWithCountRowSchema, rows).map(row => ({
      ...toTag(row),
      createdAt: row.created_at,
      messageCount: row.message_count,
    }))
  }

  async listMessagesForTag(userId: number, tagId: number): Promise<TagMessagesResult> {
    // Ownership first, so a foreign tag id looks exactly like a missing one
    const owned = await this.findOwnedTag(userId, tagId)
    if (!owned) return { type: 'not_found_or_forbidden' }

    const { rows } = await this.db.query(
      `SELECT m.id, m.telegram_message_id, m.message_type, m.text_content, m.caption,
              m.file_name, m.file_size, m.created_at, m.forwarded_from, m.urls, m.hashtags
       FROM messages m
       INNER JOIN message_tags mt ON m.id = mt.message_id
       WHERE mt.tag_id = $1 AND m.user_id = $2
       ORDER BY m.created_at DESC, m.id DESC`,
      [tagId, userId]
    )
    const messages = allRows(MessageSummaryRowSchema, rows).map(row => ({
      id: row.id,
      telegramMessageId: row.telegram_message_id,
      messageType: row.message_type,
      textContent: row.text_content,
      caption: row.caption,
      fileName: row.file_name,
      fileSize: row.file_size,
      createdAt: row.created_at,
      forwardedFrom: row.forwarded_from,
      urls: row.urls ?? [],
      hashtags: row.hashtags ?? [],
    }))
    return { type: 'ok', messages }
  }

  private async findIdByName(userId: number, name: string): Promise<number | null> {
    const { rows } = await this.db.query(
      `SELECT id FROM tags WHERE user_id = $1 AND name = $2`,
      [userId, name]
    )
    return firstRow(IdRowSchema, rows)?.id ?? null
  }
}
