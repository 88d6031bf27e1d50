/**
 * Message persistence. Rows are written once on ingestion and never updated;
 * only previews of text and caption are stored.
 */

import { isUniqueViolation, type Queryable } from '../db/pool.js'
import { firstRow, IdRowSchema } from './rows.js'
import type { MessageRepository, NewMessage, SaveMessageResult } from './types.js'

export class PgMessageStore implements MessageRepository {
  constructor(private readonly db: Queryable) {}

  async save(message: NewMessage): Promise<SaveMessageResult> {
    try {
      const { rows } = await this.db.query(
        `INSERT INTO messages (
           user_id, telegram_message_id, message_type, text_content, caption,
           file_id, file_name, file_size, mime_type, duration,
           forwarded_date, forwarded_from, urls, hashtags, mentions
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
         RETURNING id`,
        [
          message.userId,
          message.platformMessageId,
          message.type,
          message.textPreview,
          message.captionPreview,
          message.file.fileId,
          message.file.fileName,
          message.file.fileSize,
          message.file.mimeType,
          message.file.duration,
          message.provenance.forwardedDate,
          message.provenance.forwardedFrom,
          message.urls,
          message.hashtags,
          message.mentions,
        ]
      )
      const row = firstRow(IdRowSchema, rows)
      if (!row) throw new Error('Message insert returned no row')
      return { type: 'saved', id: row.id }
    } catch (error) {
      if (isUniqueViolation(error)) return { type: 'conflict' }
      throw error
    }
  }

  async resolveId(userId: number, platformMessageId: number): Promise<number | null> {
    const { rows } = await this.db.query(
      `SELECT id FROM messages WHERE user_id = $1 AND telegram_message_id = $2`,
      [userId, platformMessageId]
    )
    return firstRow(IdRowSchema, rows)?.id ?? null
  }
}
