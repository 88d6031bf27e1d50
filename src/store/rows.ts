/**
 * Row schemas for pg results. BIGINT and COUNT(*) come back as strings, so
 * numeric columns are coerced.
 */

import { z } from 'zod'
import { MESSAGE_TYPES } from '../metadata/types.js'

export const IdRowSchema = z.object({ id: z.coerce.number().int() })

export const TagRowSchema = z.object({
  id: z.coerce.number().int(),
  user_id: z.coerce.number().int(),
  name: z.string(),
  color: z.string().nullable(),
})

export const TagWithCountRowSchema = TagRowSchema.extend({
  created_at: z.coerce.date(),
  message_count: z.coerce.number().int(),
})

export const MessageSummaryRowSchema = z.object({
  id: z.coerce.number().int(),
  telegram_message_id: z.coerce.number().int(),
  message_type: z.enum(MESSAGE_TYPES),
  text_content: z.string().nullable(),
  caption: z.string().nullable(),
  file_name: z.string().nullable(),
  file_size: z.coerce.number().nullable(),
  created_at: z.coerce.date(),
  forwarded_from: z.string().nullable(),
  urls: z.array(z.string()).nullable(),
  hashtags: z.array(z.string()).nullable(),
})

export function firstRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[]): T | null {
  if (rows.length === 0) return null
  return schema.parse(rows[0])
}

export function allRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[]): T[] {
  return rows.map(row => schema.parse(row))
}
