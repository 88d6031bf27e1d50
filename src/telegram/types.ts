/**
 * Telegram Bot API shapes
 *
 * Only the subset the bot reads. Webhook bodies are untrusted JSON, so every
 * update goes through `.safeParse()` before the router sees it; unknown keys
 * are stripped.
 */

import { z } from 'zod'

export const TelegramUserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().default(false),
  first_name: z.string().default(''),
  last_name: z.string().optional(),
  username: z.string().optional(),
})

export const TelegramChatSchema = z.object({
  id: z.number().int(),
  type: z.string(),
  title: z.string().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
})

export const PhotoSizeSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  file_size: z.number().optional(),
})

const FileBase = {
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  file_size: z.number().optional(),
}

export const VideoSchema = z.object({
  ...FileBase,
  duration: z.number().optional(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
})

export const DocumentSchema = z.object({
  ...FileBase,
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
})

export const AudioSchema = z.object({
  ...FileBase,
  duration: z.number().optional(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  title: z.string().optional(),
  performer: z.string().optional(),
})

export const VoiceSchema = z.object({
  ...FileBase,
  duration: z.number().optional(),
  mime_type: z.string().optional(),
})

export const VideoNoteSchema = z.object({
  ...FileBase,
  duration: z.number().optional(),
  length: z.number().optional(),
})

export const StickerSchema = z.object({
  ...FileBase,
  emoji: z.string().optional(),
  set_name: z.string().optional(),
})

export const MessageEntitySchema = z.object({
  type: z.string(),
  offset: z.number(),
  length: z.number(),
})

// Bot API 7.0+ replaces the forward_* fields with a single origin object.
export const MessageOriginSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('user'), date: z.number(), sender_user: TelegramUserSchema }),
  z.object({ type: z.literal('hidden_user'), date: z.number(), sender_user_name: z.string() }),
  z.object({
    type: z.literal('chat'),
    date: z.number(),
    sender_chat: TelegramChatSchema,
    author_signature: z.string().optional(),
  }),
  z.object({
    type: z.literal('channel'),
    date: z.number(),
    chat: TelegramChatSchema,
    message_id: z.number().optional(),
    author_signature: z.string().optional(),
  }),
])

const BaseMessageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().optional(),
  from: TelegramUserSchema.optional(),
  chat: TelegramChatSchema,
  text: z.string().optional(),
  caption: z.string().optional(),
  entities: z.array(MessageEntitySchema).optional(),
  photo: z.array(PhotoSizeSchema).optional(),
  video: VideoSchema.optional(),
  document: DocumentSchema.optional(),
  audio: AudioSchema.optional(),
  voice: VoiceSchema.optional(),
  video_note: VideoNoteSchema.optional(),
  sticker: StickerSchema.optional(),
  forward_origin: MessageOriginSchema.optional(),
  forward_from: TelegramUserSchema.optional(),
  forward_from_chat: TelegramChatSchema.optional(),
  forward_sender_name: z.string().optional(),
  forward_signature: z.string().optional(),
  forward_date: z.number().optional(),
})

export const TelegramMessageSchema = BaseMessageSchema.extend({
  reply_to_message: BaseMessageSchema.optional(),
})

export const CallbackQuerySchema = z.object({
  id: z.string(),
  from: TelegramUserSchema,
  message: BaseMessageSchema.optional(),
  data: z.string().optional(),
})

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: TelegramMessageSchema.optional(),
  edited_message: TelegramMessageSchema.optional(),
  callback_query: CallbackQuerySchema.optional(),
})

export type TelegramUser = z.infer<typeof TelegramUserSchema>
export type TelegramChat = z.infer<typeof TelegramChatSchema>
export type PhotoSize = z.infer<typeof PhotoSizeSchema>
export type Video = z.infer<typeof VideoSchema>
export type Document = z.infer<typeof DocumentSchema>
export type Audio = z.infer<typeof AudioSchema>
export type Voice = z.infer<typeof VoiceSchema>
export type VideoNote = z.infer<typeof VideoNoteSchema>
export type Sticker = z.infer<typeof StickerSchema>
export type MessageOrigin = z.infer<typeof MessageOriginSchema>
export type BaseTelegramMessage = z.infer<typeof BaseMessageSchema>
export type TelegramMessage = z.infer<typeof TelegramMessageSchema>
export type CallbackQuery = z.infer<typeof CallbackQuerySchema>
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>
