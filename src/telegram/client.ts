/**
 * Telegram Bot API client
 *
 * The messaging collaborator the bot talks through. Calls never throw: a
 * network failure or a Bot API `ok: false` comes back as `{ ok: false }` and
 * is logged, so a failed send cannot abort an update half-way.
 */

import { z } from 'zod'

export type InlineButton =
  | { label: string; callbackData: string }
  | { label: string; webAppUrl: string }

export type ReplyMarkup =
  | { type: 'inline_keyboard'; rows: InlineButton[][] }
  | { type: 'force_reply' }

export interface SendOptions {
  replyTo?: number
  replyMarkup?: ReplyMarkup
}

export type ClientResult =
  | { ok: true; messageId?: number }
  | { ok: false; error: string }

export interface MessagingClient {
  send(chatId: number, text: string, options?: SendOptions): Promise<ClientResult>
  editText(chatId: number, messageId: number, text: string): Promise<ClientResult>
  answerCallback(callbackId: string): Promise<ClientResult>
}

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.unknown().optional(),
})

const SentMessageSchema = z.object({ message_id: z.number() })

export function toTelegramMarkup(markup: ReplyMarkup): Record<string, unknown> {
  switch (markup.type) {
    case 'force_reply':
      return { force_reply: true, selective: true }
    case 'inline_keyboard':
      return {
        inline_keyboard: markup.rows.map(row =>
          row.map(button =>
            'callbackData' in button
              ? { text: button.label, callback_data: button.callbackData }
              : { text: button.label, web_app: { url: button.webAppUrl } }
          )
        ),
      }
  }
}

export class TelegramClient implements MessagingClient {
  constructor(
    private readonly token: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly baseUrl = 'https://api.telegram.org'
  ) {}

  async send(chatId: number, text: string, options: SendOptions = {}): Promise<ClientResult> {
    const body: Record<string, unknown> = { chat_id: chatId, text }
    if (options.replyTo !== undefined) {
      body.reply_parameters = { message_id: options.replyTo, allow_sending_without_reply: true }
    }
    if (options.replyMarkup) body.reply_markup = toTelegramMarkup(options.replyMarkup)

    const result = await this.call('sendMessage', body)
    if (!result.ok) return result
    const sent = SentMessageSchema.safeParse(result.payload)
    return sent.success ? { ok: true, messageId: sent.data.message_id } : { ok: true }
  }

  async editText(chatId: number, messageId: number, text: string): Promise<ClientResult> {
    const result = await this.call('editMessageText', { chat_id: chatId, message_id: messageId, text })
    return result.ok ? { ok: true } : result
  }

  async answerCallback(callbackId: string): Promise<ClientResult> {
    const result = await this.call('answerCallbackQuery', { callback_query_id: callbackId })
    return result.ok ? { ok: true } : result
  }

  private async call(
    method: string,
    body: Record<string, unknown>
  ): Promise<{ ok: true; payload: unknown } | { ok: false; error: string }> {
    const fetchImpl = this.fetchImpl
    try {
      const res = await fetchImpl(`${this.baseUrl}/bot${this.token}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      })
      const parsed = ApiResponseSchema.safeParse(await res.json())
      if (!parsed.success) {
        console.error(`[Telegram] ${method} returned an unexpected body (HTTP ${res.status})`)
        return { ok: false, error: `unexpected response (HTTP ${res.status})` }
      }
      if (!parsed.data.ok) {
        const error = parsed.data.description ?? `HTTP ${res.status}`
        console.error(`[Telegram] ${method} failed:`, error)
        return { ok: false, error }
      }
      return { ok: true, payload: parsed.data.result }
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err)
      console.error(`[Telegram] ${method} request failed:`, error)
      return { ok: false, error }
    }
  }
}
