import { beforeEach, describe, expect, it, vi } from 'vitest'
import { TelegramClient, toTelegramMarkup } from './client.js'

const fetchMock = vi.fn<typeof fetch>()
const client = new TelegramClient('test-bot-token', fetchMock)

function respondWith(body: unknown, status = 200) {
  fetchMock.mockImplementation(async () => new Response(JSON.stringify(body), { status }))
}

function sentBody(call = 0): unknown {
  const init = fetchMock.mock.calls[call]?.[1]
  return JSON.parse(String(init?.body))
}

beforeEach(() => {
  fetchMock.mockReset()
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

describe('toTelegramMarkup', () => {
  it('maps callback and web app buttons', () => {
    expect(toTelegramMarkup({
      type: 'inline_keyboard',
      rows: [[{ label: 'work', callbackData: 'tag:3:10' }, { label: 'Open', webAppUrl: 'https://tags.example' }]],
    })).toEqual({
      inline_keyboard: [[
        { text: 'work', callback_data: 'tag:3:10' },
        { text: 'Open', web_app: { url: 'https://tags.example' } },
      ]],
    })
  })

  it('makes forced replies selective', () => {
    expect(toTelegramMarkup({ type: 'force_reply' })).toEqual({ force_reply: true, selective: true })
  })
})

describe('TelegramClient', () => {
  it('sends a reply with markup and returns the new message id', async () => {
    respondWith({ ok: true, result: { message_id: 77 } })

    const result = await client.send(100, 'Choose a tag', {
      replyTo: 10,
      replyMarkup: { type: 'force_reply' },
    })

    expect(result).toEqual({ ok: true, messageId: 77 })
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.telegram.org/bottest-bot-token/sendMessage')
    expect(sentBody()).toEqual({
      chat_id: 100,
      text: 'Choose a tag',
      reply_parameters: { message_id: 10, allow_sending_without_reply: true },
      reply_markup: { force_reply: true, selective: true },
    })
  })

  it('sends plain text without optional fields', async () => {
    respondWith({ ok: true, result: { message_id: 78 } })

    await client.send(100, 'hi')

    expect(sentBody()).toEqual({ chat_id: 100, text: 'hi' })
  })

  it('edits and answers callbacks', async () => {
    respondWith({ ok: true, result: true })

    await expect(client.editText(100, 77, 'done')).resolves.toEqual({ ok: true })
    await expect(client.answerCallback('cb-1')).resolves.toEqual({ ok: true })

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.telegram.org/bottest-bot-token/editMessageText')
    expect(sentBody(0)).toEqual({ chat_id: 100, message_id: 77, text: 'done' })
    expect(sentBody(1)).toEqual({ callback_query_id: 'cb-1' })
  })

  it('returns the Bot API error description', async () => {
    respondWith({ ok: false, description: 'Bad Request: chat not found' }, 400)

    await expect(client.send(1, 'x')).resolves.toEqual({ ok: false, error: 'Bad Request: chat not found' })
  })

  it('returns an error for an unexpected body', async () => {
    respondWith({ unexpected: true }, 502)

    await expect(client.send(1, 'x')).resolves.toEqual({ ok: false, error: 'unexpected response (HTTP 502)' })
  })

  it('turns network failures into an error result', async () => {
    fetchMock.mockRejectedValue(new Error('socket hang up'))

    await expect(client.answerCallback('cb-2')).resolves.toEqual({ ok: false, error: 'socket hang up' })
  })
})
