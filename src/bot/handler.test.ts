import { beforeEach, describe, expect, it, vi } from 'vitest'
import { REPLIES } from '../conversation/replies.js'
import { InMemoryStore, RecordingClient } from '../tests/in-memory-store.js'
import { TelegramUpdateSchema, type TelegramUpdate } from '../telegram/types.js'
import { BOT_REPLIES } from './commands.js'
import { UpdateRouter } from './handler.js'

const CHAT = { id: 100, type: 'private' }
const ANN = { id: 100, is_bot: false, first_name: 'Ann', username: 'ann' }
const BOT = { id: 1, is_bot: true, first_name: 'Tagbox' }

function update(fields: Record<string, unknown>): TelegramUpdate {
  return TelegramUpdateSchema.parse({ update_id: 1, ...fields })
}

function textMessage(messageId: number, text: string, extra: Record<string, unknown> = {}) {
  return update({ message: { message_id: messageId, from: ANN, chat: CHAT, text, ...extra } })
}

describe('UpdateRouter', () => {
  let store: InMemoryStore
  let client: RecordingClient
  let router: UpdateRouter

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    store = new InMemoryStore()
    client = new RecordingClient()
    router = new UpdateRouter({
      users: store.users,
      messages: store.messages,
      tags: store.tags,
      client,
      miniAppUrl: 'https://tags.example/app',
    })
  })

  it('answers commands without ingesting them', async () => {
    const outcome = await router.handleUpdate(
      textMessage(10, '/start', { entities: [{ type: 'bot_command', offset: 0, length: 6 }] })
    )

    expect(outcome).toEqual({ type: 'command', command: 'start' })
    expect(client.sentTexts).toEqual([BOT_REPLIES.start])
    expect(client.lastSend?.options.replyTo).toBe(10)
    expect(store.userRows).toHaveLength(1)
    expect(store.messageRows).toHaveLength(0)
  })

  it('stores a new message and sends the picker', async () => {
    const outcome = await router.handleUpdate(textMessage(10, 'reading list #books https://b.example'))

    expect(outcome).toEqual({
      type: 'flow',
      outcome: { state: 'awaiting_tag_choice', platformMessageId: 10, mode: 'buttons' },
    })
    expect(store.messageRows).toHaveLength(1)
    expect(store.messageRows[0]).toMatchObject({ type: 'text', hashtags: ['books'], urls: ['https://b.example'] })
    expect(client.lastSend?.text).toBe(`${REPLIES.noTagsYet}\n\n[MSG_ID:10]`)
  })

  it('tells the user when the message was already saved', async () => {
    await router.handleUpdate(textMessage(10, 'once'))
    const outcome = await router.handleUpdate(textMessage(10, 'once'))

    expect(outcome).toEqual({ type: 'ingest_failed', reason: 'duplicate' })
    expect(client.lastSend?.text).toBe(BOT_REPLIES.alreadySaved)
    expect(store.messageRows).toHaveLength(1)
  })

  it('routes a reply to the picker into the tag flow', async () => {
    await router.handleUpdate(textMessage(10, 'something to keep'))
    const pickerText = client.lastSend?.text ?? ''

    const outcome = await router.handleUpdate(textMessage(11, 'ideas', {
      reply_to_message: { message_id: 9000, from: BOT, chat: CHAT, text: pickerText },
    }))

    expect(outcome).toMatchObject({ type: 'flow', outcome: { state: 'resolved', tagName: 'ideas' } })
    expect(store.messageRows).toHaveLength(1)
    expect(client.lastSend?.text).toBe("✅ Message tagged with 'ideas'")
  })

  it('recognises a picker by its wording when the marker is gone', async () => {
    const outcome = await router.handleUpdate(textMessage(11, 'ideas', {
      reply_to_message: { message_id: 9000, from: BOT, chat: CHAT, text: 'Choose a tag or create a new one:' },
    }))

    expect(outcome).toEqual({
      type: 'flow',
      outcome: { state: 'failed', failure: { type: 'parse_error', reason: 'marker_missing' } },
    })
    expect(client.sentTexts).toEqual([REPLIES.originalNotFound])
    expect(store.messageRows).toHaveLength(0)
  })

  it('ingests a reply to an ordinary message', async () => {
    const outcome = await router.handleUpdate(textMessage(11, 'quoting', {
      reply_to_message: { message_id: 5, from: ANN, chat: CHAT, text: 'earlier note' },
    }))

    expect(outcome).toMatchObject({ type: 'flow', outcome: { state: 'awaiting_tag_choice', platformMessageId: 11 } })
    expect(store.messageRows).toHaveLength(1)
  })

  it('ignores messages from bots', async () => {
    const outcome = await router.handleUpdate(update({ message: { message_id: 3, from: BOT, chat: CHAT, text: 'hi' } }))

    expect(outcome).toEqual({ type: 'ignored', reason: 'no_human_sender' })
    expect(client.calls).toEqual([])
  })

  it('ignores updates it does not handle', async () => {
    await expect(router.handleUpdate(update({}))).resolves.toEqual({ type: 'ignored', reason: 'unsupported_update' })
  })

  it('sends the save failure text when the user cannot be stored', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    store.failWith = new Error('connection refused')

    const outcome = await router.handleUpdate(textMessage(10, 'hello'))

    expect(outcome).toEqual({ type: 'ingest_failed', reason: 'user_upsert_failed' })
    expect(client.sentTexts).toEqual([BOT_REPLIES.saveFailed])
  })

  it('tags through a button press', async () => {
    await router.handleUpdate(textMessage(10, 'keep me'))
    const userId = store.userRows[0]?.id ?? 0
    const work = store.addTag(userId, 'work')

    const outcome = await router.handleUpdate(update({
      callback_query: {
        id: 'cb-1',
        from: ANN,
        message: { message_id: 9000, from: BOT, chat: CHAT, text: 'Choose a tag or create a new one:' },
        data: `tag:${work.id}:10`,
      },
    }))

    expect(outcome).toMatchObject({ type: 'flow', outcome: { state: 'resolved', tagId: work.id } })
    expect(client.calls.slice(-3)).toEqual([
      { method: 'answerCallback', callbackId: 'cb-1' },
      { method: 'send', chatId: 100, text: "✅ Message tagged with 'work'", options: {} },
      { method: 'editText', chatId: 100, messageId: 9000, text: "✅ Tagged with 'work'" },
    ])
  })

  it('answers a button press that carries no chat', async () => {
    const outcome = await router.handleUpdate(update({
      callback_query: { id: 'cb-2', from: ANN, data: 'tag:1:10' },
    }))

    expect(outcome).toEqual({ type: 'ignored', reason: 'callback_without_chat' })
    expect(client.calls).toEqual([{ method: 'answerCallback', callbackId: 'cb-2' }])
  })
})
