/**
 * Tagbox - Main Server
 * Telegram content organizer: saves what users send, asks for a tag,
 * serves the tags to the mini-app.
 */

import { loadConfig } from './config.js'
import { closePool, createPool, runMigrations } from './db/pool.js'
import { buildServer } from './server.js'
import { PgMessageStore } from './store/messages.js'
import { PgTagStore } from './store/tags.js'
import { PgUserStore } from './store/users.js'
import { TelegramClient } from './telegram/client.js'

const config = loadConfig()

const pool = createPool({
  databaseUrl: config.DATABASE_URL,
  production: config.NODE_ENV === 'production',
  caCert: config.DATABASE_CA_CERT,
})

const server = await buildServer({
  bot: {
    users: new PgUserStore(pool),
    messages: new PgMessageStore(pool),
    tags: new PgTagStore(pool),
    client: new TelegramClient(config.TELEGRAM_BOT_TOKEN),
    miniAppUrl: config.MINIAPP_URL,
  },
  botToken: config.TELEGRAM_BOT_TOKEN,
  webhookSecret: config.TELEGRAM_WEBHOOK_SECRET,
  corsOrigin: config.CORS_ORIGIN,
  authMaxAgeSeconds: config.MINIAPP_AUTH_MAX_AGE_SECONDS,
})

async function start(): Promise<void> {
  try {
    await runMigrations(pool)
    await server.listen({ port: config.PORT, host: '0.0.0.0' })
    server.log.info(`Tagbox ready on port ${config.PORT} | Mini-app: ${config.MINIAPP_URL ?? 'disabled'}`)
  } catch (err) {
    server.log.error(err)
    await closePool(pool)
    process.exit(1)
  }
}

async function shutdown(signal: string): Promise<void> {
  server.log.info(`${signal} received, shutting down`)
  await server.close()
  await closePool(pool)
  process.exit(0)
}

process.on('SIGTERM', () => { void shutdown('SIGTERM') })
process.on('SIGINT', () => { void shutdown('SIGINT') })

await start()
