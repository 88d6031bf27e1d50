/**
 * Fastify app: health check, Telegram webhook and the mini-app API.
 * Startup and shutdown live in index.ts.
 */

import Fastify, { type FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import { createHash, timingSafeEqual } from 'node:crypto'
import { UpdateRouter, type BotDeps } from './bot/handler.js'
import { registerMiniAppRoutes } from './miniapp/api.js'
import { TelegramUpdateSchema } from './telegram/types.js'
import { safeError } from './utils/safe-log.js'

export interface ServerOptions {
  bot: BotDeps
  botToken: string
  webhookSecret?: string
  corsOrigin?: string
  authMaxAgeSeconds?: number
  logger?: boolean
}

function secretMatches(expected: string, header: string | string[] | undefined): boolean {
  const incoming = Array.isArray(header) ? (header[0] ?? '') : (header ?? '')
  const expectedDigest = createHash('sha256').update(expected).digest()
  const actualDigest = createHash('sha256').update(incoming).digest()
  return timingSafeEqual(expectedDigest, actualDigest)
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? true })
  const router = new UpdateRouter(options.bot)

  await server.register(cors, { origin: options.corsOrigin ?? '*' })

  server.get('/health', async () => ({ status: 'ok' }))

  server.post('/webhook/telegram', async (request, reply) => {
    // Verify webhook secret token (set via Telegram setWebhook API)
    if (options.webhookSecret && !secretMatches(options.webhookSecret, request.headers['x-telegram-bot-api-secret-token'])) {
      server.log.warn('Telegram webhook: invalid secret token')
      return reply.code(403).send({ ok: false, error: 'Forbidden' })
    }

    const parsed = TelegramUpdateSchema.safeParse(request.body)
    if (!parsed.success) {
      server.log.warn({ issues: parsed.error.issues.length }, 'Telegram webhook: unparseable update')
      return { ok: true }
    }

    try {
      const outcome = await router.handleUpdate(parsed.data)
      server.log.info({ updateId: parsed.data.update_id, outcome: outcome.type }, 'Telegram update handled')
    } catch (err) {
      // Telegram re-delivers on non-2xx; a handled update is never retried
      server.log.error({ err: safeError(err) }, 'Telegram webhook: update failed')
    }
    return { ok: true }
  })

  await registerMiniAppRoutes(server, {
    users: options.bot.users,
    tags: options.bot.tags,
    botToken: options.botToken,
    authMaxAgeSeconds: options.authMaxAgeSeconds,
  })

  return server
}
