/**
 * Mini-app API: read-only endpoints behind Telegram Web App authentication.
 *
 *   GET /api/health
 *   GET /api/user/tags
 *   GET /api/user/tags/:tagId/messages
 *
 * Every query is scoped to the user resolved from the signed initData.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify'
import type { TagRepository, UserRepository } from '../store/types.js'
import { safeError } from '../utils/safe-log.js'
import { validateInitData } from './auth.js'

export interface MiniAppDeps {
  users: UserRepository
  tags: TagRepository
  botToken: string
  authMaxAgeSeconds?: number
}

type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: string }

function fail(reply: FastifyReply, status: number, error: string): ApiResponse<never> {
  reply.code(status)
  return { success: false, error }
}

export async function registerMiniAppRoutes(server: FastifyInstance, deps: MiniAppDeps): Promise<void> {
  /** Resolves the caller's internal user id, or the error body to send back. */
  async function authenticate(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<{ userId: number | null } | { error: ApiResponse<never> }> {
    const header = request.headers.authorization
    if (!header) return { error: fail(reply, 401, 'Authorization header is required') }

    const auth = validateInitData(header, deps.botToken, deps.authMaxAgeSeconds)
    if (!auth.valid) {
      request.log.warn(`[MiniApp] Rejected initData: ${auth.error}`)
      return { error: fail(reply, 401, 'Invalid authentication data') }
    }
    // A Telegram user who never wrote to the bot has no row and no tags
    return { userId: await deps.users.findIdByTelegramId(auth.user.id) }
  }

  server.get('/api/health', async () => ({
    success: true,
    data: { status: 'healthy', timestamp: new Date().toISOString() },
  }))

  server.get('/api/user/tags', async (request, reply) => {
    try {
      const auth = await authenticate(request, reply)
      if ('error' in auth) return auth.error
      const data = auth.userId === null ? [] : await deps.tags.listWithCounts(auth.userId)
      return { success: true, data }
    } catch (err) {
      request.log.error({ err: safeError(err) }, '[MiniApp] Failed to fetch user tags')
      return fail(reply, 500, 'Failed to fetch user tags')
    }
  })

  server.get<{ Params: { tagId: string } }>('/api/user/tags/:tagId/messages', async (request, reply) => {
    try {
      const auth = await authenticate(request, reply)
      if ('error' in auth) return auth.error

      const { tagId: rawTagId } = request.params
      if (!/^\d+$/.test(rawTagId) || !Number.isSafeInteger(Number(rawTagId))) {
        return fail(reply, 400, `Invalid tag ID format: '${rawTagId}'`)
      }

      const result = auth.userId === null
        ? { type: 'not_found_or_forbidden' as const }
        : await deps.tags.listMessagesForTag(auth.userId, Number(rawTagId))
      if (result.type === 'not_found_or_forbidden') {
        return fail(reply, 404, "Tag not found or you don't have access to it")
      }
      return { success: true, data: result.messages }
    } catch (err) {
      request.log.error({ err: safeError(err) }, '[MiniApp] Failed to fetch messages for tag')
      return fail(reply, 500, 'Failed to fetch messages for tag')
    }
  })
}
