import { createHmac, timingSafeEqual } from 'node:crypto'
import { z } from 'zod'

const DEFAULT_MAX_AGE_SECONDS = 24 * 60 * 60

const WebAppUserSchema = z.object({
  id: z.number().int(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
})

export type WebAppUser = z.infer<typeof WebAppUserSchema>

export type InitDataResult =
  | { valid: true; user: WebAppUser }
  | { valid: false; error: string }

/** data-check-string: every field but `hash`, sorted by key, as `key=value` lines. */
export function dataCheckString(params: URLSearchParams): string {
  const pairs: string[] = []
  for (const [key, value] of params) {
    if (key !== 'hash') pairs.push(`${key}=${value}`)
  }
  return pairs.sort().join('\n')
}

export function signInitData(params: URLSearchParams, botToken: string): string {
  const secretKey = createHmac('sha256', 'WebAppData').update(botToken).digest()
  return createHmac('sha256', secretKey).update(dataCheckString(params)).digest('hex')
}

/**
 * Verify the `initData` string a Telegram Web App receives at launch.
 *
 * @param initData      Raw query string, optionally prefixed with `Bearer `
 * @param botToken      Token of the bot that opened the mini-app
 * @param maxAgeSeconds Reject data whose `auth_date` is older than this
 * @param now           Current time in ms, for tests
 */
export function validateInitData(
  initData: string,
  botToken: string,
  maxAgeSeconds = DEFAULT_MAX_AGE_SECONDS,
  now = Date.now()
): InitDataResult {
  const raw = initData.startsWith('Bearer ') ? initData.slice('Bearer '.length) : initData
  const params = new URLSearchParams(raw)

  const receivedHash = params.get('hash')
  if (!receivedHash) return { valid: false, error: 'hash parameter is missing' }

  const expected = Buffer.from(signInitData(params, botToken), 'utf8')
  const received = Buffer.from(receivedHash, 'utf8')
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    return { valid: false, error: 'invalid hash' }
  }

  const authDate = Number(params.get('auth_date'))
  if (!Number.isFinite(authDate) || authDate <= 0) {
    return { valid: false, error: 'auth_date is missing' }
  }
  if (Math.floor(now / 1000) - authDate > maxAgeSeconds) {
    return { valid: false, error: 'init data expired' }
  }

  const userField = params.get('user')
  if (!userField) return { valid: false, error: 'user parameter is missing' }

  let userJson: unknown
  try {
    userJson = JSON.parse(userField)
  } catch {
    return { valid: false, error: 'user parameter is not JSON' }
  }
  const user = WebAppUserSchema.safeParse(userJson)
  if (!user.success) return { valid: false, error: 'user parameter is malformed' }

  return { valid: true, user: user.data }
}
