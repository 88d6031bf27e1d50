import type { Queryable } from '../db/pool.js'
import { firstRow, IdRowSchema } from './rows.js'
import type { UserProfile, UserRepository } from './types.js'

export class PgUserStore implements UserRepository {
  constructor(private readonly db: Queryable) {}

  async upsert(profile: UserProfile): Promise<number> {
    const { rows } = await this.db.query(
      `INSERT INTO users (telegram_id, username, first_name, last_name, is_active)
       VALUES ($1, $2, $3, $4, TRUE)
       ON CONFLICT (telegram_id)
       DO UPDATE SET username = EXCLUDED.username,
                     first_name = EXCLUDED.first_name,
                     last_name = EXCLUDED.last_name,
                     updated_at = NOW()
       RETURNING id`,
      [
        profile.telegramId,
        profile.username || null,
        profile.firstName || null,
        profile.lastName || null,
      ]
    )
    const row = firstRow(IdRowSchema, rows)
    if (!row) throw new Error(`User upsert returned no row for telegram_id=${profile.telegramId}`)
    return row.id
  }

  async findIdByTelegramId(telegramId: number): Promise<number | null> {
    const { rows } = await this.db.query(
      `SELECT id FROM users WHERE telegram_id = $1`,
      [telegramId]
    )
    return firstRow(IdRowSchema, rows)?.id ?? null
  }
}
