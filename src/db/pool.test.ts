import { describe, expect, it, vi } from 'vitest'
import { isUniqueViolation, runMigrations } from './pool.js'

describe('runMigrations', () => {
  it('creates every table idempotently, parents first', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 })
    vi.spyOn(console, 'log').mockImplementation(() => {})

    await runMigrations({ query })

    const statements = query.mock.calls.map(call => String(call[0]))
    const tables = statements.flatMap(sql => sql.match(/CREATE TABLE IF NOT EXISTS (\w+)/)?.[1] ?? [])
    expect(tables).toEqual(['users', 'messages', 'tags', 'message_tags'])
    expect(statements.every(sql => sql.includes('IF NOT EXISTS'))).toBe(true)
  })

  it('declares the uniqueness the stores rely on', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 })
    vi.spyOn(console, 'log').mockImplementation(() => {})

    await runMigrations({ query })

    const schema = query.mock.calls.map(call => String(call[0])).join('\n')
    expect(schema).toContain('UNIQUE (user_id, telegram_message_id)')
    expect(schema).toContain('UNIQUE (user_id, name)')
    expect(schema).toContain('UNIQUE (message_id, tag_id)')
    expect(schema).toContain('telegram_id BIGINT UNIQUE NOT NULL')
  })
})

describe('isUniqueViolation', () => {
  it('matches SQLSTATE 23505 only', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true)
    expect(isUniqueViolation({ code: '23503' })).toBe(false)
    expect(isUniqueViolation(new Error('boom'))).toBe(false)
    expect(isUniqueViolation(null)).toBe(false)
  })
})
