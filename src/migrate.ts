/**
 * Database Migration Runner
 * Safe to run multiple times: every statement uses IF NOT EXISTS.
 *
 * Usage: npm run migrate
 */
import { loadConfig } from './config.js'
import { closePool, createPool, runMigrations } from './db/pool.js'

const config = loadConfig()

console.log('🗄️  Connecting to database...')
const pool = createPool({
  databaseUrl: config.DATABASE_URL,
  production: config.NODE_ENV === 'production',
  caCert: config.DATABASE_CA_CERT,
})

try {
  await runMigrations(pool)
  console.log('✅  All migrations applied successfully')
} catch (err) {
  console.error('❌  Migration failed:', err instanceof Error ? err.message : err)
  process.exitCode = 1
} finally {
  await closePool(pool)
}
