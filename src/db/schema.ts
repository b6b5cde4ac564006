import type { Queryable } from './repositories/queryable.js'

const CREATE_STATEMENTS = [
  `
  CREATE TABLE IF NOT EXISTS users (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    email TEXT NOT NULL UNIQUE,
    billing_customer_id TEXT UNIQUE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT users_email_nonempty CHECK (length(trim(email)) > 0)
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS subscriptions (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    tier TEXT NOT NULL DEFAULT 'free' CHECK (tier IN ('free', 'indie', 'studio', 'enterprise')),
    billing_subscription_id TEXT UNIQUE,
    chunks_limit INTEGER NOT NULL CHECK (chunks_limit >= 0),
    rate_limit INTEGER NOT NULL CHECK (rate_limit >= 0),
    active BOOLEAN NOT NULL DEFAULT TRUE,
    current_period_start TIMESTAMPTZ,
    current_period_end TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS api_keys (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    key_hash TEXT NOT NULL UNIQUE,
    key_prefix TEXT NOT NULL,
    name TEXT,
    active BOOLEAN NOT NULL DEFAULT TRUE,
    last_used_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    expires_at TIMESTAMPTZ
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS usage_logs (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    api_key_id UUID REFERENCES api_keys(id) ON DELETE SET NULL,
    endpoint TEXT NOT NULL,
    chunks_generated INTEGER NOT NULL DEFAULT 0 CHECK (chunks_generated >= 0),
    response_time_ms INTEGER,
    status_code INTEGER,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
  `,
  `CREATE INDEX IF NOT EXISTS usage_logs_user_created_idx ON usage_logs (user_id, created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS usage_logs_created_idx ON usage_logs (created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS subscriptions_user_active_idx ON subscriptions (user_id, active)`,
  `CREATE INDEX IF NOT EXISTS api_keys_user_id_idx ON api_keys (user_id)`,
  `
  CREATE OR REPLACE FUNCTION touch_updated_at()
  RETURNS TRIGGER AS $$
  BEGIN
    NEW.updated_at = NOW();
    RETURN NEW;
  END;
  $$ LANGUAGE plpgsql
  `,
  `
  CREATE OR REPLACE TRIGGER users_touch_updated_at
  BEFORE UPDATE ON users
  FOR EACH ROW EXECUTE FUNCTION touch_updated_at()
  `,
  `
  CREATE OR REPLACE TRIGGER subscriptions_touch_updated_at
  BEFORE UPDATE ON subscriptions
  FOR EACH ROW EXECUTE FUNCTION touch_updated_at()
  `,
  `
  CREATE OR REPLACE FUNCTION get_monthly_usage(p_user_id UUID)
  RETURNS INTEGER AS $$
    SELECT COALESCE(SUM(chunks_generated), 0)::INTEGER
    FROM usage_logs
    WHERE user_id = p_user_id
      AND created_at >= date_trunc('month', NOW())
      AND created_at < date_trunc('month', NOW()) + INTERVAL '1 month'
  $$ LANGUAGE SQL STABLE
  `,
  `
  CREATE OR REPLACE FUNCTION check_rate_limit(p_user_id UUID, p_limit INTEGER)
  RETURNS BOOLEAN AS $$
    SELECT COUNT(*) < p_limit
    FROM usage_logs
    WHERE user_id = p_user_id
      AND created_at > NOW() - INTERVAL '1 minute'
  $$ LANGUAGE SQL STABLE
  `,
] as const

const DROP_STATEMENTS = [
  'DROP FUNCTION IF EXISTS check_rate_limit(UUID, INTEGER)',
  'DROP FUNCTION IF EXISTS get_monthly_usage(UUID)',
  'DROP TABLE IF EXISTS usage_logs',
  'DROP TABLE IF EXISTS api_keys',
  'DROP TABLE IF EXISTS subscriptions',
  'DROP TABLE IF EXISTS users',
  'DROP FUNCTION IF EXISTS touch_updated_at()',
] as const

export async function createSchema(db: Queryable): Promise<void> {
  for (const statement of CREATE_STATEMENTS) {
    await db.query(statement)
  }
}

export async function resetDatabase(db: Queryable): Promise<void> {
  await db.query('TRUNCATE TABLE usage_logs, api_keys, subscriptions, users CASCADE')
}

export async function dropSchema(db: Queryable): Promise<void> {
  for (const statement of DROP_STATEMENTS) {
    await db.query(statement)
  }
}
