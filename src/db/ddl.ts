// DDL matching the tables in schema.ts, applied idempotently at startup.
export const schemaStatements: string[] = [
  `CREATE TABLE IF NOT EXISTS cupping_sessions (
    session_id text PRIMARY KEY,
    share_id text NOT NULL UNIQUE,
    taster_name text NOT NULL,
    anonymous_mode boolean NOT NULL DEFAULT false,
    attributes jsonb NOT NULL,
    origin text NOT NULL,
    producer text NOT NULL,
    roast_level text NOT NULL,
    preparation_method text NOT NULL,
    flavor_notes jsonb NOT NULL,
    cost double precision,
    schema_version integer NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now(),
    finalized_at timestamptz,
    excluded_at timestamptz
  )`,
  `CREATE INDEX IF NOT EXISTS cupping_sessions_created_at_idx ON cupping_sessions (created_at)`,
  `CREATE TABLE IF NOT EXISTS analytics_events (
    id serial PRIMARY KEY,
    event_type text NOT NULL,
    share_id text NOT NULL,
    payload jsonb NOT NULL,
    occurred_at timestamptz NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS analytics_events_share_occurred_at_idx ON analytics_events (share_id, occurred_at)`,
];
