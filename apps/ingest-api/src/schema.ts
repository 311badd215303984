import type { Queryable } from "./db";

// ─── Schema ───────────────────────────────────────────────
// "Create if absent" only: never alters or drops an existing table and
// there are no migrations. Runs once before the server accepts requests.
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS measurement (
     id        SERIAL PRIMARY KEY,
     device_id VARCHAR NOT NULL,
     sensor    VARCHAR NOT NULL,
     value     DOUBLE PRECISION NOT NULL,
     ts        TIMESTAMPTZ NOT NULL DEFAULT now()
   )`,
  "CREATE INDEX IF NOT EXISTS ix_measurement_device_id ON measurement (device_id)",
  "CREATE INDEX IF NOT EXISTS ix_measurement_sensor ON measurement (sensor)",
  `CREATE TABLE IF NOT EXISTS hero (
     id          SERIAL PRIMARY KEY,
     name        VARCHAR NOT NULL,
     secret_name VARCHAR NOT NULL,
     age         INTEGER
   )`,
  "CREATE INDEX IF NOT EXISTS ix_hero_name ON hero (name)",
  "CREATE INDEX IF NOT EXISTS ix_hero_age ON hero (age)",
];

export async function ensureSchema(db: Queryable): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await db.query(statement);
  }
}
