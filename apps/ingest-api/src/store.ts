import { z } from "zod";
import type { Hero, Measurement } from "@sensor-ingest/types";
import type { Queryable } from "./db";
import { StoreError } from "./errors";

/**
 * A single table behind a validated insert and a bounded select.
 * `TDraft` is the fully resolved row minus store-generated fields.
 */
export interface RecordStore<TDraft, TRecord> {
  insert(draft: TDraft): Promise<TRecord>;
  list(limit: number): Promise<TRecord[]>;
}

export interface MeasurementDraft {
  device_id: string;
  sensor: string;
  value: number;
  /** ISO-8601 with a zone; stored as TIMESTAMPTZ at full precision. */
  ts: string;
}

export interface HeroDraft {
  name: string;
  secret_name: string;
  age: number | null;
}

export type MeasurementStore = RecordStore<MeasurementDraft, Measurement>;
export type HeroStore = RecordStore<HeroDraft, Hero>;

const ISO_WITH_ZONE =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2})(?::(\d{2}))?(?:\.(\d+))?(Z|([+-])(\d{2})(?::?(\d{2}))?)$/;

/**
 * Normalizes an ISO-8601 timestamp to UTC without going through `Date`, so
 * microseconds survive. Trailing zeros of the fraction are dropped:
 * `2024-01-01T02:00:00.500000+02:00` → `2024-01-01T00:00:00.5Z`.
 */
export function canonicalTimestamp(iso: string): string {
  const match = ISO_WITH_ZONE.exec(iso);
  if (!match) throw new RangeError(`Not an ISO-8601 timestamp with a zone: ${iso}`);
  const [, upToMinutes, second = "00", fraction = "", zone, sign, hours, minutes = "00"] = match;

  let utc = `${upToMinutes}:${second}`;
  if (zone !== "Z") {
    const offsetMs = (Number(hours) * 60 + Number(minutes)) * 60_000;
    const localMs = Date.parse(`${utc}Z`);
    utc = new Date(sign === "+" ? localMs - offsetMs : localMs + offsetMs)
      .toISOString()
      .slice(0, 19);
  }

  const digits = fraction.replace(/0+$/, "");
  return `${utc}${digits ? `.${digits}` : ""}Z`;
}

// Read back as UTC text: the default TIMESTAMPTZ parser yields a Date and
// would cut the value to milliseconds.
const TS_AS_UTC_TEXT = `to_char(ts AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS ts`;

const measurementRowSchema = z.object({
  id: z.number().int(),
  device_id: z.string(),
  sensor: z.string(),
  value: z.number(),
  ts: z.string().regex(ISO_WITH_ZONE).transform(canonicalTimestamp),
});

const heroRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  secret_name: z.string(),
  age: z.number().int().nullable(),
});

interface TableDef<TDraft, TRecord> {
  table: string;
  columns: readonly string[];
  /** Select expressions for columns that need converting on the way out. */
  readAs?: Readonly<Record<string, string>>;
  toValues: (draft: TDraft) => unknown[];
  row: z.ZodType<TRecord, z.ZodTypeDef, unknown>;
}

function createTableStore<TDraft, TRecord>(
  db: Queryable,
  def: TableDef<TDraft, TRecord>,
): RecordStore<TDraft, TRecord> {
  const returning = ["id", ...def.columns].map((c) => def.readAs?.[c] ?? c).join(", ");
  const placeholders = def.columns.map((_, i) => `$${i + 1}`).join(", ");

  const insertSql = `INSERT INTO ${def.table} (${def.columns.join(", ")})
     VALUES (${placeholders})
     RETURNING ${returning}`;
  const listSql = `SELECT ${returning}
     FROM ${def.table}
     ORDER BY id ASC
     LIMIT $1`;

  return {
    // One statement: the insert is atomic and RETURNING re-reads the
    // generated id in the same round trip.
    async insert(draft) {
      try {
        const { rows } = await db.query(insertSql, def.toValues(draft));
        return def.row.parse(rows[0]);
      } catch (err) {
        throw new StoreError(`Insert into ${def.table} failed`, { cause: err });
      }
    },

    async list(limit) {
      try {
        const { rows } = await db.query(listSql, [limit]);
        return rows.map((row) => def.row.parse(row));
      } catch (err) {
        throw new StoreError(`Select from ${def.table} failed`, { cause: err });
      }
    },
  };
}

export function createMeasurementStore(db: Queryable): MeasurementStore {
  return createTableStore(db, {
    table: "measurement",
    columns: ["device_id", "sensor", "value", "ts"],
    readAs: { ts: TS_AS_UTC_TEXT },
    toValues: (m: MeasurementDraft) => [m.device_id, m.sensor, m.value, m.ts],
    row: measurementRowSchema,
  });
}

export function createHeroStore(db: Queryable): HeroStore {
  return createTableStore(db, {
    table: "hero",
    columns: ["name", "secret_name", "age"],
    toValues: (h: HeroDraft) => [h.name, h.secret_name, h.age],
    row: heroRowSchema,
  });
}
