import { describe, expect, it, vi } from "vitest";
import { pingDatabase } from "../src/db";
import { StoreError } from "../src/errors";
import { ensureSchema, SCHEMA_STATEMENTS } from "../src/schema";
import { canonicalTimestamp, createHeroStore, createMeasurementStore } from "../src/store";

const stubDb = (rows: unknown[]) => {
  const query = vi.fn(async (_text: string, _values?: unknown[]) => ({ rows }));
  return { query };
};

const failingDb = (err: Error) => ({
  query: vi.fn(async (_text: string, _values?: unknown[]): Promise<{ rows: unknown[] }> => {
    throw err;
  }),
});

describe("canonicalTimestamp", () => {
  it("drops a zero fraction", () => {
    expect(canonicalTimestamp("2024-01-01T00:00:00.000000Z")).toBe("2024-01-01T00:00:00Z");
  });

  it("keeps microseconds and trims trailing zeros", () => {
    expect(canonicalTimestamp("2024-01-01T00:00:00.123456Z")).toBe("2024-01-01T00:00:00.123456Z");
    expect(canonicalTimestamp("2024-01-01T00:00:00.250000Z")).toBe("2024-01-01T00:00:00.25Z");
  });

  it("shifts offsets to UTC across a day boundary without touching the fraction", () => {
    expect(canonicalTimestamp("2024-01-01T01:30:00.000001+02:00")).toBe("2023-12-31T23:30:00.000001Z");
    expect(canonicalTimestamp("2024-01-01T23:00:00-0130")).toBe("2024-01-02T00:30:00Z");
  });

  it("fills in omitted seconds", () => {
    expect(canonicalTimestamp("2024-01-01T00:00Z")).toBe("2024-01-01T00:00:00Z");
  });

  it("refuses a timestamp without a zone", () => {
    expect(() => canonicalTimestamp("2024-01-01T00:00:00")).toThrow(RangeError);
  });
});

describe("measurement store", () => {
  const ts = "2024-01-01T00:00:00.123456Z";
  // to_char output for the TIMESTAMPTZ column read back in UTC
  const row = { id: 1, device_id: "esp32-1", sensor: "temp", value: 21.5, ts: "2024-01-01T00:00:00.123456Z" };

  it("inserts with RETURNING and maps the generated row", async () => {
    const db = stubDb([row]);

    const saved = await createMeasurementStore(db).insert({
      device_id: "esp32-1",
      sensor: "temp",
      value: 21.5,
      ts,
    });

    expect(saved).toEqual(row);
    const [sql, values] = db.query.mock.calls[0];
    expect(sql).toContain("INSERT INTO measurement (device_id, sensor, value, ts)");
    expect(sql).toContain("VALUES ($1, $2, $3, $4)");
    expect(sql).toContain(
      `RETURNING id, device_id, sensor, value, to_char(ts AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.US"Z"') AS ts`,
    );
    expect(values).toEqual(["esp32-1", "temp", 21.5, ts]);
  });

  it("selects in id order up to the limit", async () => {
    const db = stubDb([row, { ...row, id: 2, value: 22, ts: "2024-01-01T00:00:01.000000Z" }]);

    const listed = await createMeasurementStore(db).list(100);

    expect(listed.map((m) => m.id)).toEqual([1, 2]);
    expect(listed[1].ts).toBe("2024-01-01T00:00:01Z");
    const [sql, values] = db.query.mock.calls[0];
    expect(sql).toContain("FROM measurement");
    expect(sql).toContain("ORDER BY id ASC");
    expect(sql).toContain("LIMIT $1");
    expect(values).toEqual([100]);
  });

  it("wraps driver failures in a StoreError with the cause attached", async () => {
    const cause = new Error("connection terminated");
    const store = createMeasurementStore(failingDb(cause));

    const err = await store.list(10).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreError);
    if (err instanceof StoreError) {
      expect(err.message).toBe("Select from measurement failed");
      expect(err.cause).toBe(cause);
    }
  });

  it("treats an unexpected row shape as a store failure", async () => {
    const store = createMeasurementStore(stubDb([{ ...row, ts: "not a date" }]));

    await expect(
      store.insert({ device_id: "esp32-1", sensor: "temp", value: 21.5, ts }),
    ).rejects.toBeInstanceOf(StoreError);
  });
});

describe("hero store", () => {
  it("passes a null age through", async () => {
    const hero = { id: 3, name: "Deadpond", secret_name: "Dive Wilson", age: null };
    const db = stubDb([hero]);

    const saved = await createHeroStore(db).insert({
      name: "Deadpond",
      secret_name: "Dive Wilson",
      age: null,
    });

    expect(saved).toEqual(hero);
    const [sql, values] = db.query.mock.calls[0];
    expect(sql).toContain("INSERT INTO hero (name, secret_name, age)");
    expect(values).toEqual(["Deadpond", "Dive Wilson", null]);
  });
});

describe("schema bootstrap", () => {
  it("runs every create-if-absent statement in order", async () => {
    const db = stubDb([]);

    await ensureSchema(db);

    expect(db.query.mock.calls.map(([sql]) => sql)).toEqual([...SCHEMA_STATEMENTS]);
    expect(SCHEMA_STATEMENTS.every((sql) => sql.includes("IF NOT EXISTS"))).toBe(true);
  });

  it("stops at the first failing statement", async () => {
    const db = failingDb(new Error("permission denied"));

    await expect(ensureSchema(db)).rejects.toThrow("permission denied");
    expect(db.query).toHaveBeenCalledTimes(1);
  });
});

describe("pingDatabase", () => {
  it("issues SELECT 1", async () => {
    const db = stubDb([{ "?column?": 1 }]);

    await pingDatabase(db);

    expect(db.query).toHaveBeenCalledWith("SELECT 1");
  });
});
