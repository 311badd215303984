import { Router } from "express";
import { z } from "zod";
import type { HealthStatus } from "@sensor-ingest/types";
import type { AppContext } from "./app";
import type { RecordStore } from "./store";
import {
  heroInputSchema,
  listQuerySchema,
  measurementInputSchema,
  parseOrThrow,
} from "./validation";

export const GREETING = "Hello, Docker-iot-World!";

interface RecordRouterOptions<TInput, TDraft, TRecord> {
  store: RecordStore<TDraft, TRecord>;
  input: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  toDraft: (input: TInput) => TDraft;
}

// POST / → validate, resolve server-owned fields, insert, return the row
// GET  /?limit=N → bounded list, 1 ≤ N ≤ 1000, default 100
export function recordRouter<TInput, TDraft, TRecord>(
  options: RecordRouterOptions<TInput, TDraft, TRecord>,
): Router {
  const router = Router();

  router.post("/", async (req, res, next) => {
    try {
      const input = parseOrThrow(options.input, req.body, "body");
      const record = await options.store.insert(options.toDraft(input));
      res.json(record);
    } catch (err) {
      next(err);
    }
  });

  router.get("/", async (req, res, next) => {
    try {
      const { limit } = parseOrThrow(listQuerySchema, req.query, "query");
      const records = await options.store.list(limit);
      res.json(records);
    } catch (err) {
      next(err);
    }
  });

  return router;
}

export function createRouter(ctx: AppContext): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json(GREETING);
  });

  router.get("/health", async (_req, res) => {
    let status: HealthStatus;
    try {
      await ctx.ping();
      status = { ok: true, services: { db: "ok" } };
    } catch (err) {
      ctx.logger.warn({ err }, "Health probe failed");
      status = { ok: false, services: { db: "down" } };
    }
    res.status(status.ok ? 200 : 503).json(status);
  });

  router.use(
    "/measurements",
    recordRouter({
      store: ctx.measurements,
      input: measurementInputSchema,
      // Client timestamp wins; otherwise the server clock fills the gap.
      toDraft: (m) => ({
        device_id: m.device_id,
        sensor: m.sensor,
        value: m.value,
        ts: m.ts ?? ctx.now().toISOString(),
      }),
    }),
  );

  router.use(
    "/heroes",
    recordRouter({
      store: ctx.heroes,
      input: heroInputSchema,
      toDraft: (h) => ({ name: h.name, secret_name: h.secret_name, age: h.age ?? null }),
    }),
  );

  return router;
}
