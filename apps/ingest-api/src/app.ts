import express, { Express, Request, Response, NextFunction } from "express";
import compression from "compression";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { randomUUID } from "crypto";
import type { ErrorBody } from "@sensor-ingest/types";
import { ValidationError } from "./errors";
import type { Logger } from "./logger";
import { createRouter } from "./routes";
import type { HeroStore, MeasurementStore } from "./store";

/**
 * Everything a request needs, built once at startup and read-only after.
 * Tests swap the stores and the probe for in-process fakes.
 */
export interface AppContext {
  logger: Logger;
  measurements: MeasurementStore;
  heroes: HeroStore;
  ping: () => Promise<void>;
  now: () => Date;
}

export interface AppOptions {
  bodyLimit?: string;
  rateLimitPerMinute?: number;
}

// body-parser errors carry an HTTP status and a `type` tag
interface HttpClientError {
  status: number;
  type?: string;
  message: string;
}

function isHttpClientError(err: unknown): err is HttpClientError {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}

export function createApp(ctx: AppContext, options: AppOptions = {}): Express {
  const app = express();

  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: options.bodyLimit ?? "100kb" }));

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: options.rateLimitPerMinute ?? 5_000,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // Request id + request logger
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get("x-request-id") || randomUUID();
    const start = process.hrtime.bigint();
    res.setHeader("x-request-id", requestId);
    res.on("finish", () => {
      ctx.logger.info({
        requestId,
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Number(process.hrtime.bigint() - start) / 1_000_000,
      });
    });
    next();
  });

  app.use(createRouter(ctx));

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      const body: ErrorBody = { error: err.message, details: err.issues };
      res.status(422).json(body);
      return;
    }

    if (isHttpClientError(err)) {
      if (err.type === "entity.parse.failed") {
        const body: ErrorBody = {
          error: "Validation failed",
          details: [{ location: "body", field: "", message: "Malformed JSON body" }],
        };
        res.status(422).json(body);
        return;
      }
      const body: ErrorBody = { error: err.message };
      res.status(err.status).json(body);
      return;
    }

    ctx.logger.error({ err }, "Unhandled error");
    const body: ErrorBody = { error: "Internal server error" };
    res.status(500).json(body);
  });

  return app;
}
