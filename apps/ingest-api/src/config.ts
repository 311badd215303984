import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export type Env = Record<string, string | undefined>;

/**
 * Immutable connection descriptor, resolved once at startup and shared by
 * every request through the pool built from it.
 */
export interface DatabaseSettings {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly database: string;
  readonly password: string;
  readonly connectionString: string;
}

export interface AppConfig {
  readonly port: number;
  readonly logLevel: string;
  readonly nodeEnv: string;
  readonly poolMax: number;
  readonly rateLimitPerMinute: number;
  readonly bodyLimit: string;
  readonly database: DatabaseSettings;
}

export type DatabaseEnvResult =
  | { ok: true; settings: DatabaseSettings }
  | { ok: false; error: ConfigurationError };

const required = () => z.string({ required_error: "is required" }).trim().min(1, "must not be empty");

const databaseEnvSchema = z
  .object({
    POSTGRES_SERVER: required(),
    POSTGRES_PORT: z.coerce.number().int().min(1).max(65_535).default(5432),
    POSTGRES_USER: required(),
    POSTGRES_DB: required(),
    POSTGRES_PASSWORD: z.string().optional(),
    POSTGRES_PASSWORD_FILE: z.string().optional(),
  })
  .refine(
    (env) => env.POSTGRES_PASSWORD !== undefined || env.POSTGRES_PASSWORD_FILE !== undefined,
    { message: "At least one of POSTGRES_PASSWORD_FILE and POSTGRES_PASSWORD must be set." },
  );

// Docker secrets end with a newline; the file content is trimmed.
function readPasswordFile(path: string): string {
  if (!existsSync(path)) {
    throw new ConfigurationError([`Password file ${path} does not exist.`]);
  }
  try {
    return readFileSync(path, "utf8").trim();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError([`Password file ${path} could not be read: ${reason}`]);
  }
}

export function buildConnectionString(
  settings: Pick<DatabaseSettings, "host" | "port" | "user" | "database" | "password">,
): string {
  const user = encodeURIComponent(settings.user);
  const password = encodeURIComponent(settings.password);
  return `postgresql://${user}:${password}@${settings.host}:${settings.port}/${settings.database}`;
}

/**
 * Validates the raw environment and resolves the effective password.
 * A non-empty POSTGRES_PASSWORD wins over POSTGRES_PASSWORD_FILE, but a
 * given file path must still point at a readable file.
 */
export function validateDatabaseEnv(env: Env): DatabaseEnvResult {
  const parsed = databaseEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return { ok: false, error: new ConfigurationError(issues) };
  }

  const vars = parsed.data;
  let filePassword: string | undefined;
  if (vars.POSTGRES_PASSWORD_FILE !== undefined) {
    try {
      filePassword = readPasswordFile(vars.POSTGRES_PASSWORD_FILE);
    } catch (err) {
      if (err instanceof ConfigurationError) return { ok: false, error: err };
      throw err;
    }
  }

  const password = vars.POSTGRES_PASSWORD || filePassword || "";
  const base = {
    host: vars.POSTGRES_SERVER,
    port: vars.POSTGRES_PORT,
    user: vars.POSTGRES_USER,
    database: vars.POSTGRES_DB,
    password,
  };

  return {
    ok: true,
    settings: Object.freeze({ ...base, connectionString: buildConnectionString(base) }),
  };
}

export function loadDatabaseSettings(env: Env): DatabaseSettings {
  const result = validateDatabaseEnv(env);
  if (!result.ok) throw result.error;
  return result.settings;
}

const serviceEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  NODE_ENV: z.string().default("development"),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(5_000),
  BODY_LIMIT: z.string().min(1).default("100kb"),
});

export function loadConfig(env: Env): AppConfig {
  const database = loadDatabaseSettings(env);

  const parsed = serviceEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    nodeEnv: vars.NODE_ENV,
    poolMax: vars.PG_POOL_MAX,
    rateLimitPerMinute: vars.RATE_LIMIT_PER_MINUTE,
    bodyLimit: vars.BODY_LIMIT,
    database,
  });
}
