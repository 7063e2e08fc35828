import { z } from "zod";

// Environment-driven configuration. Everything the services need is read once
// here and passed down explicitly.

const DEFAULT_REQUIRED_ATTRIBUTES = ["aroma", "acidity", "body", "flavor", "aftertaste", "balance", "overall"];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const attributeList = z
  .string()
  .optional()
  .transform((value) =>
    value
      ? value
          .split(",")
          .map((name) => name.trim().toLowerCase())
          .filter(Boolean)
      : DEFAULT_REQUIRED_ATTRIBUTES,
  )
  .pipe(z.array(z.string().regex(/^[a-z][a-z_]*$/, "attribute names must be lowercase words")).min(1));

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    STORAGE_DRIVER: z.enum(["file", "postgres"]).default("file"),
    DATA_DIR: z.string().min(1).default("./data"),
    DATABASE_URL: optionalString,
    PG_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    LEGACY_DATA_FILE: optionalString,
    SHARE_ID_LENGTH: z.coerce.number().int().min(8).max(21).default(10),
    SHARE_ID_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(50).default(5),
    SCORE_MIN: z.coerce.number().default(0),
    SCORE_MAX: z.coerce.number().default(10),
    REQUIRED_ATTRIBUTES: attributeList,
    SHARE_URL_BASE: z.string().url().default("http://localhost:3000"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
    NODE_ENV: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "is required when STORAGE_DRIVER=postgres",
      });
    }
    if (env.SCORE_MIN >= env.SCORE_MAX) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["SCORE_MAX"], message: "must be greater than SCORE_MIN" });
    }
  });

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type ScoreBounds = {
  min: number;
  max: number;
};

export type AppConfig = {
  port: number;
  storage:
    | { driver: "file"; dataDir: string; legacyDataFile?: string }
    | { driver: "postgres"; databaseUrl: string; statementTimeoutMs: number; legacyDataFile?: string };
  shareId: {
    length: number;
    maxAttempts: number;
    urlBase: string;
  };
  scoring: {
    bounds: ScoreBounds;
    requiredAttributes: string[];
  };
  logLevel: LogLevel;
};

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`));
  }

  const values = parsed.data;
  const storage: AppConfig["storage"] =
    values.STORAGE_DRIVER === "postgres" && values.DATABASE_URL
      ? {
          driver: "postgres",
          databaseUrl: values.DATABASE_URL,
          statementTimeoutMs: values.PG_STATEMENT_TIMEOUT_MS,
          legacyDataFile: values.LEGACY_DATA_FILE,
        }
      : { driver: "file", dataDir: values.DATA_DIR, legacyDataFile: values.LEGACY_DATA_FILE };

  return {
    port: values.PORT,
    storage,
    shareId: {
      length: values.SHARE_ID_LENGTH,
      maxAttempts: values.SHARE_ID_MAX_ATTEMPTS,
      urlBase: values.SHARE_URL_BASE,
    },
    scoring: {
      bounds: { min: values.SCORE_MIN, max: values.SCORE_MAX },
      requiredAttributes: values.REQUIRED_ATTRIBUTES,
    },
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === "test" ? "silent" : "info"),
  };
}
