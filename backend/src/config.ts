import path from "node:path";
import { z } from "zod";
import { ConfigMissingError } from "./errors.js";

export const DEFAULT_FROM_EMAIL = "Kindle Highlights <onboarding@resend.dev>";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

function isKnownTimeZone(value: string | undefined): boolean {
  if (!value) {
    return true;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
  DATA_DIR: z.string().min(1).default("data"),
  HIGHLIGHTS_FILE: z.string().min(1).default("highlights.json"),
  HIGHLIGHTS_COUNT: z.coerce.number().int().min(0).default(5),
  TO_EMAIL: optionalString,
  FROM_EMAIL: optionalString,
  DIGEST_TIME_ZONE: optionalString.refine(isKnownTimeZone, { message: "Unknown time zone." }),
  CLIPPINGS_FILE: optionalString,
  IMPORT_DRY_RUN: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => value === "true"),
  RESEND_API_KEY: optionalString,
  CLASSIFIER_PROVIDER: z.enum(["anthropic", "gemini", "openrouter"]).default("anthropic"),
  CLASSIFIER_MODEL: optionalString,
  CLASSIFIER_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.3),
  ANTHROPIC_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  OPENROUTER_API_KEY: optionalString,
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  NODE_ENV: optionalString
});

export type Provider = z.infer<typeof envSchema>["CLASSIFIER_PROVIDER"];

export type AppConfig = {
  port: number;
  storePath: string;
  highlightsCount: number;
  toEmail?: string;
  fromEmail: string;
  timeZone?: string;
  clippingsFile?: string;
  importDryRun: boolean;
  resendApiKey?: string;
  classifier: {
    provider: Provider;
    model?: string;
    minConfidence: number;
    apiKeys: Record<Provider, string | undefined>;
  };
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
  maxUploadBytes: number;
  pretty: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const dataDir = path.resolve(process.cwd(), parsed.DATA_DIR);

  return {
    port: parsed.PORT,
    storePath: path.resolve(dataDir, parsed.HIGHLIGHTS_FILE),
    highlightsCount: parsed.HIGHLIGHTS_COUNT,
    toEmail: parsed.TO_EMAIL,
    fromEmail: parsed.FROM_EMAIL ?? DEFAULT_FROM_EMAIL,
    timeZone: parsed.DIGEST_TIME_ZONE,
    importDryRun: parsed.IMPORT_DRY_RUN,
    clippingsFile: parsed.CLIPPINGS_FILE ? path.resolve(process.cwd(), parsed.CLIPPINGS_FILE) : undefined,
    resendApiKey: parsed.RESEND_API_KEY,
    classifier: {
      provider: parsed.CLASSIFIER_PROVIDER,
      model: parsed.CLASSIFIER_MODEL,
      minConfidence: parsed.CLASSIFIER_MIN_CONFIDENCE,
      apiKeys: {
        anthropic: parsed.ANTHROPIC_API_KEY,
        gemini: parsed.GEMINI_API_KEY,
        openrouter: parsed.OPENROUTER_API_KEY
      }
    },
    logLevel: parsed.LOG_LEVEL,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    pretty: parsed.NODE_ENV !== "production"
  };
}

export function requireValue(key: string, value: string | undefined): string {
  if (!value?.trim()) {
    throw new ConfigMissingError(key);
  }
  return value.trim();
}
