import { z } from "zod";

const DEV_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:5173",
  "http://localhost:5174",
  "http://localhost:8080",
];

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  ALLOWED_ORIGINS: z.string().optional(),
  MODEL_API_KEY: z.string().optional(),
  MODEL_NAME: z.string().min(1).default("gemini-2.5-flash"),
  MODEL_ENDPOINT: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GENERATION_LOG_LIMIT: z.coerce.number().int().positive().default(100),
});

export interface ModelConfig {
  apiKey: string | undefined;
  model: string;
  endpoint: string;
  timeoutMs: number;
}

export interface AppConfig {
  port: number;
  env: "development" | "test" | "production";
  allowedOrigins: string[];
  model: ModelConfig;
  generationLogLimit: number;
}

function getAllowedOrigins(raw: string | undefined, env: AppConfig["env"]): string[] {
  if (raw) {
    return raw.split(",").map(s => s.trim()).filter(Boolean);
  }
  if (env === "development") {
    return DEV_ORIGINS;
  }
  return [];
}

/**
 * Reads and validates configuration from the environment.
 * Throws with every offending variable listed when something is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${errors.join(", ")}`);
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    env: vars.NODE_ENV,
    allowedOrigins: getAllowedOrigins(vars.ALLOWED_ORIGINS, vars.NODE_ENV),
    model: {
      // An empty MODEL_API_KEY= line in .env means "not configured"
      apiKey: vars.MODEL_API_KEY || undefined,
      model: vars.MODEL_NAME,
      endpoint: vars.MODEL_ENDPOINT.replace(/\/+$/, ""),
      timeoutMs: vars.MODEL_TIMEOUT_MS,
    },
    generationLogLimit: vars.GENERATION_LOG_LIMIT,
  };
}
