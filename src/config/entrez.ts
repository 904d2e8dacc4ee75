import dotenv from "dotenv";
import { z } from "zod";
import {
  DEFAULT_ENTREZ_BASE_URL,
  DEFAULT_MAX_CONCURRENT_REQUESTS,
  DEFAULT_TIMEOUT_MS,
  type EntrezClientOptions
} from "../entrez/client";
import { DEFAULT_RETRY_ATTEMPTS, DEFAULT_RETRY_DELAY_MS } from "../utils";

dotenv.config();

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const EnvSchema = z.object({
  ENTREZ_BASE_URL: z.string().url().default(DEFAULT_ENTREZ_BASE_URL),
  ENTREZ_API_KEY: optionalText,
  ENTREZ_TOOL: optionalText,
  ENTREZ_EMAIL: optionalText.refine((value) => value === undefined || z.string().email().safeParse(value).success, {
    message: "Invalid email"
  }),
  ENTREZ_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_RETRY_ATTEMPTS),
  ENTREZ_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(DEFAULT_RETRY_DELAY_MS),
  ENTREZ_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  ENTREZ_MAX_CONCURRENT_REQUESTS: z.coerce.number().int().positive().default(DEFAULT_MAX_CONCURRENT_REQUESTS),
  RESOLVE_CONCURRENCY: z.coerce.number().int().positive().default(1),
  PORT: z.coerce.number().int().positive().default(3000)
});

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
  }
  return result.data;
}

export function entrezClientOptions(config: AppConfig): EntrezClientOptions {
  return {
    baseUrl: config.ENTREZ_BASE_URL,
    apiKey: config.ENTREZ_API_KEY,
    tool: config.ENTREZ_TOOL,
    email: config.ENTREZ_EMAIL,
    timeoutMs: config.ENTREZ_TIMEOUT_MS,
    maxConcurrentRequests: config.ENTREZ_MAX_CONCURRENT_REQUESTS,
    retry: {
      attempts: config.ENTREZ_RETRY_ATTEMPTS,
      delayMs: config.ENTREZ_RETRY_DELAY_MS
    }
  };
}
