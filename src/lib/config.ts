import { existsSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { CONTENT_TYPES, LANGUAGES, TONES } from "../types/index.js";
import { ensureDir, getConfigPath } from "../utils/paths.js";
import { DEFAULT_ANALYTICS_SETTINGS } from "./analytics.js";
import { ConfigError, errorMessage } from "./errors.js";

const nonNegative = z.number().finite().nonnegative();

export const ConfigSchema = z.object({
  generation: z.object({
    maxRetries: z.number().int().min(1).max(10),
    timeoutMs: z.number().int().positive(),
    minResponseLength: z.number().int().min(1),
    maxTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(2),
    topP: z.number().gt(0).max(1),
  }),
  backoff: z.object({
    baseDelayMs: nonNegative,
    factor: z.number().min(1),
    maxDelayMs: nonNegative,
    jitter: z.number().min(0).max(1),
  }),
  analytics: z.object({
    minutesSavedPerPiece: nonNegative,
    costSavedPerPiece: nonNegative,
    hourlyWriterRate: nonNegative,
    aiCostPerPiece: nonNegative,
  }),
  currency: z.string().regex(/^[A-Z]{3}$/, "must be a three-letter ISO 4217 code"),
  catalogPath: z.string().min(1),
  reportsDir: z.string().min(1),
  defaults: z.object({
    contentType: z.enum(CONTENT_TYPES),
    tone: z.enum(TONES),
    language: z.enum(LANGUAGES),
  }),
  endpoint: z.object({
    baseURL: z.string().url(),
    model: z.string().min(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

const FileConfigSchema = ConfigSchema.deepPartial();

export const DEFAULT_CONFIG: Config = {
  generation: {
    maxRetries: 2,
    timeoutMs: 15_000,
    minResponseLength: 20,
    maxTokens: 300,
    temperature: 0.7,
    topP: 0.9,
  },
  backoff: {
    baseDelayMs: 1_000,
    factor: 2,
    maxDelayMs: 8_000,
    jitter: 0.25,
  },
  analytics: { ...DEFAULT_ANALYTICS_SETTINGS },
  currency: "EUR",
  catalogPath: "data/products.csv",
  reportsDir: "reports",
  defaults: {
    contentType: "description",
    tone: "professional",
    language: "english",
  },
  endpoint: {
    baseURL: "https://router.huggingface.co/v1",
    model: "mistralai/Mistral-7B-Instruct-v0.2",
  },
};

export type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function leafKeys(value: unknown, prefix = ""): string[] {
  if (!isRecord(value)) return [prefix];
  return Object.entries(value).flatMap(([key, child]) =>
    leafKeys(child, prefix ? `${prefix}.${key}` : key)
  );
}

/** Dotted keys accepted by `setConfigValue`. */
export const CONFIG_KEYS: readonly string[] = leafKeys(DEFAULT_CONFIG);

function validateConfig(candidate: unknown, source: string): Config {
  const result = ConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration (${source}): ${issues}`);
  }
  return result.data;
}

/** Defaults overlaid with the config file, without environment overrides. */
export function readFileConfig(path: string = getConfigPath()): Config {
  if (!existsSync(path)) {
    return structuredClone(DEFAULT_CONFIG);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration (${path}): ${issues}`);
  }
  const file = parsed.data;

  return validateConfig(
    {
      ...DEFAULT_CONFIG,
      ...file,
      generation: { ...DEFAULT_CONFIG.generation, ...file.generation },
      backoff: { ...DEFAULT_CONFIG.backoff, ...file.backoff },
      analytics: { ...DEFAULT_CONFIG.analytics, ...file.analytics },
      defaults: { ...DEFAULT_CONFIG.defaults, ...file.defaults },
      endpoint: { ...DEFAULT_CONFIG.endpoint, ...file.endpoint },
    },
    path
  );
}

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  return raw ? Number(raw) : undefined;
}

export function applyEnvOverrides(config: Config, env: Env): Config {
  const maxRetries = envNumber(env, "INFERENCE_MAX_RETRIES");
  const timeoutMs = envNumber(env, "INFERENCE_TIMEOUT_MS");

  return validateConfig(
    {
      ...config,
      catalogPath: env.CATALOG_PATH?.trim() || config.catalogPath,
      generation: {
        ...config.generation,
        ...(maxRetries === undefined ? {} : { maxRetries }),
        ...(timeoutMs === undefined ? {} : { timeoutMs }),
      },
      endpoint: {
        baseURL: env.INFERENCE_BASE_URL?.trim() || config.endpoint.baseURL,
        model: env.INFERENCE_MODEL?.trim() || config.endpoint.model,
      },
    },
    "environment"
  );
}

export interface LoadConfigOptions {
  path?: string;
  env?: Env;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return applyEnvOverrides(readFileConfig(options.path), options.env ?? process.env);
}

/** The bearer token is only ever taken from the environment. */
export function resolveApiKey(env: Env = process.env): string | undefined {
  return env.INFERENCE_API_KEY?.trim() || env.HF_TOKEN?.trim() || undefined;
}

export function saveConfig(config: Config, path: string = getConfigPath()): void {
  ensureDir(dirname(path));
  writeFileSync(path, JSON.stringify(config, null, 2));
}

export function setConfigValue(key: string, value: string, path: string = getConfigPath()): Config {
  if (!CONFIG_KEYS.includes(key)) {
    throw new ConfigError(`Invalid config key: ${key}. Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }

  const draft: unknown = structuredClone(readFileConfig(path));
  const parts = key.split(".");
  const leaf = parts.pop();
  let target: unknown = draft;
  for (const part of parts) {
    target = isRecord(target) ? target[part] : undefined;
  }
  if (!isRecord(target) || leaf === undefined) {
    throw new ConfigError(`Invalid config key: ${key}`);
  }

  target[leaf] = typeof target[leaf] === "number" ? Number(value) : value;

  const config = validateConfig(draft, key);
  saveConfig(config, path);
  return config;
}

export function resetConfig(path: string = getConfigPath()): Config {
  const config = structuredClone(DEFAULT_CONFIG);
  saveConfig(config, path);
  return config;
}
