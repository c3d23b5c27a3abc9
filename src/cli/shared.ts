import { resolve } from "path";
import type { GenerationRequest, Product } from "../types/index.js";
import { CONTENT_TYPES, LANGUAGES, TONES } from "../types/index.js";
import { type AnalyticsSession, createAnalyticsSession } from "../lib/analytics.js";
import { findProduct, loadCatalog } from "../lib/catalog.js";
import { type Config, loadConfig, resolveApiKey } from "../lib/config.js";
import { errorMessage } from "../lib/errors.js";
import { type Pipeline, createGenerationClient, createPipeline } from "../lib/pipeline.js";
import { logger } from "../utils/logger.js";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseChoice<T extends string>(value: string, allowed: readonly T[], label: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new UsageError(`Invalid ${label}: ${value}. Valid values: ${allowed.join(", ")}`);
  }
  return match;
}

export function parseInteger(value: string, label: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new UsageError(`Invalid ${label}: ${value}. Expected an integer of at least ${min}`);
  }
  return parsed;
}

export interface SelectorOptions {
  type?: string;
  tone?: string;
  language?: string;
  catalog?: string;
}

export interface RuntimeOptions extends SelectorOptions {
  maxRetries?: string;
  timeout?: string;
  offline?: boolean;
  /** Keeps stdout to the JSON document: no warnings, no attempt logging. */
  json?: boolean;
}

export function buildRequest(product: Product, options: SelectorOptions, config: Config): GenerationRequest {
  return {
    product,
    contentType: parseChoice(options.type ?? config.defaults.contentType, CONTENT_TYPES, "content type"),
    tone: parseChoice(options.tone ?? config.defaults.tone, TONES, "tone"),
    language: parseChoice(options.language ?? config.defaults.language, LANGUAGES, "language"),
  };
}

export function loadProducts(options: SelectorOptions, config: Config): Product[] {
  return loadCatalog(resolve(options.catalog ?? config.catalogPath));
}

export function requireProduct(products: readonly Product[], id: string): Product {
  const product = findProduct(products, id);
  if (!product) {
    throw new UsageError(
      `Product not found: ${id}. Available: ${products.map((p) => p.id).join(", ")}`
    );
  }
  return product;
}

export interface CommandContext {
  config: Config;
  session: AnalyticsSession;
  pipeline: Pipeline;
}

export function createContext(options: RuntimeOptions): CommandContext {
  const config = loadConfig();
  if (options.maxRetries !== undefined) {
    config.generation.maxRetries = parseInteger(options.maxRetries, "max retries", 1);
  }
  if (options.timeout !== undefined) {
    config.generation.timeoutMs = parseInteger(options.timeout, "timeout", 1);
  }

  const apiKey = resolveApiKey();
  if (!apiKey && !options.offline && !options.json) {
    logger.warning("INFERENCE_API_KEY is not set; copy will come from the built-in templates");
  }

  const client = createGenerationClient(config, {
    apiKey,
    offline: options.offline,
    deps: options.json ? {} : { logger },
  });
  const session = createAnalyticsSession(config.analytics);
  return {
    config,
    session,
    pipeline: createPipeline({ client, session }),
  };
}

export function fail(error: unknown): never {
  logger.stopSpinner();
  logger.error(errorMessage(error));
  process.exit(1);
}
