import type { AnalyticsSnapshot, GenerationRequest, GenerationResult } from "../types/index.js";
import { type AnalyticsSession, record } from "./analytics.js";
import { type CompletionBackend, OpenAIBackend } from "./backend.js";
import { type ClientDependencies, type GenerateOverrides, GenerationClient } from "./client.js";
import type { Config } from "./config.js";
import { InvalidRequestError } from "./errors.js";
import { buildPrompt } from "./prompts.js";
import { getRecommendation } from "./recommendations.js";

export interface Generation {
  result: GenerationResult;
  snapshot: AnalyticsSnapshot;
  recommendation: string;
}

export type BatchOutcome =
  | ({ ok: true } & Generation)
  | { ok: false; request: GenerationRequest; error: InvalidRequestError };

export interface BatchOptions extends GenerateOverrides {
  concurrency?: number;
  onProgress?: (completed: number, total: number, outcome: BatchOutcome) => void;
}

export interface PipelineOptions {
  /** Also supplies the currency, so prompt and fallback price agree. */
  client: GenerationClient;
  session: AnalyticsSession;
}

export interface Pipeline {
  readonly client: GenerationClient;
  readonly session: AnalyticsSession;
  generate(request: GenerationRequest, overrides?: GenerateOverrides): Promise<Generation>;
  generateBatch(requests: readonly GenerationRequest[], options?: BatchOptions): Promise<BatchOutcome[]>;
}

export const DEFAULT_CONCURRENCY = 3;

export function createPipeline(options: PipelineOptions): Pipeline {
  const { client, session } = options;

  const generate = async (
    request: GenerationRequest,
    overrides: GenerateOverrides = {}
  ): Promise<Generation> => {
    // Throws InvalidRequestError before anything goes over the network.
    const prompt = buildPrompt(request, { currency: client.currency });
    const result = await client.generate(request, prompt, overrides);
    const snapshot = record(session, result);
    return {
      result,
      snapshot,
      recommendation: getRecommendation(request.contentType, request.tone),
    };
  };

  const generateBatch = async (
    requests: readonly GenerationRequest[],
    batchOptions: BatchOptions = {}
  ): Promise<BatchOutcome[]> => {
    const { concurrency = DEFAULT_CONCURRENCY, onProgress, ...overrides } = batchOptions;
    const outcomes: BatchOutcome[] = new Array(requests.length);
    const queue = requests.map((request, index) => ({ request, index }));
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (queue.length > 0) {
        const item = queue.shift();
        if (!item) break;

        let outcome: BatchOutcome;
        try {
          outcome = { ok: true, ...(await generate(item.request, overrides)) };
        } catch (error) {
          if (!(error instanceof InvalidRequestError)) throw error;
          outcome = { ok: false, request: item.request, error };
        }
        outcomes[item.index] = outcome;
        completed++;
        onProgress?.(completed, requests.length, outcome);
      }
    };

    const limit = Number.isFinite(concurrency) ? Math.floor(concurrency) : DEFAULT_CONCURRENCY;
    const workers = Math.max(1, Math.min(limit, requests.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));
    return outcomes;
  };

  return { client, session, generate, generateBatch };
}

export interface ClientFactoryOptions {
  apiKey?: string;
  /** Skip the remote endpoint; every request uses the fallback templates. */
  offline?: boolean;
  /** Replaces the OpenAI backend, e.g. with an in-process fake. */
  backend?: CompletionBackend | null;
  deps?: ClientDependencies;
}

export function createGenerationClient(config: Config, options: ClientFactoryOptions = {}): GenerationClient {
  let backend: CompletionBackend | null = null;
  if (!options.offline) {
    if (options.backend !== undefined) {
      backend = options.backend;
    } else if (options.apiKey) {
      backend = new OpenAIBackend({
        apiKey: options.apiKey,
        baseURL: config.endpoint.baseURL,
        model: config.endpoint.model,
      });
    }
  }

  return new GenerationClient(
    {
      backend,
      generation: config.generation,
      backoff: config.backoff,
      currency: config.currency,
    },
    options.deps
  );
}
