import type {
  BackoffSettings,
  GenerationRequest,
  GenerationResult,
  GenerationSettings,
  RemoteGenerationResult,
} from "../types/index.js";
import { generateId } from "../utils/id.js";
import type { CompletionBackend, CompletionResponse } from "./backend.js";
import {
  RemoteHttpError,
  RemoteTimeoutError,
  UnusableResponseError,
  classifyRemoteError,
  errorMessage,
} from "./errors.js";
import { generateFallback } from "./fallback.js";

export interface ClientLogger {
  warning(message: string): void;
  debug(message: string): void;
}

export interface ClientDependencies {
  sleep?: (ms: number) => Promise<void>;
  /** Monotonic milliseconds, used for durations. */
  now?: () => number;
  /** Uniform in [0, 1), used for backoff jitter. */
  random?: () => number;
  /** Wall clock for result timestamps. */
  clock?: () => Date;
  logger?: ClientLogger;
}

export interface GenerationClientOptions {
  /** null when no endpoint is configured; every request then falls back. */
  backend: CompletionBackend | null;
  generation: GenerationSettings;
  backoff: BackoffSettings;
  currency?: string;
}

export interface GenerateOverrides {
  timeoutMs?: number;
  maxRetries?: number;
}

export const NOT_CONFIGURED_NOTE = "Remote endpoint not configured";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the retry numbered `retryNumber` (1 = before the second
 * attempt): exponential, jittered, capped at maxDelayMs. A server-sent
 * Retry-After raises the delay, still under the cap.
 */
export function computeBackoffDelay(
  retryNumber: number,
  settings: BackoffSettings,
  random: () => number,
  retryAfterMs?: number
): number {
  const exponential = Math.min(
    settings.maxDelayMs,
    settings.baseDelayMs * settings.factor ** Math.max(0, retryNumber - 1)
  );
  const jitterFactor = 1 + settings.jitter * (2 * random() - 1);
  let delay = Math.min(settings.maxDelayMs, Math.round(exponential * jitterFactor));
  if (retryAfterMs !== undefined) {
    delay = Math.min(settings.maxDelayMs, Math.max(delay, retryAfterMs));
  }
  return Math.max(0, delay);
}

/** Returns the trimmed completion, or throws UnusableResponseError. */
export function validateCompletion(text: string, minLength: number): string {
  const trimmed = text.trim();
  if (trimmed === "") {
    throw new UnusableResponseError("empty completion");
  }
  if (trimmed.length < minLength) {
    throw new UnusableResponseError(
      `completion has ${trimmed.length} characters, fewer than ${minLength}`
    );
  }
  if (!/\p{L}/u.test(trimmed)) {
    throw new UnusableResponseError("completion contains no alphabetic characters");
  }
  return trimmed;
}

export class GenerationClient {
  private backend: CompletionBackend | null;
  private generation: GenerationSettings;
  private backoff: BackoffSettings;
  readonly currency?: string;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private random: () => number;
  private clock: () => Date;
  private logger?: ClientLogger;

  constructor(options: GenerationClientOptions, deps: ClientDependencies = {}) {
    this.backend = options.backend;
    this.generation = options.generation;
    this.backoff = options.backoff;
    this.currency = options.currency;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => performance.now());
    this.random = deps.random ?? Math.random;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;
  }

  get isRemoteConfigured(): boolean {
    return this.backend !== null;
  }

  /**
   * Never rejects for a remote failure: terminal errors and exhausted
   * attempts come back as a fallback result carrying the last error.
   */
  async generate(
    request: GenerationRequest,
    prompt: string,
    overrides: GenerateOverrides = {}
  ): Promise<GenerationResult> {
    const started = this.now();
    const maxRetries = Math.max(1, Math.floor(overrides.maxRetries ?? this.generation.maxRetries));
    const timeoutMs = overrides.timeoutMs ?? this.generation.timeoutMs;
    const backend = this.backend;

    if (!backend) {
      return this.fallback(request, NOT_CONFIGURED_NOTE, 0, started);
    }

    let lastError: unknown;
    let attempts = 0;
    let terminal = false;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      if (attempt > 1) {
        const retryAfterMs = lastError instanceof RemoteHttpError ? lastError.retryAfterMs : undefined;
        const delay = computeBackoffDelay(attempt - 1, this.backoff, this.random, retryAfterMs);
        this.logger?.debug(`Waiting ${delay}ms before attempt ${attempt}/${maxRetries}`);
        await this.sleep(delay);
      }

      attempts = attempt;
      try {
        const response = await this.attempt(backend, prompt, timeoutMs);
        const text = validateCompletion(response.text, this.generation.minResponseLength);
        const result: RemoteGenerationResult = {
          id: generateId(),
          text,
          source: "remote",
          model: response.model,
          durationMs: Math.round(this.now() - started),
          attempts,
          request,
          createdAt: this.clock().toISOString(),
        };
        return Object.freeze(result);
      } catch (error) {
        lastError = error;
        const failure = classifyRemoteError(error);
        this.logger?.warning(`Attempt ${attempt}/${maxRetries} failed (${failure}): ${errorMessage(error)}`);
        if (failure === "terminal") {
          terminal = true;
          break;
        }
      }
    }

    const note = terminal
      ? `${errorMessage(lastError)} (not retried)`
      : `${errorMessage(lastError)} (gave up after ${attempts} attempts)`;
    return this.fallback(request, note, attempts, started);
  }

  private async attempt(
    backend: CompletionBackend,
    prompt: string,
    timeoutMs: number
  ): Promise<CompletionResponse> {
    const controller = new AbortController();
    const timeoutError = new RemoteTimeoutError(timeoutMs);
    let timer: ReturnType<typeof setTimeout> | undefined;

    // Enforced here as well as through the signal, for backends that ignore it.
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort(timeoutError);
        reject(timeoutError);
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        backend.complete({
          prompt,
          maxTokens: this.generation.maxTokens,
          temperature: this.generation.temperature,
          topP: this.generation.topP,
          signal: controller.signal,
        }),
        timedOut,
      ]);
    } catch (error) {
      if (controller.signal.aborted) throw timeoutError;
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private fallback(
    request: GenerationRequest,
    errorNote: string,
    attempts: number,
    started: number
  ): GenerationResult {
    return generateFallback(request, errorNote, {
      currency: this.currency,
      attempts,
      durationMs: Math.round(this.now() - started),
      now: this.clock,
    });
  }
}
