import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import {
  MalformedResponseError,
  RemoteError,
  RemoteHttpError,
  RemoteNetworkError,
  RemoteTimeoutError,
} from "./errors.js";

export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  signal: AbortSignal;
}

export interface CompletionResponse {
  text: string;
  model: string;
}

/**
 * A remote text-generation endpoint. Implementations throw the RemoteError
 * subclasses from ./errors so the client can tell transient from terminal
 * failures.
 */
export interface CompletionBackend {
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/** The slice of the OpenAI SDK the backend calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; maxRetries?: number }
      ): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIBackendOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  client?: ChatClient;
}

const SYSTEM_PROMPT =
  "You are an expert e-commerce copywriter. You write clear, persuasive, benefit-focused marketing copy for products.";

const RETRY_AFTER_CAP_MS = 120_000;

function parseRetryAfter(headers: APIError["headers"]): number | undefined {
  const msRaw = headers?.["retry-after-ms"];
  if (msRaw) {
    const ms = Number.parseInt(msRaw, 10);
    if (Number.isFinite(ms) && ms > 0) return Math.min(ms, RETRY_AFTER_CAP_MS);
  }
  const secRaw = headers?.["retry-after"];
  if (secRaw) {
    const sec = Number.parseFloat(secRaw);
    if (Number.isFinite(sec) && sec > 0) return Math.min(Math.ceil(sec * 1000), RETRY_AFTER_CAP_MS);
  }
  return undefined;
}

/** Maps an OpenAI SDK error onto the remote error taxonomy. */
export function toRemoteError(error: unknown): unknown {
  if (error instanceof RemoteError) return error;
  // Timeout and abort extend the connection/API errors, so they go first.
  if (error instanceof APIConnectionTimeoutError) {
    return new RemoteTimeoutError();
  }
  if (error instanceof APIUserAbortError) {
    return new RemoteNetworkError("request aborted", { cause: error });
  }
  if (error instanceof APIConnectionError) {
    return new RemoteNetworkError(error.message, { cause: error });
  }
  if (error instanceof APIError) {
    if (typeof error.status === "number") {
      return new RemoteHttpError(error.status, error.message, parseRetryAfter(error.headers));
    }
    return new RemoteNetworkError(error.message, { cause: error });
  }
  return error;
}

export class OpenAIBackend implements CompletionBackend {
  readonly model: string;
  private client: ChatClient;

  constructor(options: OpenAIBackendOptions) {
    this.model = options.model;
    // Retries and timeouts belong to GenerationClient, not the SDK.
    this.client =
      options.client ??
      new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: SYSTEM_PROMPT },
            { role: "user", content: request.prompt },
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          top_p: request.topP,
        },
        { signal: request.signal, maxRetries: 0 }
      );
    } catch (error) {
      throw toRemoteError(error);
    }

    const choice = completion.choices?.[0];
    if (!choice) {
      throw new MalformedResponseError("completion has no choices");
    }
    const content = choice.message?.content;
    if (typeof content !== "string") {
      throw new MalformedResponseError("completion has no text content");
    }

    return { text: content, model: completion.model || this.model };
  }
}
