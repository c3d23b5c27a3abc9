import { describe, test, expect, vi } from "vitest";
import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { type ChatClient, type CompletionRequest, OpenAIBackend, toRemoteError } from "./backend.js";
import {
  MalformedResponseError,
  RemoteHttpError,
  RemoteNetworkError,
  RemoteTimeoutError,
} from "./errors.js";

function completion(content: string | null, choices = true): ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "served-model",
    choices: choices
      ? [
          {
            index: 0,
            finish_reason: "stop",
            logprobs: null,
            message: { role: "assistant", content, refusal: null },
          },
        ]
      : [],
  };
}

function fakeClient(respond: () => Promise<ChatCompletion>) {
  const create = vi.fn(
    (_body: ChatCompletionCreateParamsNonStreaming, _options?: { signal?: AbortSignal; maxRetries?: number }) =>
      respond()
  );
  const client: ChatClient = { chat: { completions: { create } } };
  return { client, create };
}

function completionRequest(): CompletionRequest {
  return {
    prompt: "Write copy for the Wool Scarf.",
    maxTokens: 300,
    temperature: 0.7,
    topP: 0.9,
    signal: new AbortController().signal,
  };
}

describe("OpenAIBackend", () => {
  test("sends a chat completion and returns its text", async () => {
    const { client, create } = fakeClient(async () => completion("A warm scarf for cold mornings."));
    const backend = new OpenAIBackend({
      apiKey: "test-secret",
      baseURL: "http://localhost:0/v1",
      model: "test-model",
      client,
    });
    const req = completionRequest();

    const response = await backend.complete(req);

    expect(response).toEqual({ text: "A warm scarf for cold mornings.", model: "served-model" });
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "test-model",
        max_tokens: 300,
        temperature: 0.7,
        top_p: 0.9,
      }),
      { signal: req.signal, maxRetries: 0 }
    );
    const body = create.mock.calls[0]?.[0];
    expect(body?.messages.at(-1)).toEqual({ role: "user", content: "Write copy for the Wool Scarf." });
  });

  test("rejects a completion without choices", async () => {
    const { client } = fakeClient(async () => completion("unused", false));
    const backend = new OpenAIBackend({ apiKey: "test-secret", baseURL: "http://localhost:0/v1", model: "m", client });

    await expect(backend.complete(completionRequest())).rejects.toThrow(
      "Malformed response: completion has no choices"
    );
  });

  test("rejects a completion without text content", async () => {
    const { client } = fakeClient(async () => completion(null));
    const backend = new OpenAIBackend({ apiKey: "test-secret", baseURL: "http://localhost:0/v1", model: "m", client });

    await expect(backend.complete(completionRequest())).rejects.toBeInstanceOf(MalformedResponseError);
  });

  test("maps SDK errors thrown by the client", async () => {
    const { client } = fakeClient(async () => {
      throw new APIError(503, undefined, "Service unavailable", {});
    });
    const backend = new OpenAIBackend({ apiKey: "test-secret", baseURL: "http://localhost:0/v1", model: "m", client });

    await expect(backend.complete(completionRequest())).rejects.toBeInstanceOf(RemoteHttpError);
  });
});

describe("toRemoteError", () => {
  test("keeps the HTTP status and reads Retry-After seconds", () => {
    const mapped = toRemoteError(new APIError(429, undefined, "Too many requests", { "retry-after": "3" }));
    expect(mapped).toBeInstanceOf(RemoteHttpError);
    if (mapped instanceof RemoteHttpError) {
      expect(mapped.status).toBe(429);
      expect(mapped.retryAfterMs).toBe(3000);
    }
  });

  test("prefers retry-after-ms", () => {
    const mapped = toRemoteError(
      new APIError(503, undefined, "Unavailable", { "retry-after-ms": "250", "retry-after": "9" })
    );
    expect(mapped instanceof RemoteHttpError && mapped.retryAfterMs).toBe(250);
  });

  test("maps a connection timeout to a timeout error", () => {
    expect(toRemoteError(new APIConnectionTimeoutError())).toBeInstanceOf(RemoteTimeoutError);
  });

  test("maps connection failures to network errors", () => {
    const mapped = toRemoteError(new APIConnectionError({ message: "socket hang up" }));
    expect(mapped).toBeInstanceOf(RemoteNetworkError);
    expect(mapped instanceof Error && mapped.message).toBe("Network error: socket hang up");
  });

  test("maps a user abort to a network error", () => {
    expect(toRemoteError(new APIUserAbortError())).toBeInstanceOf(RemoteNetworkError);
  });

  test("passes other errors through", () => {
    const error = new TypeError("boom");
    expect(toRemoteError(error)).toBe(error);
  });
});
