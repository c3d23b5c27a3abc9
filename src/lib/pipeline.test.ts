import { describe, test, expect, vi } from "vitest";
import type { GenerationRequest, Product } from "../types/index.js";
import { createAnalyticsSession, currentSnapshot } from "./analytics.js";
import type { CompletionBackend, CompletionRequest, CompletionResponse } from "./backend.js";
import { GenerationClient } from "./client.js";
import { DEFAULT_CONFIG } from "./config.js";
import { InvalidRequestError, RemoteHttpError } from "./errors.js";
import { createGenerationClient, createPipeline } from "./pipeline.js";

function product(id: string, name: string, features: string[] = ["sturdy"]): Product {
  return {
    id,
    name,
    category: "Kitchen",
    price: 20,
    attributes: { features, callToAction: "Shop now" },
  };
}

function request(p: Product): GenerationRequest {
  return { product: p, contentType: "description", tone: "professional", language: "english" };
}

/** Echoes the product name from the prompt after a per-call delay. */
class EchoBackend implements CompletionBackend {
  readonly model = "echo-model";
  calls = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(private delayFor: (prompt: string) => number = () => 5) {}

  async complete(req: CompletionRequest): Promise<CompletionResponse> {
    this.calls++;
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, this.delayFor(req.prompt)));
    this.inFlight--;
    const firstLine = req.prompt.split("\n")[0] ?? "";
    return { text: `Generated copy. ${firstLine}`, model: this.model };
  }
}

function setup(backend: CompletionBackend | null) {
  const client = new GenerationClient(
    { backend, generation: DEFAULT_CONFIG.generation, backoff: DEFAULT_CONFIG.backoff },
    { sleep: async () => {} }
  );
  const session = createAnalyticsSession();
  return { session, pipeline: createPipeline({ client, session }) };
}

describe("pipeline.generate", () => {
  test("returns the result, the updated snapshot and a recommendation", async () => {
    const { pipeline } = setup(new EchoBackend());

    const generation = await pipeline.generate(request(product("P001", "Wool Scarf")));

    expect(generation.result.source).toBe("remote");
    expect(generation.result.text).toContain("Wool Scarf");
    expect(generation.snapshot.piecesGenerated).toBe(1);
    expect(generation.snapshot.totalMinutesSaved).toBe(30);
    expect(generation.recommendation).toBe(
      "A professional tone suits product pages: it helps SEO and builds credibility with customers."
    );
  });

  test("rejects an invalid request before calling the backend", async () => {
    const backend = new EchoBackend();
    const { pipeline, session } = setup(backend);

    await expect(pipeline.generate(request(product("P002", "Bare Mug", [])))).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    expect(backend.calls).toBe(0);
    expect(currentSnapshot(session).piecesGenerated).toBe(0);
  });

  test("records fallback pieces when no backend is configured", async () => {
    const { pipeline } = setup(null);

    const generation = await pipeline.generate(request(product("P001", "Wool Scarf")));

    expect(generation.result.source).toBe("fallback");
    expect(generation.snapshot.fallbackPieces).toBe(1);
    expect(generation.snapshot.totalCostSaved).toBe(12);
  });
});

describe("pipeline.generateBatch", () => {
  test("keeps input order when later requests finish first", async () => {
    const backend = new EchoBackend((prompt) => (prompt.includes("Slow") ? 30 : 1));
    const { pipeline } = setup(backend);
    const requests = [product("A", "Slow Kettle"), product("B", "Quick Toaster"), product("C", "Quick Whisk")].map(
      request
    );

    const outcomes = await pipeline.generateBatch(requests, { concurrency: 3 });

    expect(outcomes.map((o) => o.ok && o.result.request.product.id)).toEqual(["A", "B", "C"]);
  });

  test("never exceeds the concurrency bound", async () => {
    const backend = new EchoBackend();
    const { pipeline } = setup(backend);
    const requests = Array.from({ length: 7 }, (_, i) => request(product(`P${i}`, `Item ${i}`)));

    await pipeline.generateBatch(requests, { concurrency: 2 });

    expect(backend.calls).toBe(7);
    expect(backend.maxInFlight).toBe(2);
  });

  test("reports invalid requests in place and generates the rest", async () => {
    const backend = new EchoBackend();
    const { pipeline, session } = setup(backend);
    const onProgress = vi.fn();
    const requests = [product("P1", "Wool Scarf"), product("P2", "Bare Mug", []), product("P3", "Linen Shirt")].map(
      request
    );

    const outcomes = await pipeline.generateBatch(requests, { concurrency: 2, onProgress });

    expect(outcomes.map((o) => o.ok)).toEqual([true, false, true]);
    const invalid = outcomes[1];
    if (invalid && !invalid.ok) {
      expect(invalid.request.product.id).toBe("P2");
      expect(invalid.error.message).toBe('Product P2 is missing "features", required for description content');
    }
    expect(backend.calls).toBe(2);
    expect(currentSnapshot(session).piecesGenerated).toBe(2);
    expect(onProgress).toHaveBeenCalledTimes(3);
    expect(onProgress.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
  });

  test("falls back to the default concurrency when given NaN", async () => {
    const backend = new EchoBackend();
    const { pipeline } = setup(backend);
    const requests = Array.from({ length: 5 }, (_, i) => request(product(`P${i}`, `Item ${i}`)));

    const outcomes = await pipeline.generateBatch(requests, { concurrency: Number.NaN });

    expect(outcomes).toHaveLength(5);
    expect(outcomes.every((o) => o !== undefined && o.ok)).toBe(true);
    expect(backend.calls).toBe(5);
    expect(backend.maxInFlight).toBe(3);
  });

  test("returns an empty list for no requests", async () => {
    const { pipeline } = setup(new EchoBackend());
    expect(await pipeline.generateBatch([])).toEqual([]);
  });
});

describe("createGenerationClient", () => {
  test("has no remote backend without an API key", () => {
    expect(createGenerationClient(DEFAULT_CONFIG).isRemoteConfigured).toBe(false);
  });

  test("uses the OpenAI backend when a key is present", () => {
    expect(createGenerationClient(DEFAULT_CONFIG, { apiKey: "test-secret" }).isRemoteConfigured).toBe(true);
  });

  test("prompt and fallback use the configured currency", async () => {
    const prompts: string[] = [];
    const backend: CompletionBackend = {
      model: "test-model",
      async complete(req) {
        prompts.push(req.prompt);
        throw new RemoteHttpError(400, "bad request");
      },
    };
    const client = createGenerationClient({ ...DEFAULT_CONFIG, currency: "USD" }, { backend });
    const pipeline = createPipeline({ client, session: createAnalyticsSession() });

    const generation = await pipeline.generate(request({ ...product("P001", "Wool Scarf"), price: 45 }));

    expect(client.currency).toBe("USD");
    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toContain("Price: $45.00");
    expect(generation.result.source).toBe("fallback");
    expect(generation.result.text).toContain("Available at $45.00");
  });

  test("offline mode ignores the key", () => {
    expect(createGenerationClient(DEFAULT_CONFIG, { apiKey: "test-secret", offline: true }).isRemoteConfigured).toBe(
      false
    );
  });
});
