import { describe, test, expect } from "vitest";
import type { GenerationRequest, Product } from "../types/index.js";
import { CONTENT_TYPES, LANGUAGES, TONES } from "../types/index.js";
import { generateFallback, renderFallbackText } from "./fallback.js";

const scarf: Product = {
  id: "P001",
  name: "Wool Scarf",
  category: "Accessories",
  price: 45,
  attributes: {
    features: ["hand-knitted", "extra long"],
    targetAudience: "commuters in cold cities",
    callToAction: "Order yours today",
  },
};

function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return { product: scarf, contentType: "description", tone: "luxury", language: "english", ...overrides };
}

describe("renderFallbackText", () => {
  test("fills the luxury English description template", () => {
    expect(renderFallbackText(request())).toBe(
      "Indulge in the exquisite Wool Scarf, a distinguished Accessories piece crafted for discerning commuters in cold cities. " +
        "With hand-knitted, extra long, it is the pinnacle of refinement at €45.00."
    );
  });

  test("is deterministic and non-empty for every content type, tone and language", () => {
    for (const contentType of CONTENT_TYPES) {
      for (const tone of TONES) {
        for (const language of LANGUAGES) {
          const first = renderFallbackText(request({ contentType, tone, language }));
          const second = renderFallbackText(request({ contentType, tone, language }));
          expect(first).toBe(second);
          expect(first.trim()).not.toBe("");
          expect(first).toContain("Wool Scarf");
        }
      }
    }
  });

  test("emails open with a subject line and carry the call to action", () => {
    for (const tone of TONES) {
      const english = renderFallbackText(request({ contentType: "email", tone }));
      expect(english.startsWith("Subject:")).toBe(true);
      expect(english).toContain("Order yours today");

      const french = renderFallbackText(request({ contentType: "email", tone, language: "french" }));
      expect(french.startsWith("Objet :")).toBe(true);
    }
  });

  test("substitutes defaults for missing optional attributes", () => {
    const bare: Product = { ...scarf, attributes: { features: [] } };
    const text = renderFallbackText(request({ product: bare }));
    expect(text).toContain("thoughtful details");
    expect(text).toContain("everyday shoppers");
  });
});

describe("generateFallback", () => {
  test("returns a frozen fallback result carrying the error note", () => {
    const createdAt = new Date("2026-01-15T10:00:00.000Z");
    const result = generateFallback(request(), "HTTP 503: unavailable", {
      attempts: 2,
      durationMs: 1234,
      now: () => createdAt,
    });

    expect(result.source).toBe("fallback");
    expect(result.errorNote).toBe("HTTP 503: unavailable");
    expect(result.attempts).toBe(2);
    expect(result.durationMs).toBe(1234);
    expect(result.createdAt).toBe("2026-01-15T10:00:00.000Z");
    expect(result.text).toBe(renderFallbackText(request()));
    expect(Object.isFrozen(result)).toBe(true);
  });

  test("defaults attempts and duration to zero", () => {
    const result = generateFallback(request(), "Remote endpoint not configured");
    expect(result.attempts).toBe(0);
    expect(result.durationMs).toBe(0);
  });
});
