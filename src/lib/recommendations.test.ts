import { describe, test, expect } from "vitest";
import { CONTENT_TYPES, TONES } from "../types/index.js";
import { getRecommendation } from "./recommendations.js";

describe("getRecommendation", () => {
  test("has advice for every content type and tone", () => {
    for (const contentType of CONTENT_TYPES) {
      for (const tone of TONES) {
        expect(getRecommendation(contentType, tone).length).toBeGreaterThan(0);
      }
    }
  });

  test("luxury emails", () => {
    expect(getRecommendation("email", "luxury")).toBe(
      "A luxury tone conveys exclusivity and drives high-value customer actions."
    );
  });
});
