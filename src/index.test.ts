import { describe, test, expect } from "vitest";
import * as publicAPI from "./index.js";

describe("public API exports", () => {
  test("all named exports from src/index.ts are defined (not undefined)", () => {
    const undefinedExports: string[] = [];
    for (const [key, value] of Object.entries(publicAPI)) {
      if (value === undefined) {
        undefinedExports.push(key);
      }
    }
    expect(undefinedExports).toEqual([]);
  });

  test("CONTENT_TYPES array is populated", () => {
    expect(publicAPI.CONTENT_TYPES).toEqual(["description", "social-post", "email"]);
  });

  test("TONES array is populated", () => {
    expect(publicAPI.TONES).toEqual(["professional", "playful", "luxury", "casual"]);
  });

  test("LANGUAGES array is populated", () => {
    expect(publicAPI.LANGUAGES).toEqual(["english", "french"]);
  });

  test("buildPrompt is a function", () => {
    expect(typeof publicAPI.buildPrompt).toBe("function");
  });

  test("generateFallback is a function", () => {
    expect(typeof publicAPI.generateFallback).toBe("function");
  });

  test("createPipeline is a function", () => {
    expect(typeof publicAPI.createPipeline).toBe("function");
  });

  test("GenerationClient is a class", () => {
    expect(typeof publicAPI.GenerationClient).toBe("function");
  });

  test("DEFAULT_CONFIG carries the generation defaults", () => {
    expect(publicAPI.DEFAULT_CONFIG.generation.maxRetries).toBe(2);
    expect(publicAPI.DEFAULT_CONFIG.generation.timeoutMs).toBe(15000);
  });

  test("VERSION is a semver string", () => {
    expect(publicAPI.VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
