import type { FallbackGenerationResult, GenerationRequest } from "../types/index.js";
import { generateId } from "../utils/id.js";
import { FallbackExhaustionError } from "./errors.js";
import { formatFeatures, formatPrice } from "./prompts.js";
import {
  FALLBACK_TEMPLATES,
  SLOT_DEFAULTS,
  type FallbackSlots,
  type FallbackTemplate,
} from "./templates/fallback.js";

export interface FallbackOptions {
  currency?: string;
  /** Remote attempts made before falling back. */
  attempts?: number;
  durationMs?: number;
  now?: () => Date;
}

function orDefault(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

function slotsFor(request: GenerationRequest, currency?: string): FallbackSlots {
  const { product, language } = request;
  const defaults = SLOT_DEFAULTS[language];

  return {
    name: product.name.trim(),
    category: product.category.trim(),
    price: formatPrice(product.price, language, currency),
    features: orDefault(formatFeatures(product), defaults.features),
    audience: orDefault(product.attributes.targetAudience, defaults.audience),
    callToAction: orDefault(product.attributes.callToAction, defaults.callToAction),
  };
}

/** Template text for a request. Same request, same text. */
export function renderFallbackText(request: GenerationRequest, currency?: string): string {
  const { contentType, tone, language } = request;
  const template: FallbackTemplate | undefined = FALLBACK_TEMPLATES[contentType]?.[tone]?.[language];
  if (!template) {
    throw new FallbackExhaustionError(contentType, tone, language);
  }
  return template(slotsFor(request, currency));
}

export function generateFallback(
  request: GenerationRequest,
  errorNote: string,
  options: FallbackOptions = {}
): FallbackGenerationResult {
  const now = options.now ?? (() => new Date());

  const result: FallbackGenerationResult = {
    id: generateId(),
    text: renderFallbackText(request, options.currency),
    source: "fallback",
    errorNote,
    durationMs: options.durationMs ?? 0,
    attempts: options.attempts ?? 0,
    request,
    createdAt: now().toISOString(),
  };
  return Object.freeze(result);
}
