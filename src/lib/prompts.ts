import {
  CONTENT_TYPES,
  LANGUAGES,
  TONES,
  type ContentType,
  type GenerationRequest,
  type Language,
  type Product,
  type Tone,
} from "../types/index.js";
import { InvalidRequestError } from "./errors.js";
import { PROMPT_LABELS, PROMPT_TEMPLATES, TONE_DIRECTIVES } from "./templates/prompts.js";

type RequiredAttribute = "features" | "callToAction";

const REQUIRED_ATTRIBUTES: Record<ContentType, readonly RequiredAttribute[]> = {
  description: ["features"],
  "social-post": ["features"],
  email: ["callToAction"],
};

const CONTENT_TYPE_LABELS: Record<ContentType, string> = {
  description: "Product Description",
  "social-post": "Social Post",
  email: "Email",
};

const LOCALES: Record<Language, string> = {
  english: "en-US",
  french: "fr-FR",
};

export const DEFAULT_CURRENCY = "EUR";

export interface PromptOptions {
  currency?: string;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

function hasAttribute(product: Product, attribute: RequiredAttribute): boolean {
  if (attribute === "features") {
    return product.attributes.features.some((feature) => !isBlank(feature));
  }
  return !isBlank(product.attributes.callToAction);
}

/**
 * Throws InvalidRequestError when the product lacks something the selected
 * content type interpolates. Runs before any remote call is made.
 */
export function validateRequest(request: GenerationRequest): void {
  const { product, contentType } = request;

  if (isBlank(product.name)) {
    throw new InvalidRequestError(product.id, "name", contentType);
  }
  if (isBlank(product.category)) {
    throw new InvalidRequestError(product.id, "category", contentType);
  }
  for (const attribute of REQUIRED_ATTRIBUTES[contentType]) {
    if (!hasAttribute(product, attribute)) {
      throw new InvalidRequestError(product.id, attribute, contentType);
    }
  }
}

export function formatPrice(price: number, language: Language, currency: string = DEFAULT_CURRENCY): string {
  return new Intl.NumberFormat(LOCALES[language], { style: "currency", currency }).format(price);
}

export function formatFeatures(product: Product): string {
  return product.attributes.features
    .map((feature) => feature.trim())
    .filter((feature) => feature !== "")
    .join(", ");
}

export function buildPrompt(request: GenerationRequest, options: PromptOptions = {}): string {
  validateRequest(request);

  const { product, contentType, tone, language } = request;
  const template = PROMPT_TEMPLATES[contentType][tone][language];
  const labels = PROMPT_LABELS[language];
  const { material, color, targetAudience, callToAction } = product.attributes;

  const lines = [template.task({ name: product.name.trim(), category: product.category.trim() })];

  const features = formatFeatures(product);
  if (features) {
    lines.push(`${labels.features}: ${features}`);
  }
  lines.push(`${labels.price}: ${formatPrice(product.price, language, options.currency)}`);
  if (!isBlank(material)) lines.push(`${labels.material}: ${material}`);
  if (!isBlank(color)) lines.push(`${labels.color}: ${color}`);
  if (!isBlank(targetAudience)) lines.push(`${labels.audience}: ${targetAudience}`);
  if (!isBlank(callToAction)) lines.push(`${labels.callToAction}: ${callToAction}`);

  lines.push("", `${labels.requirements}:`);
  for (const requirement of template.requirements) {
    lines.push(`- ${requirement}`);
  }

  lines.push("", `${labels.style}: ${TONE_DIRECTIVES[tone][language]}`, labels.respondIn, labels.closing);

  return lines.join("\n");
}

export function getContentTypeLabel(contentType: ContentType): string {
  return CONTENT_TYPE_LABELS[contentType];
}

export function listContentTypes(): ContentType[] {
  return [...CONTENT_TYPES];
}

export function listTones(): Tone[] {
  return [...TONES];
}

export function listLanguages(): Language[] {
  return [...LANGUAGES];
}
