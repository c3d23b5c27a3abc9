export const CONTENT_TYPES = ["description", "social-post", "email"] as const;
export const TONES = ["professional", "playful", "luxury", "casual"] as const;
export const LANGUAGES = ["english", "french"] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];
export type Tone = (typeof TONES)[number];
export type Language = (typeof LANGUAGES)[number];

export interface ProductAttributes {
  readonly material?: string;
  readonly color?: string;
  readonly features: readonly string[];
  readonly targetAudience?: string;
  readonly callToAction?: string;
}

export interface Product {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly price: number;
  readonly attributes: ProductAttributes;
}

export interface GenerationRequest {
  readonly product: Product;
  readonly contentType: ContentType;
  readonly tone: Tone;
  readonly language: Language;
}

export type GenerationSource = "remote" | "fallback";

interface GenerationResultBase {
  readonly id: string;
  readonly text: string;
  readonly durationMs: number;
  /** Remote attempts made; 0 when no endpoint was configured. */
  readonly attempts: number;
  readonly request: GenerationRequest;
  readonly createdAt: string;
}

export interface RemoteGenerationResult extends GenerationResultBase {
  readonly source: "remote";
  readonly model: string;
}

export interface FallbackGenerationResult extends GenerationResultBase {
  readonly source: "fallback";
  readonly errorNote: string;
}

export type GenerationResult = RemoteGenerationResult | FallbackGenerationResult;

export interface GenerationSettings {
  maxRetries: number;
  timeoutMs: number;
  minResponseLength: number;
  maxTokens: number;
  temperature: number;
  topP: number;
}

export interface BackoffSettings {
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
  jitter: number;
}

export interface AnalyticsSettings {
  minutesSavedPerPiece: number;
  costSavedPerPiece: number;
  hourlyWriterRate: number;
  aiCostPerPiece: number;
}

export interface EventContribution {
  readonly minutesSaved: number;
  readonly costSaved: number;
}

export interface AnalyticsSnapshot {
  readonly piecesGenerated: number;
  readonly totalMinutesSaved: number;
  readonly totalCostSaved: number;
  readonly remotePieces: number;
  readonly fallbackPieces: number;
  readonly totalGenerationMs: number;
  readonly byContentType: Readonly<Record<ContentType, number>>;
  /** What the most recent `record` call added; null before any event. */
  readonly contribution: EventContribution | null;
}

export interface Kpis {
  timeSavedHours: number;
  costSaved: number;
  generationsCount: number;
  avgMinutesPerGeneration: number;
  fallbackRate: number;
}

export interface RoiSummary {
  manualCost: number;
  aiCost: number;
  netSavings: number;
  roiPercentage: number;
  costPerPiece: number;
}
