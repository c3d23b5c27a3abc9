/**
 * catalog-copy - product copy generation for e-commerce catalogs
 *
 * Builds prompts per content type, tone and language, calls an
 * OpenAI-compatible endpoint with retry and backoff, falls back to
 * deterministic templates, and tracks time and cost savings per session.
 *
 *   npx catalog-copy generate P001 --tone luxury
 */

export {
  CONTENT_TYPES,
  TONES,
  LANGUAGES,
  type ContentType,
  type Tone,
  type Language,
  type Product,
  type ProductAttributes,
  type GenerationRequest,
  type GenerationResult,
  type GenerationSource,
  type RemoteGenerationResult,
  type FallbackGenerationResult,
  type GenerationSettings,
  type BackoffSettings,
  type AnalyticsSettings,
  type AnalyticsSnapshot,
  type EventContribution,
  type Kpis,
  type RoiSummary,
} from "./types/index.js";

export {
  buildPrompt,
  validateRequest,
  formatPrice,
  formatFeatures,
  getContentTypeLabel,
  listContentTypes,
  listTones,
  listLanguages,
  DEFAULT_CURRENCY,
  type PromptOptions,
} from "./lib/prompts.js";

export {
  generateFallback,
  renderFallbackText,
  type FallbackOptions,
} from "./lib/fallback.js";

export {
  OpenAIBackend,
  toRemoteError,
  type CompletionBackend,
  type CompletionRequest,
  type CompletionResponse,
  type ChatClient,
  type OpenAIBackendOptions,
} from "./lib/backend.js";

export {
  GenerationClient,
  computeBackoffDelay,
  validateCompletion,
  NOT_CONFIGURED_NOTE,
  type ClientDependencies,
  type ClientLogger,
  type GenerateOverrides,
  type GenerationClientOptions,
} from "./lib/client.js";

export {
  createAnalyticsSession,
  record,
  currentSnapshot,
  calculateKpis,
  calculateRoi,
  DEFAULT_ANALYTICS_SETTINGS,
  type AnalyticsSession,
} from "./lib/analytics.js";

export { getRecommendation } from "./lib/recommendations.js";

export { parseCatalog, loadCatalog, findProduct } from "./lib/catalog.js";

export { exportContent, defaultExportFilename, type ExportOptions } from "./lib/export.js";

export {
  loadConfig,
  readFileConfig,
  applyEnvOverrides,
  saveConfig,
  setConfigValue,
  resetConfig,
  resolveApiKey,
  ConfigSchema,
  CONFIG_KEYS,
  DEFAULT_CONFIG,
  type Config,
  type Env,
  type LoadConfigOptions,
} from "./lib/config.js";

export {
  createPipeline,
  createGenerationClient,
  DEFAULT_CONCURRENCY,
  type Pipeline,
  type PipelineOptions,
  type Generation,
  type BatchOutcome,
  type BatchOptions,
  type ClientFactoryOptions,
} from "./lib/pipeline.js";

export {
  InvalidRequestError,
  RemoteError,
  RemoteHttpError,
  RemoteTimeoutError,
  RemoteNetworkError,
  MalformedResponseError,
  UnusableResponseError,
  FallbackExhaustionError,
  CatalogError,
  ConfigError,
  ExportError,
  classifyRemoteError,
  errorMessage,
  type RemoteFailureClass,
} from "./lib/errors.js";

export { getConfigPath } from "./utils/paths.js";

export { VERSION } from "./version.js";
