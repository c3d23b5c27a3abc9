import type {
  AnalyticsSettings,
  AnalyticsSnapshot,
  ContentType,
  GenerationResult,
  Kpis,
  RoiSummary,
} from "../types/index.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_ANALYTICS_SETTINGS: Readonly<AnalyticsSettings> = {
  minutesSavedPerPiece: 30,
  costSavedPerPiece: 12,
  hourlyWriterRate: 45,
  aiCostPerPiece: 0.08,
};

/**
 * Running totals for one user session. Pass it to `record`; create a new one
 * per session rather than sharing it across sessions.
 */
export interface AnalyticsSession {
  readonly settings: Readonly<AnalyticsSettings>;
  readonly startedAt: string;
  snapshot: AnalyticsSnapshot;
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

const SETTING_KEYS: readonly (keyof AnalyticsSettings)[] = [
  "minutesSavedPerPiece",
  "costSavedPerPiece",
  "hourlyWriterRate",
  "aiCostPerPiece",
];

function emptyCounts(): Record<ContentType, number> {
  return { description: 0, "social-post": 0, email: 0 };
}

export function createAnalyticsSession(
  settings: AnalyticsSettings = DEFAULT_ANALYTICS_SETTINGS,
  clock: () => Date = () => new Date()
): AnalyticsSession {
  for (const key of SETTING_KEYS) {
    const value = settings[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`analytics.${key} must be a non-negative number, got ${value}`);
    }
  }

  return {
    settings: Object.freeze({ ...settings }),
    startedAt: clock().toISOString(),
    snapshot: Object.freeze({
      piecesGenerated: 0,
      totalMinutesSaved: 0,
      totalCostSaved: 0,
      remotePieces: 0,
      fallbackPieces: 0,
      totalGenerationMs: 0,
      byContentType: Object.freeze(emptyCounts()),
      contribution: null,
    }),
  };
}

/**
 * Adds one generation event to the session. Every piece counts the same
 * whether it came from the model or from a fallback template.
 */
export function record(session: AnalyticsSession, result: GenerationResult): AnalyticsSnapshot {
  const previous = session.snapshot;
  const contribution = Object.freeze({
    minutesSaved: session.settings.minutesSavedPerPiece,
    costSaved: session.settings.costSavedPerPiece,
  });
  const { contentType } = result.request;

  const next: AnalyticsSnapshot = Object.freeze({
    piecesGenerated: previous.piecesGenerated + 1,
    totalMinutesSaved: previous.totalMinutesSaved + contribution.minutesSaved,
    totalCostSaved: roundTo(previous.totalCostSaved + contribution.costSaved, 2),
    remotePieces: previous.remotePieces + (result.source === "remote" ? 1 : 0),
    fallbackPieces: previous.fallbackPieces + (result.source === "fallback" ? 1 : 0),
    totalGenerationMs: previous.totalGenerationMs + Math.max(0, result.durationMs),
    byContentType: Object.freeze({
      ...previous.byContentType,
      [contentType]: previous.byContentType[contentType] + 1,
    }),
    contribution,
  });

  session.snapshot = next;
  return next;
}

export function currentSnapshot(session: AnalyticsSession): AnalyticsSnapshot {
  return session.snapshot;
}

export function calculateKpis(snapshot: AnalyticsSnapshot): Kpis {
  const count = snapshot.piecesGenerated;
  return {
    timeSavedHours: roundTo(snapshot.totalMinutesSaved / 60, 1),
    costSaved: snapshot.totalCostSaved,
    generationsCount: count,
    avgMinutesPerGeneration: roundTo(snapshot.totalMinutesSaved / Math.max(count, 1), 1),
    fallbackRate: count === 0 ? 0 : roundTo(snapshot.fallbackPieces / count, 3),
  };
}

export function calculateRoi(
  kpis: Kpis,
  settings: AnalyticsSettings = DEFAULT_ANALYTICS_SETTINGS
): RoiSummary {
  const manualCost = roundTo(kpis.timeSavedHours * settings.hourlyWriterRate, 2);
  const aiCost = roundTo(kpis.generationsCount * settings.aiCostPerPiece, 2);
  const netSavings = roundTo(manualCost - aiCost, 2);

  return {
    manualCost,
    aiCost,
    netSavings,
    roiPercentage: roundTo((netSavings / Math.max(aiCost, 1)) * 100, 1),
    costPerPiece: settings.aiCostPerPiece,
  };
}
