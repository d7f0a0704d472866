import dotenv from "dotenv";
import { CoachPolicy } from "../shared/types/policy.types";
import { buildPolicy } from "./policy";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  openaiApiKey?: string;
  openaiChatModel: string;
  openaiTranscriptionModel: string;
  sessionStorageDir: string;
  skillVocabularyPath: string;
  resourceCatalogPath: string;
  policy: CoachPolicy;
}

type EnvSource = Record<string, string | undefined>;

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const portRaw = source.PORT ?? "3000";
  const port = Number(portRaw);
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const adaptiveRaw = source.ADAPTIVE_FOLLOW_UPS_ENABLED ?? "true";
  const thresholdRaw = source.ADAPTIVE_FOLLOW_UP_THRESHOLD ?? "0.5";
  const questionCountRaw = source.QUESTION_COUNT ?? "5";
  const questionSeedRaw = source.QUESTION_SEED ?? "1";
  const gapSeedCountRaw = source.GAP_SEED_COUNT ?? "5";
  const mustHaveWeightRaw = source.MUST_HAVE_WEIGHT ?? "2";
  const niceToHaveWeightRaw = source.NICE_TO_HAVE_WEIGHT ?? "1";
  const gapWeightRaw = source.RECOMMENDATION_GAP_WEIGHT ?? "0.6";
  const weakAreaThresholdRaw = source.WEAK_AREA_THRESHOLD ?? "0.6";
  const sessionTimeoutRaw = getOptionalTrimmed(source, "SESSION_TIMEOUT_MS");
  const finishedTtlRaw = source.FINISHED_SESSION_TTL_MS ?? "900000";

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT value: ${portRaw}`);
  }

  const followUpThreshold = parseUnitInterval("ADAPTIVE_FOLLOW_UP_THRESHOLD", thresholdRaw);
  const gapWeight = parseUnitInterval("RECOMMENDATION_GAP_WEIGHT", gapWeightRaw);
  const weakAreaThreshold = parseUnitInterval("WEAK_AREA_THRESHOLD", weakAreaThresholdRaw);
  const questionCount = parsePositiveInteger("QUESTION_COUNT", questionCountRaw);
  const gapSeedCount = parsePositiveInteger("GAP_SEED_COUNT", gapSeedCountRaw);
  const questionSeed = Number(questionSeedRaw);
  if (!Number.isInteger(questionSeed)) {
    throw new Error(`Invalid QUESTION_SEED value: ${questionSeedRaw}`);
  }
  const mustHave = Number(mustHaveWeightRaw);
  const niceToHave = Number(niceToHaveWeightRaw);
  if (!Number.isFinite(mustHave) || !Number.isFinite(niceToHave) || mustHave <= niceToHave) {
    throw new Error(
      `Invalid importance weights: MUST_HAVE_WEIGHT=${mustHaveWeightRaw}, NICE_TO_HAVE_WEIGHT=${niceToHaveWeightRaw}. Expected must-have weight above nice-to-have weight.`,
    );
  }

  const policy = buildPolicy({
    importanceWeights: { mustHave, niceToHave },
    adaptiveFollowUps: parseBoolean(adaptiveRaw),
    followUpThreshold,
    questionCount,
    questionSeed,
    gapSeedCount,
    weakAreaThreshold,
    recommendationWeights: { gap: gapWeight, session: round2(1 - gapWeight) },
    sessionTimeoutMs: sessionTimeoutRaw ? parsePositiveInteger("SESSION_TIMEOUT_MS", sessionTimeoutRaw) : undefined,
    finishedSessionTtlMs: parsePositiveInteger("FINISHED_SESSION_TTL_MS", finishedTtlRaw),
  });

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    port,
    logLevel: parseLogLevel(logLevelRaw),
    openaiApiKey: getOptionalTrimmed(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiTranscriptionModel: getOptionalTrimmed(source, "OPENAI_TRANSCRIPTION_MODEL") ?? "whisper-1",
    sessionStorageDir: getOptionalTrimmed(source, "SESSION_STORAGE_DIR") ?? "data/sessions",
    skillVocabularyPath: getOptionalTrimmed(source, "SKILL_VOCABULARY_PATH") ?? "data/skill-vocabulary.json",
    resourceCatalogPath: getOptionalTrimmed(source, "RESOURCE_CATALOG_PATH") ?? "data/resources.json",
    policy,
  };
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid LOG_LEVEL value: ${value}`);
}

function parseUnitInterval(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Invalid ${name} value: ${raw}. Expected number between 0 and 1.`);
  }
  return value;
}

function parsePositiveInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
