import { APP_CONFIG } from "../config";
import { ActivityType, isActivityType } from "./learningActivity";

export type SessionType = "regular" | "focused" | "review" | "assessment" | "custom";

export type DifficultyLevel = "beginner" | "intermediate" | "advanced";

const SESSION_TYPES: readonly SessionType[] = ["regular", "focused", "review", "assessment", "custom"];
const DIFFICULTY_LEVELS: readonly DifficultyLevel[] = ["beginner", "intermediate", "advanced"];

/**
 * Activity difficulty (1-10) used for each coarse level
 */
export const DIFFICULTY_TO_LEVEL: Record<DifficultyLevel, number> = {
  beginner: 2,
  intermediate: 5,
  advanced: 8,
};

export interface SessionConfig {
  sessionType: SessionType;
  durationMinutes: number;
  autoStart: boolean;
  learningActivities: string[];
  vocabularyDifficulty: DifficultyLevel;
  grammarDifficulty: DifficultyLevel;
  targetLanguage: string;
  enablePronunciationPractice: boolean;
  enableVisualLearning: boolean;
  customSettings: Record<string, unknown>;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  sessionType: "regular",
  durationMinutes: 30,
  autoStart: false,
  learningActivities: ["vocabulary_builder", "grammar_practice", "conversation_practice"],
  vocabularyDifficulty: "intermediate",
  grammarDifficulty: "intermediate",
  targetLanguage: "de",
  enablePronunciationPractice: true,
  enableVisualLearning: APP_CONFIG.enableVisualLearning,
  customSettings: {},
};

function pick<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  if (typeof value !== "string") return fallback;
  const lower = value.toLowerCase();
  return allowed.find((option) => option === lower) ?? fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a config from loosely-typed input (request bodies, saved settings).
 * Unknown keys are ignored; missing ones take the defaults.
 */
export function createSessionConfig(input: unknown = {}): SessionConfig {
  const args = isRecord(input) ? input : {};
  const config: SessionConfig = {
    ...DEFAULT_SESSION_CONFIG,
    learningActivities: [...DEFAULT_SESSION_CONFIG.learningActivities],
    customSettings: {},
  };

  config.sessionType = pick(args.sessionType, SESSION_TYPES, config.sessionType);
  if (args.durationMinutes !== undefined) {
    config.durationMinutes = Number(args.durationMinutes);
  }
  if (typeof args.autoStart === "boolean") {
    config.autoStart = args.autoStart;
  }
  if (Array.isArray(args.learningActivities)) {
    config.learningActivities = args.learningActivities.map(String);
  }
  config.vocabularyDifficulty = pick(args.vocabularyDifficulty, DIFFICULTY_LEVELS, config.vocabularyDifficulty);
  config.grammarDifficulty = pick(args.grammarDifficulty, DIFFICULTY_LEVELS, config.grammarDifficulty);
  if (typeof args.targetLanguage === "string" && args.targetLanguage.trim()) {
    config.targetLanguage = args.targetLanguage.trim();
  }
  if (typeof args.enablePronunciationPractice === "boolean") {
    config.enablePronunciationPractice = args.enablePronunciationPractice;
  }
  if (typeof args.enableVisualLearning === "boolean") {
    config.enableVisualLearning = args.enableVisualLearning;
  }
  if (isRecord(args.customSettings)) {
    config.customSettings = { ...args.customSettings };
  }

  return config;
}

/**
 * Returns a list of problems; empty when the config is usable
 */
export function validateSessionConfig(config: SessionConfig): string[] {
  const problems: string[] = [];

  if (!Number.isFinite(config.durationMinutes) || config.durationMinutes <= 0) {
    problems.push("durationMinutes must be a positive number");
  }
  if (config.learningActivities.length === 0) {
    problems.push("at least one learning activity is required");
  }
  for (const activity of config.learningActivities) {
    if (!isActivityType(activity)) {
      problems.push(`unknown learning activity: ${activity}`);
    }
  }

  return problems;
}

export function configuredActivities(config: SessionConfig): ActivityType[] {
  return config.learningActivities.filter(isActivityType);
}

/**
 * Starting difficulty for an activity, from the session's coarse levels
 */
export function difficultyFor(config: SessionConfig, activityType: ActivityType): number {
  if (activityType === "grammar_practice") {
    return DIFFICULTY_TO_LEVEL[config.grammarDifficulty];
  }
  return DIFFICULTY_TO_LEVEL[config.vocabularyDifficulty];
}
