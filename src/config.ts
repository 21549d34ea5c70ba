import path from "path";
import dotenv from "dotenv";

dotenv.config();

const DATA_DIR = path.join(__dirname, "../data");

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Pacing constants for learning spots
 */
export interface LearningConfig {
  chanceFeedbackAfterResponse: number;
  chanceExplanationBeforeQuestion: number;
  minSecondsBetweenSpots: number;
  maxInteractionsPerActivity: number;
}

export const LEARNING_CONFIG: LearningConfig = {
  chanceFeedbackAfterResponse: numberFromEnv("CHANCE_FEEDBACK_AFTER_RESPONSE", 0.7),
  chanceExplanationBeforeQuestion: numberFromEnv("CHANCE_EXPLANATION_BEFORE_QUESTION", 0.5),
  minSecondsBetweenSpots: numberFromEnv("MIN_SECONDS_BETWEEN_SPOTS", 5),
  maxInteractionsPerActivity: numberFromEnv("MAX_INTERACTIONS_PER_ACTIVITY", 10),
};

export const APP_CONFIG = {
  enableVisualLearning: process.env.ENABLE_VISUAL_LEARNING !== "false",
  disableTts: process.env.DISABLE_TTS === "true",

  // Learning memory bounds
  memoryFile: process.env.LEARNING_MEMORY_FILE || path.join(DATA_DIR, "learning-memory.json"),
  maxMemorySize: numberFromEnv("MAX_MEMORY_SIZE", 1000),
  maxHistoricalSnapshots: numberFromEnv("MAX_HISTORICAL_SNAPSHOTS", 5000),

  tutorsFile: path.join(DATA_DIR, "tutors.json"),
  audioDir: path.join(DATA_DIR, "audio"),

  openaiModel: process.env.OPENAI_MODEL || "gpt-4o-mini",
  ttsModel: process.env.TTS_MODEL || "tts-1",
  ttsVoice: process.env.TTS_VOICE || "nova",

  apiPort: numberFromEnv("API_PORT", 3001),
};
