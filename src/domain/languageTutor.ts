import { ValidationError } from "./errors";

export const TUTOR_LANGUAGE_CODES = ["en", "de", "es", "fr", "it", "ja", "ko", "zh"] as const;

export type TutorLanguageCode = (typeof TUTOR_LANGUAGE_CODES)[number];

/**
 * One turn of tutor conversation, threaded back into the next LLM call
 */
export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

export interface LanguageTutor {
  name: string;
  voiceName: string;
  gender: string;
  teachingStyle: string;
  characteristics: string[];
  systemPrompt: string;
  nativeLanguage: string;
  languageCode: TutorLanguageCode;
  context: ChatTurn[];
  lastGreetingTime?: number;
  lastFarewellTime?: number;
}

function isLanguageCode(value: unknown): value is TutorLanguageCode {
  return typeof value === "string" && TUTOR_LANGUAGE_CODES.some((known) => known === value);
}

function stringField(data: Record<string, unknown>, key: string, fallback?: string): string {
  const value = data[key];
  if (typeof value === "string") return value;
  if (fallback !== undefined) return fallback;
  throw new ValidationError(`Tutor is missing "${key}"`);
}

/**
 * Build a tutor from JSON data, validating the language code
 */
export function createTutor(data: Record<string, unknown>): LanguageTutor {
  const languageCode = data.languageCode ?? "en";
  if (!isLanguageCode(languageCode)) {
    throw new ValidationError(
      `Invalid language code: ${String(languageCode)}. Must be one of ${TUTOR_LANGUAGE_CODES.join(", ")}`
    );
  }

  const name = stringField(data, "name");
  return {
    name,
    voiceName: stringField(data, "voiceName", name),
    gender: stringField(data, "gender", "M"),
    teachingStyle: stringField(data, "teachingStyle", "neutral"),
    characteristics: Array.isArray(data.characteristics) ? data.characteristics.map(String) : [],
    systemPrompt: stringField(data, "systemPrompt", ""),
    nativeLanguage: stringField(data, "nativeLanguage", "English"),
    languageCode,
    context: [],
  };
}

/**
 * Thread the context returned by the LLM into the tutor.
 * The farewell time tracks the last time the tutor spoke.
 */
export function updateTutorContext(
  tutor: LanguageTutor,
  result: { context: ChatTurn[]; contextProvided: boolean },
  now: number
): void {
  if (result.contextProvided) {
    tutor.context = result.context;
  }
  tutor.lastFarewellTime = now;
}
