import fs from "fs";
import { APP_CONFIG } from "../config";
import { LanguageTutor, createTutor } from "../domain/languageTutor";

const FALLBACK_TUTOR = {
  name: "Tutor",
  voiceName: "Tutor",
  gender: "F",
  teachingStyle: "friendly and patient",
  characteristics: [],
  systemPrompt: "You are a friendly, patient language tutor. Keep answers short and encouraging.",
  nativeLanguage: "English",
  languageCode: "en",
};

/**
 * TutorStore loads tutor personas from a JSON file and tracks the current one.
 * Tutors are keyed by voice name; duplicates in the file are skipped.
 */
export class TutorStore {
  private tutors: Map<string, LanguageTutor> = new Map();
  private current: LanguageTutor;

  constructor(private readonly filePath: string = APP_CONFIG.tutorsFile) {
    this.loadTutors();
    if (this.tutors.size === 0) {
      const fallback = createTutor(FALLBACK_TUTOR);
      this.tutors.set(fallback.voiceName, fallback);
    }
    this.current = this.list()[0] ?? createTutor(FALLBACK_TUTOR);
  }

  private loadTutors(): void {
    if (!fs.existsSync(this.filePath)) {
      return;
    }

    try {
      const data = fs.readFileSync(this.filePath, "utf-8");
      const parsed = JSON.parse(data) as Record<string, unknown>[];
      for (const entry of parsed) {
        const tutor = createTutor(entry);
        if (this.tutors.has(tutor.voiceName)) {
          console.warn(`Tutor already exists, skipping: ${tutor.voiceName}`);
          continue;
        }
        this.tutors.set(tutor.voiceName, tutor);
      }
    } catch (err) {
      console.error("Failed to load tutors:", err);
    }
  }

  list(): LanguageTutor[] {
    return Array.from(this.tutors.values());
  }

  get(voiceName: string): LanguageTutor | null {
    return this.tutors.get(voiceName) || null;
  }

  getCurrent(): LanguageTutor {
    return this.current;
  }

  setCurrent(voiceName: string): LanguageTutor | null {
    const tutor = this.get(voiceName);
    if (tutor) {
      this.current = tutor;
    } else {
      console.error(`Tutor not found: ${voiceName}`);
    }
    return tutor;
  }

  /**
   * Pick the first tutor teaching the given language, if any
   */
  findForLanguage(languageCode: string): LanguageTutor | null {
    return this.list().find((tutor) => tutor.languageCode === languageCode) || null;
  }
}
