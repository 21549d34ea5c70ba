import {
  DEFAULT_SESSION_CONFIG,
  configuredActivities,
  createSessionConfig,
  difficultyFor,
  validateSessionConfig,
} from "./sessionConfig";

describe("createSessionConfig", () => {
  it("fills in defaults", () => {
    const config = createSessionConfig();

    expect(config).toEqual(DEFAULT_SESSION_CONFIG);
    expect(config.learningActivities).not.toBe(DEFAULT_SESSION_CONFIG.learningActivities);
  });

  it("takes known values and normalizes case", () => {
    const config = createSessionConfig({
      sessionType: "FOCUSED",
      durationMinutes: "15",
      learningActivities: ["grammar_practice"],
      vocabularyDifficulty: "Advanced",
      grammarDifficulty: "beginner",
      targetLanguage: " fr ",
      enablePronunciationPractice: false,
      enableVisualLearning: false,
      customSettings: { theme: "food" },
    });

    expect(config.sessionType).toBe("focused");
    expect(config.durationMinutes).toBe(15);
    expect(config.learningActivities).toEqual(["grammar_practice"]);
    expect(config.vocabularyDifficulty).toBe("advanced");
    expect(config.grammarDifficulty).toBe("beginner");
    expect(config.targetLanguage).toBe("fr");
    expect(config.enablePronunciationPractice).toBe(false);
    expect(config.enableVisualLearning).toBe(false);
    expect(config.customSettings).toEqual({ theme: "food" });
  });

  it("falls back on unknown enum values and non-object input", () => {
    expect(createSessionConfig({ sessionType: "marathon" }).sessionType).toBe("regular");
    expect(createSessionConfig("nonsense")).toEqual(DEFAULT_SESSION_CONFIG);
  });
});

describe("validateSessionConfig", () => {
  it("accepts the defaults", () => {
    expect(validateSessionConfig(createSessionConfig())).toEqual([]);
  });

  it("lists every problem", () => {
    const config = createSessionConfig({ durationMinutes: 0, learningActivities: ["karaoke"] });

    expect(validateSessionConfig(config)).toEqual([
      "durationMinutes must be a positive number",
      "unknown learning activity: karaoke",
    ]);
  });

  it("requires at least one activity", () => {
    expect(validateSessionConfig(createSessionConfig({ learningActivities: [] }))).toEqual([
      "at least one learning activity is required",
    ]);
  });
});

describe("activity helpers", () => {
  it("keeps only known activity types", () => {
    const config = createSessionConfig({ learningActivities: ["karaoke", "cultural_context"] });

    expect(configuredActivities(config)).toEqual(["cultural_context"]);
  });

  it("uses grammar difficulty for grammar practice only", () => {
    const config = createSessionConfig({ vocabularyDifficulty: "beginner", grammarDifficulty: "advanced" });

    expect(difficultyFor(config, "grammar_practice")).toBe(8);
    expect(difficultyFor(config, "vocabulary_builder")).toBe(2);
    expect(difficultyFor(config, "listening_comprehension")).toBe(2);
  });
});
