import { Clock, RandomSource } from "./clock";
import { ConfigurationError } from "./errors";
import { LearningSpot } from "./learningSpot";
import { InteractionHistory, LearningSpotProfile, mediaChanceFor } from "./learningSpotProfile";

const T = 1_700_000_000_000;

function fixedClock(start: number = T): Clock & { set(value: number): void } {
  let now = start;
  return {
    now: () => now,
    set: (value: number) => {
      now = value;
    },
  };
}

function sequence(...values: number[]): RandomSource {
  let i = 0;
  return () => values[i++] ?? 0.99;
}

describe("InteractionHistory", () => {
  it("skips content that repeats the last entry", () => {
    const history = new InteractionHistory();

    history.record("Hallo", 1);
    history.record("Hallo", 2);
    history.record("Tschüss", 3);
    history.record("Hallo", 4);

    expect(history.list().map((spot) => spot.content)).toEqual(["Hallo", "Tschüss", "Hallo"]);
  });

  it("keeps only the most recent 100 entries", () => {
    const history = new InteractionHistory();

    for (let i = 0; i < 105; i++) {
      history.record(`item ${i}`, i);
    }

    expect(history.size).toBe(100);
    expect(history.list()[0].content).toBe("item 5");
    expect(history.list()[99].content).toBe("item 104");
  });

  it("marks only the first matching entry as spoken", () => {
    const history = new InteractionHistory();
    history.record("Hallo", 1);
    history.record("Tschüss", 2);
    history.record("Hallo", 3);

    history.markSpoken("Hallo");

    expect(history.list().map((spot) => spot.wasSpoken)).toEqual([true, false, false]);
  });
});

describe("LearningSpotProfile", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("first interaction", () => {
    it("introduces when there is no previous spot and no history", () => {
      for (const value of [0, 0.5, 0.99]) {
        const profile = new LearningSpotProfile({
          activityType: "vocabulary_builder",
          history: new InteractionHistory(),
          currentContent: "Hallo",
          random: () => value,
          clock: fixedClock(),
        });

        expect(profile.isFirstInteraction).toBe(true);
        expect(profile.provideIntroduction).toBe(true);
      }
    });

    it("does not introduce once history holds content", () => {
      const history = new InteractionHistory();
      new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history,
        currentContent: "Hallo",
        random: () => 0.99,
        clock: fixedClock(),
      });

      const second = new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history,
        currentContent: "Apfel",
        random: () => 0.99,
        clock: fixedClock(),
      });

      expect(second.isFirstInteraction).toBe(false);
      expect(second.provideIntroduction).toBe(false);
      expect(history.size).toBe(2);
    });

    it("does not introduce after a previous spot", () => {
      const profile = new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history: new InteractionHistory(),
        previousSpot: new LearningSpot({ content: "Hallo", createdAt: T }),
        currentContent: "Apfel",
        random: () => 0.99,
        clock: fixedClock(),
      });

      expect(profile.provideIntroduction).toBe(false);
    });
  });

  describe("decisions", () => {
    const seeded = () => {
      const history = new InteractionHistory();
      history.record("earlier", T - 60_000);
      return history;
    };

    it("rolls feedback only after a spot that expected a response", () => {
      const profile = new LearningSpotProfile({
        activityType: "conversation_practice",
        history: seeded(),
        previousSpot: new LearningSpot({ content: "Wie geht's?", createdAt: T, requiresResponse: true }),
        currentContent: "Gut, danke",
        random: sequence(0.5, 0.99, 0.99),
        clock: fixedClock(),
        enableVisualLearning: true,
      });

      expect(profile.provideFeedback).toBe(true);
      expect(profile.provideExplanation).toBe(false);
      expect(profile.generateMedia).toBe(false);
    });

    it("does not consume a feedback draw when no response was expected", () => {
      const profile = new LearningSpotProfile({
        activityType: "conversation_practice",
        history: seeded(),
        previousSpot: new LearningSpot({ content: "Hallo", createdAt: T }),
        currentContent: "Wie geht's?",
        random: sequence(0.1, 0.99),
        clock: fixedClock(),
        enableVisualLearning: true,
      });

      expect(profile.provideFeedback).toBe(false);
      expect(profile.provideExplanation).toBe(true);
      expect(profile.generateMedia).toBe(false);
    });

    it("skips explanation and media without current content", () => {
      const random = jest.fn(() => 0);
      const profile = new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history: seeded(),
        random,
        clock: fixedClock(),
        enableVisualLearning: true,
      });

      expect(profile.provideExplanation).toBe(false);
      expect(profile.generateMedia).toBe(false);
      expect(random).not.toHaveBeenCalled();
    });

    it("weights media generation by activity type", () => {
      const mediaWith = (activityType: "vocabulary_builder" | "grammar_practice" | "conversation_practice", draw: number) =>
        new LearningSpotProfile({
          activityType,
          history: seeded(),
          currentContent: "Inhalt",
          random: sequence(0.99, draw),
          clock: fixedClock(),
          enableVisualLearning: true,
        }).generateMedia;

      expect(mediaWith("vocabulary_builder", 0.75)).toBe(true);
      expect(mediaWith("grammar_practice", 0.75)).toBe(false);
      expect(mediaWith("grammar_practice", 0.45)).toBe(true);
      expect(mediaWith("conversation_practice", 0.25)).toBe(true);
      expect(mediaWith("conversation_practice", 0.35)).toBe(false);
    });

    it("never generates media with visual learning off", () => {
      const profile = new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history: seeded(),
        currentContent: "Apfel",
        random: () => 0,
        clock: fixedClock(),
        enableVisualLearning: false,
      });

      expect(profile.generateMedia).toBe(false);
    });

    it("exposes the media chances", () => {
      expect(mediaChanceFor("cultural_context")).toBe(0.8);
      expect(mediaChanceFor("situational_dialogues")).toBe(0.5);
      expect(mediaChanceFor("pronunciation_guide")).toBe(0.3);
    });
  });

  describe("isGoingToSaySomething", () => {
    const quietProfile = (now: number, lookup: (idx: number, createdBefore?: number) => LearningSpot | null) => {
      const history = new InteractionHistory();
      history.record("earlier", T - 60_000);
      return new LearningSpotProfile({
        activityType: "conversation_practice",
        history,
        previousSpot: new LearningSpot({ content: "earlier", createdAt: T }),
        currentContent: "next",
        getPreviousSpot: lookup,
        random: () => 0.5,
        clock: fixedClock(now),
        config: { chanceFeedbackAfterResponse: 0, chanceExplanationBeforeQuestion: 0 },
        enableVisualLearning: false,
      });
    };

    it("stays quiet within the minimum gap and speaks after it", () => {
      const spoken = new LearningSpot({ content: "earlier", createdAt: T });
      spoken.markSpoken();
      const lookup = (idx: number) => (idx === 0 ? spoken : null);

      expect(quietProfile(T + 3000, lookup).isGoingToSaySomething()).toBe(false);
      expect(quietProfile(T + 6000, lookup).isGoingToSaySomething()).toBe(true);
    });

    it("speaks when nothing has been spoken yet", () => {
      expect(quietProfile(T + 1000, () => null).isGoingToSaySomething()).toBe(true);
    });

    it("always speaks for an introduction without consulting the lookup", () => {
      const profile = new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history: new InteractionHistory(),
        currentContent: "Hallo",
        random: () => 0.99,
        clock: fixedClock(),
      });

      expect(profile.isGoingToSaySomething()).toBe(true);
    });
  });

  describe("getLastSpokenSpot", () => {
    it("gives up after exactly the iteration limit", () => {
      const lookup = jest.fn(() => new LearningSpot({ content: "unspoken", createdAt: T }));
      const profile = new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history: new InteractionHistory(),
        getPreviousSpot: lookup,
        clock: fixedClock(),
      });

      expect(profile.getLastSpokenSpot(100)).toBeNull();
      expect(lookup).toHaveBeenCalledTimes(100);
      expect(console.warn).toHaveBeenCalledWith("getLastSpokenSpot gave up after 100 lookups");
    });

    it("returns the first spoken spot, looking before its own creation time", () => {
      const unspoken = new LearningSpot({ content: "a", createdAt: T - 2000 });
      const spoken = new LearningSpot({ content: "b", createdAt: T - 4000 });
      spoken.markSpoken();
      const lookup = jest.fn((idx: number) => [unspoken, spoken][idx] ?? null);
      const profile = new LearningSpotProfile({
        activityType: "vocabulary_builder",
        history: new InteractionHistory(),
        getPreviousSpot: lookup,
        clock: fixedClock(),
      });

      expect(profile.getLastSpokenSpot()).toBe(spoken);
      expect(lookup).toHaveBeenCalledWith(0, T);
      expect(lookup).toHaveBeenCalledWith(1, T);
    });
  });

  it("fails when a lookup was not provided", () => {
    const profile = new LearningSpotProfile({
      activityType: "vocabulary_builder",
      history: new InteractionHistory(),
      clock: fixedClock(),
    });

    expect(() => profile.getPreviousSpot(0)).toThrow(ConfigurationError);
    expect(() => profile.getNextContent()).toThrow("Next content callback not set");
  });

  it("marks itself and its history entry as spoken", () => {
    const history = new InteractionHistory();
    const profile = new LearningSpotProfile({
      activityType: "vocabulary_builder",
      history,
      currentContent: "Hallo",
      clock: fixedClock(),
    });

    profile.markAsSpoken();

    expect(profile.hasAlreadySpoken).toBe(true);
    expect(history.list()[0].wasSpoken).toBe(true);
  });

  it("resets preparation state without re-rolling decisions", () => {
    const clock = fixedClock();
    const profile = new LearningSpotProfile({
      activityType: "vocabulary_builder",
      history: new InteractionHistory(),
      currentContent: "Hallo",
      random: sequence(0, 0.99),
      clock,
      enableVisualLearning: true,
    });
    clock.set(T + 2500);
    profile.setPreparationTime();
    profile.isPrepared = true;

    expect(profile.getTime()).toBe(T + 2500);

    profile.reset();

    expect(profile.isPrepared).toBe(false);
    expect(profile.preparationTime).toBeNull();
    expect(profile.getTime()).toBe(T);
    expect(profile.provideIntroduction).toBe(true);
    expect(profile.provideExplanation).toBe(true);
    expect(profile.generateMedia).toBe(false);
  });

  it("describes its decisions", () => {
    const profile = new LearningSpotProfile({
      activityType: "vocabulary_builder",
      history: new InteractionHistory(),
      currentContent: "Hallo",
      random: sequence(0, 0.99),
      clock: fixedClock(),
      enableVisualLearning: true,
    });

    expect(profile.describe()).toBe(
      [
        "Activity: vocabulary_builder",
        "Current content: Hallo",
        " - Providing introduction",
        " - Providing explanation",
      ].join("\n")
    );
  });
});
