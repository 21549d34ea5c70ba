/**
 * Learning Spot Profile
 *
 * Decides, once, how a single upcoming interaction should behave:
 * whether the tutor introduces the activity, gives feedback on the last
 * answer, explains before asking, or generates media, and whether it
 * should speak at all given how recently it last spoke.
 *
 * Decisions are rolled at construction and never re-rolled.
 */

import { APP_CONFIG, LEARNING_CONFIG, LearningConfig } from "../config";
import { Clock, RandomSource, mathRandom, secondsBetween, systemClock } from "./clock";
import { ConfigurationError } from "./errors";
import { ActivityType } from "./learningActivity";
import { LearningSpot } from "./learningSpot";

// ============================================
// Interaction history
// ============================================

const MAX_INTERACTION_HISTORY = 100;

/**
 * Rolling record of recent interaction content, shared by every profile
 * built within one session. Used to tell whether anything has happened yet.
 */
export class InteractionHistory {
  private entries: LearningSpot[] = [];

  constructor(private readonly maxEntries: number = MAX_INTERACTION_HISTORY) {}

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  list(): readonly LearningSpot[] {
    return this.entries;
  }

  /**
   * Append content unless it repeats the most recent entry
   */
  record(content: string, createdAt: number): void {
    const last = this.entries[this.entries.length - 1];
    if (last && last.content === content) {
      return;
    }
    this.entries.push(new LearningSpot({ content, createdAt }));
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(-this.maxEntries);
    }
  }

  /**
   * Flag the first entry with this content as spoken
   */
  markSpoken(content: string): void {
    const match = this.entries.find((entry) => entry.content === content);
    match?.markSpoken();
  }

  clear(): void {
    this.entries = [];
  }
}

// ============================================
// Profile
// ============================================

/** Look up the idx-th previous session spot, optionally only those created before a time */
export type PreviousSpotLookup = (idx: number, createdBefore?: number) => LearningSpot | null;

export type NextContentLookup = () => string | null;

export interface LearningSpotProfileOptions {
  activityType: ActivityType;
  history: InteractionHistory;
  previousSpot?: LearningSpot | null;
  currentContent?: string | null;
  getPreviousSpot?: PreviousSpotLookup;
  getNextContent?: NextContentLookup;
  random?: RandomSource;
  clock?: Clock;
  config?: Partial<LearningConfig>;
  enableVisualLearning?: boolean;
}

const HIGH_MEDIA_ACTIVITIES: ActivityType[] = ["vocabulary_builder", "cultural_context"];
const MEDIUM_MEDIA_ACTIVITIES: ActivityType[] = ["grammar_practice", "situational_dialogues"];

export function mediaChanceFor(activityType: ActivityType): number {
  if (HIGH_MEDIA_ACTIVITIES.includes(activityType)) return 0.8;
  if (MEDIUM_MEDIA_ACTIVITIES.includes(activityType)) return 0.5;
  return 0.3;
}

export class LearningSpotProfile {
  readonly activityType: ActivityType;
  readonly previousSpot: LearningSpot | null;
  readonly currentContent: string | null;
  readonly createdAt: number;

  readonly isFirstInteraction: boolean;
  readonly provideIntroduction: boolean;
  readonly provideFeedback: boolean;
  readonly provideExplanation: boolean;
  readonly generateMedia: boolean;

  isPrepared = false;
  hasAlreadySpoken = false;
  preparationTime: number | null = null;

  private readonly history: InteractionHistory;
  private readonly lookupPreviousSpot?: PreviousSpotLookup;
  private readonly lookupNextContent?: NextContentLookup;
  private readonly clock: Clock;
  private readonly minSecondsBetweenSpots: number;

  constructor(options: LearningSpotProfileOptions) {
    const config = { ...LEARNING_CONFIG, ...options.config };
    const random = options.random ?? mathRandom;

    this.activityType = options.activityType;
    this.previousSpot = options.previousSpot ?? null;
    this.currentContent = options.currentContent ?? null;
    this.history = options.history;
    this.lookupPreviousSpot = options.getPreviousSpot;
    this.lookupNextContent = options.getNextContent;
    this.clock = options.clock ?? systemClock;
    this.minSecondsBetweenSpots = config.minSecondsBetweenSpots;
    this.createdAt = this.clock.now();

    const historyWasEmpty = this.history.isEmpty();
    if (this.currentContent) {
      this.history.record(this.currentContent, this.createdAt);
    }

    this.isFirstInteraction = this.previousSpot === null && historyWasEmpty;
    this.provideIntroduction = this.isFirstInteraction;
    if (this.provideIntroduction) {
      console.log(`First interaction of ${this.activityType} - preparing introduction`);
    }

    this.provideFeedback =
      this.previousSpot !== null &&
      this.previousSpot.requiresResponse &&
      random() < config.chanceFeedbackAfterResponse;

    this.provideExplanation =
      this.currentContent !== null &&
      random() < config.chanceExplanationBeforeQuestion;

    this.generateMedia =
      this.currentContent !== null &&
      (options.enableVisualLearning ?? APP_CONFIG.enableVisualLearning) &&
      random() < mediaChanceFor(this.activityType);
  }

  getPreviousSpot(idx: number = 0): LearningSpot | null {
    if (!this.lookupPreviousSpot) {
      throw new ConfigurationError("Previous spot callback not set");
    }
    return this.lookupPreviousSpot(idx, this.createdAt);
  }

  getNextContent(): string | null {
    if (!this.lookupNextContent) {
      throw new ConfigurationError("Next content callback not set");
    }
    return this.lookupNextContent();
  }

  getTime(): number {
    return this.preparationTime ?? this.createdAt;
  }

  /**
   * Whether this spot will result in speech. Introductions, feedback and
   * explanations always speak; anything else waits out the minimum gap
   * since the last spoken spot.
   */
  isGoingToSaySomething(): boolean {
    if (this.provideIntroduction || this.provideFeedback || this.provideExplanation) {
      return true;
    }

    if (!this.lastSpotMoreThanSeconds(this.minSecondsBetweenSpots)) {
      console.log(`Time restriction applied to ${this.activityType} spot`);
      return false;
    }
    return true;
  }

  lastSpotMoreThanSeconds(seconds: number): boolean {
    const lastSpot = this.getLastSpokenSpot();
    if (!lastSpot) {
      return true;
    }
    return secondsBetween(lastSpot.createdAt, this.clock.now()) > seconds;
  }

  /**
   * Walk back through the session until a spoken spot turns up.
   * Gives up after maxIterations lookups and treats that as not found.
   */
  getLastSpokenSpot(maxIterations: number = 100): LearningSpot | null {
    for (let idx = 0; idx < maxIterations; idx++) {
      const spot = this.getPreviousSpot(idx);
      if (!spot) {
        return null;
      }
      if (spot.wasSpoken) {
        return spot;
      }
    }

    console.warn(`getLastSpokenSpot gave up after ${maxIterations} lookups`);
    return null;
  }

  setPreparationTime(): void {
    this.preparationTime = this.clock.now();
  }

  markAsSpoken(): void {
    this.hasAlreadySpoken = true;
    if (this.currentContent) {
      this.history.markSpoken(this.currentContent);
    }
  }

  /**
   * Clear preparation state only. Decisions stay as rolled.
   */
  reset(): void {
    this.isPrepared = false;
    this.preparationTime = null;
  }

  describe(): string {
    const lines = [`Activity: ${this.activityType}`];
    if (this.currentContent) lines.push(`Current content: ${this.currentContent}`);
    if (this.provideIntroduction) lines.push(" - Providing introduction");
    if (this.provideFeedback) lines.push(" - Providing feedback");
    if (this.provideExplanation) lines.push(" - Providing explanation");
    if (this.generateMedia) lines.push(" - Generating media");
    return lines.join("\n");
  }
}
