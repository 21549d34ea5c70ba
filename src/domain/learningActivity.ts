import { ValidationError } from "./errors";
import { InteractionType, LearningSpot } from "./learningSpot";

// ============================================
// Types
// ============================================

export const ACTIVITY_TYPES = [
  "vocabulary_builder",
  "grammar_practice",
  "conversation_practice",
  "listening_comprehension",
  "writing_practice",
  "cultural_context",
  "pronunciation_guide",
  "idioms_and_expressions",
  "reading_comprehension",
  "situational_dialogues",
  "visual_vocabulary",
] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export function isActivityType(value: unknown): value is ActivityType {
  return typeof value === "string" && ACTIVITY_TYPES.some((known) => known === value);
}

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 10;

export function clampDifficulty(level: number): number {
  return Math.max(MIN_DIFFICULTY, Math.min(MAX_DIFFICULTY, level));
}

export interface LearningActivityInit {
  activityType: ActivityType;
  content: string;
  expectedResponses?: string[];
  difficultyLevel: number;
  requiresMedia?: boolean;
  mediaGenerated?: boolean;
}

/**
 * Serializable view of an activity (API responses, session results)
 */
export interface ActivityRecord {
  activityType: ActivityType;
  content: string;
  expectedResponses: string[];
  difficultyLevel: number;
  requiresMedia: boolean;
  mediaGenerated: boolean;
  completed: boolean;
  userResponses: string[];
  startTime?: number;
  endTime?: number;
  learningSpot?: {
    content: string;
    createdAt: number;
    interactionType: InteractionType;
    requiresResponse: boolean;
    wasSpoken: boolean;
    userResponses: string[];
  };
}

// ============================================
// LearningActivity
// ============================================

/**
 * One scheduled teaching activity. Its learning spot is created when the
 * activity becomes current, and it is completed exactly once.
 */
export class LearningActivity {
  readonly activityType: ActivityType;
  readonly content: string;
  readonly expectedResponses: readonly string[];
  readonly requiresMedia: boolean;
  readonly userResponses: string[] = [];
  mediaGenerated: boolean;

  private difficulty: number;
  private started?: number;
  private ended?: number;
  private spot?: LearningSpot;

  constructor(init: LearningActivityInit) {
    if (!Number.isInteger(init.difficultyLevel) ||
        init.difficultyLevel < MIN_DIFFICULTY ||
        init.difficultyLevel > MAX_DIFFICULTY) {
      throw new ValidationError(
        `Difficulty level must be an integer between ${MIN_DIFFICULTY} and ${MAX_DIFFICULTY}, got ${init.difficultyLevel}`
      );
    }

    this.activityType = init.activityType;
    this.content = init.content;
    this.expectedResponses = [...(init.expectedResponses ?? [])];
    this.difficulty = init.difficultyLevel;
    this.requiresMedia = init.requiresMedia ?? false;
    this.mediaGenerated = init.mediaGenerated ?? false;
  }

  get difficultyLevel(): number {
    return this.difficulty;
  }

  get startTime(): number | undefined {
    return this.started;
  }

  get endTime(): number | undefined {
    return this.ended;
  }

  get completed(): boolean {
    return this.ended !== undefined;
  }

  get learningSpot(): LearningSpot | undefined {
    return this.spot;
  }

  get requiresResponse(): boolean {
    return this.expectedResponses.length > 0;
  }

  adjustDifficulty(delta: number): void {
    this.difficulty = clampDifficulty(this.difficulty + delta);
  }

  /**
   * Make this the current activity: stamp the start time and attach a fresh spot
   */
  start(now: number): LearningSpot {
    this.started = now;
    this.spot = new LearningSpot({
      content: this.content,
      createdAt: now,
      interactionType: this.requiresResponse ? "question" : "text",
      requiresResponse: this.requiresResponse,
      mediaGenerated: this.mediaGenerated,
    });
    return this.spot;
  }

  markCompleted(now: number): void {
    if (this.started === undefined) {
      throw new ValidationError(`Cannot complete ${this.activityType} before it has started`);
    }
    if (this.ended !== undefined) {
      return;
    }
    this.ended = now;
    this.spot?.complete(now);
  }

  addUserResponse(response: string): void {
    this.userResponses.push(response);
    this.spot?.addUserResponse(response);
  }

  /**
   * Duration in seconds, once completed
   */
  getDuration(): number | null {
    if (this.started === undefined || this.ended === undefined) {
      return null;
    }
    return (this.ended - this.started) / 1000;
  }

  toRecord(): ActivityRecord {
    return {
      activityType: this.activityType,
      content: this.content,
      expectedResponses: [...this.expectedResponses],
      difficultyLevel: this.difficulty,
      requiresMedia: this.requiresMedia,
      mediaGenerated: this.mediaGenerated,
      completed: this.completed,
      userResponses: [...this.userResponses],
      startTime: this.started,
      endTime: this.ended,
      learningSpot: this.spot
        ? {
            content: this.spot.content,
            createdAt: this.spot.createdAt,
            interactionType: this.spot.interactionType,
            requiresResponse: this.spot.requiresResponse,
            wasSpoken: this.spot.wasSpoken,
            userResponses: [...this.spot.userResponses],
          }
        : undefined,
    };
  }
}
