/**
 * Session Context
 *
 * Session-wide counters plus the pause/resume/stop state machine.
 *
 * timeSpent only grows on resume, by the length of the pause that just
 * ended; getElapsedTime() reports it while paused.
 */

import { Clock, secondsBetween, systemClock } from "./clock";

export type SessionState = "active" | "paused" | "stopped" | "cancelled";

export type UserAction = "none" | "pause" | "resume" | "stop" | "skip_activity" | "cancel";

export const USER_ACTIONS: readonly UserAction[] = ["none", "pause", "resume", "stop", "skip_activity", "cancel"];

export function isUserAction(value: unknown): value is UserAction {
  return typeof value === "string" && USER_ACTIONS.some((known) => known === value);
}

export type ActivityResults = Record<string, unknown> & {
  newWords?: string[];
  grammarPoints?: string[];
};

export interface CompletedActivityEntry {
  activity: string;
  results: ActivityResults;
  completionTime: number;
}

export interface SessionProgress {
  state: SessionState;
  activitiesCompleted: number;
  vocabularyLearned: number;
  grammarPointsCovered: number;
  timeSpent: number;
  isPaused: boolean;
  currentActivity: string | null;
}

export class SessionContext {
  readonly startTime: number;
  readonly activitiesCompleted: CompletedActivityEntry[] = [];
  readonly vocabularyLearned: string[] = [];
  readonly grammarPointsCovered: string[] = [];

  timeSpent = 0; // seconds
  currentActivity: string | null = null;
  pauseTime: number | null = null;
  endTime: number | null = null;
  totalTime: number | null = null; // seconds
  lastUserAction: UserAction = "none";
  lastActionTime: number;

  private sessionState: SessionState = "active";
  private skipRequested = false;

  constructor(private readonly clock: Clock = systemClock) {
    this.startTime = clock.now();
    this.lastActionTime = this.startTime;
  }

  get state(): SessionState {
    return this.sessionState;
  }

  get isPaused(): boolean {
    return this.sessionState === "paused";
  }

  get isCancelled(): boolean {
    return this.sessionState === "cancelled";
  }

  get hasEnded(): boolean {
    return this.sessionState === "stopped" || this.sessionState === "cancelled";
  }

  updateAction(action: UserAction): void {
    const now = this.clock.now();
    this.lastUserAction = action;
    this.lastActionTime = now;

    switch (action) {
      case "pause":
        this.pause(now);
        break;
      case "resume":
        this.resume(now);
        break;
      case "stop":
        this.end(now, this.sessionState === "cancelled" ? "cancelled" : "stopped");
        break;
      case "cancel":
        this.end(now, "cancelled");
        break;
      case "skip_activity":
        this.skipRequested = true;
        break;
      case "none":
        break;
    }
  }

  private pause(now: number): void {
    if (this.hasEnded) return;
    this.sessionState = "paused";
    this.pauseTime = now;
  }

  private resume(now: number): void {
    if (this.hasEnded) return;
    this.sessionState = "active";
    if (this.pauseTime !== null) {
      this.timeSpent += secondsBetween(this.pauseTime, now);
      this.pauseTime = null;
    }
  }

  // Not guarded: a second stop overwrites the end time
  private end(now: number, state: "stopped" | "cancelled"): void {
    this.sessionState = state;
    this.endTime = now;
    this.totalTime = secondsBetween(this.startTime, now);
  }

  completeActivity(activity: string, results: ActivityResults): void {
    this.activitiesCompleted.push({
      activity,
      results,
      completionTime: this.clock.now(),
    });

    if (activity === "vocabulary_builder") {
      this.vocabularyLearned.push(...(results.newWords ?? []));
    } else if (activity === "grammar_practice") {
      this.grammarPointsCovered.push(...(results.grammarPoints ?? []));
    }
  }

  setCurrentActivity(activity: string): void {
    this.currentActivity = activity;
    this.skipRequested = false;
  }

  shouldSkipCurrentActivity(): boolean {
    return this.skipRequested;
  }

  isActive(): boolean {
    return this.sessionState === "active";
  }

  /**
   * Seconds elapsed: the total once ended, timeSpent while paused, otherwise time since start
   */
  getElapsedTime(): number {
    if (this.endTime !== null && this.totalTime !== null) {
      return this.totalTime;
    }
    if (this.isPaused && this.pauseTime !== null) {
      return this.timeSpent;
    }
    return secondsBetween(this.startTime, this.clock.now());
  }

  getProgress(): SessionProgress {
    return {
      state: this.sessionState,
      activitiesCompleted: this.activitiesCompleted.length,
      vocabularyLearned: this.vocabularyLearned.length,
      grammarPointsCovered: this.grammarPointsCovered.length,
      timeSpent: this.timeSpent,
      isPaused: this.isPaused,
      currentActivity: this.currentActivity,
    };
  }
}
