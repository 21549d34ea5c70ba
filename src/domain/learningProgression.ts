import { LearningMemory } from "../stores/learningMemory";
import { Clock, systemClock } from "./clock";
import { SessionError, ValidationError } from "./errors";
import { ActivityRecord, LearningActivity } from "./learningActivity";

export interface ProgressionSummary {
  completedCount: number;
  upcomingCount: number;
  currentActivity: ActivityRecord | null;
  totalActivities: number;
  sessionDuration: number; // seconds spent in completed activities
}

/**
 * LearningProgression sequences the activities of one session.
 *
 * An activity is queued, current, or completed, never more than one of these.
 * Completing an activity archives its learning spot into learning memory.
 */
export class LearningProgression {
  private upcoming: LearningActivity[] = [];
  private completed: LearningActivity[] = [];
  private history: LearningActivity[] = [];
  private current: LearningActivity | null = null;

  constructor(
    private readonly memory: LearningMemory,
    private readonly language: string,
    private readonly clock: Clock = systemClock
  ) {}

  get upcomingActivities(): readonly LearningActivity[] {
    return this.upcoming;
  }

  get completedActivities(): readonly LearningActivity[] {
    return this.completed;
  }

  get activityHistory(): readonly LearningActivity[] {
    return this.history;
  }

  get currentActivity(): LearningActivity | null {
    return this.current;
  }

  addActivity(activity: LearningActivity): void {
    this.upcoming.push(activity);
  }

  /**
   * Pop the next queued activity and make it current. The current activity
   * must be completed first.
   */
  startNextActivity(): LearningActivity | null {
    if (this.current) {
      throw new SessionError("Complete the current activity before starting the next one");
    }
    const next = this.upcoming.shift();
    if (!next) {
      return null;
    }
    next.start(this.clock.now());
    this.current = next;
    return next;
  }

  /**
   * Complete the current activity and archive it. No-op if nothing is current.
   */
  completeCurrentActivity(): LearningActivity | null {
    const activity = this.current;
    if (!activity) {
      return null;
    }

    activity.markCompleted(this.clock.now());
    this.completed.push(activity);
    this.history.push(activity);

    if (activity.learningSpot) {
      this.memory.updateAllLearningSpots(activity.learningSpot, activity.activityType);
    }
    this.memory.updateActivityProgress(this.language, activity.activityType);

    this.current = null;
    return activity;
  }

  addUserResponse(response: string): boolean {
    if (!this.current) {
      return false;
    }
    this.current.addUserResponse(response);
    return true;
  }

  /**
   * Shift the difficulty of every queued activity, staying within 1-10
   */
  adjustDifficulty(delta: number): void {
    for (const activity of this.upcoming) {
      activity.adjustDifficulty(delta);
    }
  }

  /**
   * Reorder the queue. newOrder must be a permutation of the queue's indices;
   * anything else is rejected and the queue is left as it was.
   */
  reorderActivities(newOrder: number[]): boolean {
    const problem = this.checkPermutation(newOrder);
    if (problem) {
      console.error("Invalid reorder:", new ValidationError(problem));
      return false;
    }
    this.upcoming = newOrder.map((index) => this.upcoming[index]);
    return true;
  }

  private checkPermutation(newOrder: number[]): string | null {
    if (newOrder.length !== this.upcoming.length) {
      return `expected ${this.upcoming.length} indices, got ${newOrder.length}`;
    }
    const seen = new Set<number>();
    for (const index of newOrder) {
      if (!Number.isInteger(index) || index < 0 || index >= this.upcoming.length || seen.has(index)) {
        return `index ${index} is out of range or repeated`;
      }
      seen.add(index);
    }
    return null;
  }

  getProgress(): ProgressionSummary {
    const sessionDuration = this.completed.reduce(
      (total, activity) => total + (activity.getDuration() ?? 0),
      0
    );

    return {
      completedCount: this.completed.length,
      upcomingCount: this.upcoming.length,
      currentActivity: this.current ? this.current.toRecord() : null,
      totalActivities: this.history.length,
      sessionDuration,
    };
  }

  saveProgress(): boolean {
    return this.memory.save();
  }
}
