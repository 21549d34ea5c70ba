import { Clock, systemClock } from "../domain/clock";
import { SessionError, ValidationError } from "../domain/errors";
import { ActivityRecord } from "../domain/learningActivity";
import { ProgressionSummary } from "../domain/learningProgression";
import { SessionConfig, validateSessionConfig } from "../domain/sessionConfig";
import { SessionContext, SessionProgress, UserAction } from "../domain/sessionContext";
import { SessionRecord } from "../stores/learningMemory";
import {
  ActivityCompletion,
  LearningEngine,
  LearningEngineDeps,
  NewActivity,
  SpotOutcome,
} from "./learningEngine";

export interface SessionCallbacks {
  activityStarted?: (activity: ActivityRecord, outcome: SpotOutcome) => void;
  activityCompleted?: (completion: ActivityCompletion) => void;
  userResponseProcessed?: (outcome: SpotOutcome) => void;
  mediaGenerated?: (mediaPath: string) => void;
  errorOccurred?: (message: string) => void;
}

export interface SessionProgressReport {
  sessionId: string;
  state: SessionProgress;
  currentActivity: string | null;
  elapsedTime: number;
  progression: ProgressionSummary | null;
}

/**
 * A LearningSession is one bounded engagement: a session context plus the
 * engine that runs its activities. Failures are logged and reported to the
 * errorOccurred callback before being rethrown.
 */
export class LearningSession {
  readonly context: SessionContext;
  private engine: LearningEngine | null = null;

  constructor(
    readonly id: string,
    readonly config: SessionConfig,
    private readonly deps: LearningEngineDeps,
    private readonly callbacks: SessionCallbacks = {}
  ) {
    this.context = new SessionContext(deps.clock ?? systemClock);
  }

  get isStarted(): boolean {
    return this.engine !== null;
  }

  start(): void {
    this.guard("start learning session", () => {
      const problems = validateSessionConfig(this.config);
      if (problems.length > 0) {
        throw new ValidationError(`Invalid session configuration: ${problems.join("; ")}`);
      }

      this.deps.memory.beginSession();
      this.engine = new LearningEngine(this.config, this.context, this.deps);
      this.engine.planActivities();
      console.log(`Started learning session ${this.id}`);
    });
  }

  addActivity(activity: NewActivity): ActivityRecord {
    return this.guard("add activity", () => this.requireEngine().addActivity(activity).toRecord());
  }

  async startNextActivity(): Promise<ActivityRecord | null> {
    return this.guardAsync("start activity", async () => {
      const started = await this.requireEngine().startNextActivity();
      if (!started) {
        return null;
      }
      const record = started.activity.toRecord();
      this.notifyMedia(started.outcome);
      this.callbacks.activityStarted?.(record, started.outcome);
      return record;
    });
  }

  async processUserResponse(response: string): Promise<SpotOutcome> {
    return this.guardAsync("process user response", async () => {
      const outcome = await this.requireEngine().processUserResponse(response);
      this.notifyMedia(outcome);
      this.callbacks.userResponseProcessed?.(outcome);
      return outcome;
    });
  }

  completeCurrentActivity(): ActivityCompletion {
    return this.guard("complete activity", () => {
      const completion = this.requireEngine().completeActivity();
      this.callbacks.activityCompleted?.(completion);
      return completion;
    });
  }

  handleUserAction(action: UserAction): void {
    this.guard(`handle user action ${action}`, () => {
      const completion = this.requireEngine().handleUserAction(action);
      if (completion) {
        this.callbacks.activityCompleted?.(completion);
      }
    });
  }

  adjustDifficulty(delta: number): void {
    this.guard("adjust difficulty", () => this.requireEngine().progression.adjustDifficulty(delta));
  }

  reorderActivities(newOrder: number[]): boolean {
    return this.guard("reorder activities", () => this.requireEngine().progression.reorderActivities(newOrder));
  }

  getSessionProgress(): SessionProgressReport {
    return {
      sessionId: this.id,
      state: this.context.getProgress(),
      currentActivity: this.context.currentActivity,
      elapsedTime: this.context.getElapsedTime(),
      progression: this.engine ? this.engine.progression.getProgress() : null,
    };
  }

  /**
   * Summary kept in learning memory once the session has ended
   */
  toRecord(clock: Clock = systemClock): SessionRecord {
    return {
      sessionId: this.id,
      status: this.context.isCancelled ? "cancelled" : "stopped",
      startedAt: new Date(this.context.startTime).toISOString(),
      endedAt: new Date(this.context.endTime ?? clock.now()).toISOString(),
      totalTime: this.context.totalTime,
      activitiesCompleted: this.context.activitiesCompleted.length,
      vocabularyLearned: [...this.context.vocabularyLearned],
      grammarPointsCovered: [...this.context.grammarPointsCovered],
      targetLanguage: this.config.targetLanguage,
    };
  }

  cleanup(): void {
    this.engine?.cleanup();
    this.engine = null;
  }

  // ============================================
  // Private Helpers
  // ============================================

  private requireEngine(): LearningEngine {
    if (!this.engine) {
      throw new SessionError("Session not started");
    }
    return this.engine;
  }

  private notifyMedia(outcome: SpotOutcome): void {
    if (outcome.mediaPath) {
      this.callbacks.mediaGenerated?.(outcome.mediaPath);
    }
  }

  private guard<T>(label: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      this.reportError(label, error);
      throw error;
    }
  }

  private async guardAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.reportError(label, error);
      throw error;
    }
  }

  private reportError(label: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Failed to ${label}:`, error);
    this.callbacks.errorOccurred?.(message);
  }
}
