/**
 * Learning Engine
 *
 * Runs the activities of one session. For every interaction it builds a
 * LearningSpotProfile and lets the profile's decisions drive the LLM, the
 * voice and the media hook. Whatever is produced is recorded as a learning
 * spot of the current session.
 */

import { LEARNING_CONFIG, LearningConfig } from "../config";
import { Clock, RandomSource, mathRandom, systemClock } from "../domain/clock";
import { SessionError } from "../domain/errors";
import { LanguageTutor, updateTutorContext } from "../domain/languageTutor";
import {
  ActivityRecord,
  ActivityType,
  LearningActivity,
  LearningActivityInit,
} from "../domain/learningActivity";
import { LearningProgression } from "../domain/learningProgression";
import { InteractionType, LearningSpot } from "../domain/learningSpot";
import { InteractionHistory, LearningSpotProfile } from "../domain/learningSpotProfile";
import { SessionConfig, configuredActivities, difficultyFor } from "../domain/sessionConfig";
import { ActivityResults, SessionContext, UserAction } from "../domain/sessionContext";
import { LearningMemory } from "../stores/learningMemory";
import { TutorLLM } from "./llm";
import { activityLabel, buildSpotPrompt } from "./tutorPrompts";
import { Voice } from "./voice";

// ============================================
// Types
// ============================================

/**
 * Hook for producing an image or other media for a piece of content
 */
export interface MediaGenerator {
  generate(content: string, activityType: ActivityType): Promise<string | null>;
}

export interface LearningEngineDeps {
  memory: LearningMemory;
  llm: TutorLLM;
  voice: Voice;
  tutor?: LanguageTutor;
  media?: MediaGenerator;
  random?: RandomSource;
  clock?: Clock;
  learningConfig?: Partial<LearningConfig>;
}

export interface SpotOutcome {
  spoke: boolean;
  text: string | null;
  voiced: boolean;
  audioPath: string | null;
  mediaPath: string | null;
  spot: LearningSpot | null;
  profile: LearningSpotProfile | null;
}

export interface ActivityStart {
  activity: LearningActivity;
  outcome: SpotOutcome;
}

export interface ActivityCompletion {
  activity: ActivityRecord;
  results: ActivityResults;
}

export type NewActivity = Omit<LearningActivityInit, "difficultyLevel"> & { difficultyLevel?: number };

const SILENT: SpotOutcome = {
  spoke: false,
  text: null,
  voiced: false,
  audioPath: null,
  mediaPath: null,
  spot: null,
  profile: null,
};

// ============================================
// Engine
// ============================================

export class LearningEngine {
  readonly progression: LearningProgression;
  readonly history = new InteractionHistory();

  private readonly memory: LearningMemory;
  private readonly llm: TutorLLM;
  private readonly voice: Voice;
  private readonly tutor?: LanguageTutor;
  private readonly media?: MediaGenerator;
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly learningConfig: LearningConfig;
  private interactionsThisActivity = 0;

  constructor(
    private readonly config: SessionConfig,
    private readonly context: SessionContext,
    deps: LearningEngineDeps
  ) {
    this.memory = deps.memory;
    this.llm = deps.llm;
    this.voice = deps.voice;
    this.tutor = deps.tutor;
    this.media = deps.media;
    this.random = deps.random ?? mathRandom;
    this.clock = deps.clock ?? systemClock;
    this.learningConfig = { ...LEARNING_CONFIG, ...deps.learningConfig };
    this.progression = new LearningProgression(this.memory, config.targetLanguage, this.clock);
  }

  get currentActivity(): LearningActivity | null {
    return this.progression.currentActivity;
  }

  addActivity(init: NewActivity): LearningActivity {
    const activity = new LearningActivity({
      ...init,
      difficultyLevel: init.difficultyLevel ?? difficultyFor(this.config, init.activityType),
    });
    this.progression.addActivity(activity);
    return activity;
  }

  /**
   * Queue one activity for each activity type in the session config
   */
  planActivities(): LearningActivity[] {
    return configuredActivities(this.config).map((activityType) =>
      this.addActivity({
        activityType,
        content: `Let's start with some ${activityLabel(activityType)} in ${this.config.targetLanguage}.`,
      })
    );
  }

  async startNextActivity(): Promise<ActivityStart | null> {
    if (!this.context.isActive()) {
      throw new SessionError("Cannot start activity in inactive session");
    }

    const activity = this.progression.startNextActivity();
    if (!activity) {
      return null;
    }

    this.context.setCurrentActivity(activity.activityType);
    this.interactionsThisActivity = 0;

    const outcome = await this.realizeSpot(activity, activity.content);
    return { activity, outcome };
  }

  async processUserResponse(response: string): Promise<SpotOutcome> {
    const activity = this.progression.currentActivity;
    if (!activity) {
      throw new SessionError("No active activity to process response for");
    }

    this.progression.addUserResponse(response);
    return this.realizeSpot(activity, null, response);
  }

  completeActivity(): ActivityCompletion {
    const activity = this.progression.completeCurrentActivity();
    if (!activity) {
      throw new SessionError("No active activity to complete");
    }

    const results = this.buildResults(activity);
    this.context.completeActivity(activity.activityType, results);

    for (const word of results.newWords ?? []) {
      this.memory.updateVocabulary(this.config.targetLanguage, word);
    }
    for (const point of results.grammarPoints ?? []) {
      this.memory.updateGrammar(this.config.targetLanguage, point);
    }

    return { activity: activity.toRecord(), results };
  }

  /**
   * Apply a user action to the session; skipping completes the current activity
   */
  handleUserAction(action: UserAction): ActivityCompletion | null {
    this.context.updateAction(action);
    if (action === "skip_activity" && this.progression.currentActivity) {
      return this.completeActivity();
    }
    return null;
  }

  cleanup(): void {
    this.history.clear();
    this.interactionsThisActivity = 0;
  }

  // ============================================
  // Spot realization
  // ============================================

  private async realizeSpot(
    activity: LearningActivity,
    content: string | null,
    learnerResponse?: string
  ): Promise<SpotOutcome> {
    if (this.interactionsThisActivity >= this.learningConfig.maxInteractionsPerActivity) {
      console.log(`Interaction limit reached for ${activity.activityType}`);
      return { ...SILENT };
    }
    this.interactionsThisActivity++;

    const profile = new LearningSpotProfile({
      activityType: activity.activityType,
      history: this.history,
      previousSpot: this.memory.getPreviousSessionSpot(0),
      currentContent: content,
      getPreviousSpot: (idx, createdBefore) => this.memory.getPreviousSessionSpot(idx, createdBefore),
      getNextContent: () => this.progression.upcomingActivities[0]?.content ?? null,
      random: this.random,
      clock: this.clock,
      config: this.learningConfig,
      enableVisualLearning: this.config.enableVisualLearning,
    });

    if (!profile.isGoingToSaySomething()) {
      return { ...SILENT, profile };
    }

    profile.setPreparationTime();
    const isLastInteraction =
      this.interactionsThisActivity === this.learningConfig.maxInteractionsPerActivity;
    const prompt = buildSpotPrompt({
      profile,
      activity,
      language: this.config.targetLanguage,
      tutor: this.tutor,
      learnerResponse,
      upNext: isLastInteraction ? profile.getNextContent() : null,
    });
    const result = await this.llm.ask(prompt, {
      systemPrompt: this.tutor?.systemPrompt,
      context: this.tutor?.context,
    });
    if (this.tutor) {
      updateTutorContext(this.tutor, result, this.clock.now());
      if (profile.provideIntroduction) {
        this.tutor.lastGreetingTime = this.clock.now();
      }
    }
    profile.isPrepared = true;

    const spot = new LearningSpot({
      content: result.content,
      createdAt: this.clock.now(),
      interactionType: interactionTypeFor(profile, activity, learnerResponse),
      requiresResponse: activity.requiresResponse,
    });

    const artifact = this.config.enablePronunciationPractice
      ? await this.voice.say(result.content, activity.activityType)
      : null;
    if (artifact) {
      spot.markSpoken();
      profile.markAsSpoken();
    }

    let mediaPath: string | null = null;
    if (profile.generateMedia && this.media) {
      mediaPath = await this.media.generate(content ?? result.content, activity.activityType);
      if (mediaPath) {
        spot.markMediaGenerated();
        activity.mediaGenerated = true;
      }
    }

    this.memory.updateCurrentSessionSpots(spot);

    return {
      spoke: true,
      text: result.content,
      voiced: artifact !== null,
      audioPath: artifact?.audioPath ?? null,
      mediaPath,
      spot,
      profile,
    };
  }

  private buildResults(activity: LearningActivity): ActivityResults {
    const results: ActivityResults = {
      activityType: activity.activityType,
      startTime: activity.startTime,
      endTime: activity.endTime,
      duration: activity.getDuration(),
      responses: [...activity.userResponses],
    };

    if (activity.activityType === "vocabulary_builder") {
      const answers = activity.userResponses.map((r) => r.toLowerCase());
      results.newWords = activity.expectedResponses.filter((word) =>
        answers.some((answer) => answer.includes(word.toLowerCase()))
      );
    } else if (activity.activityType === "grammar_practice") {
      results.grammarPoints = [activity.content];
    }

    return results;
  }
}

function interactionTypeFor(
  profile: LearningSpotProfile,
  activity: LearningActivity,
  learnerResponse?: string
): InteractionType {
  if (profile.provideFeedback && learnerResponse !== undefined) return "feedback";
  if (profile.provideExplanation) return "explanation";
  if (activity.requiresResponse) return "question";
  return "text";
}
