/**
 * A LearningSpot is one discrete interaction in a learning activity:
 * something the tutor shows or says, and what the learner answered.
 */

export type InteractionType = "text" | "question" | "feedback" | "explanation";

export interface LearningSpotInit {
  content: string;
  createdAt: number;
  interactionType?: InteractionType;
  requiresResponse?: boolean;
  mediaGenerated?: boolean;
}

export class LearningSpot {
  readonly content: string;
  readonly createdAt: number; // epoch ms
  readonly interactionType: InteractionType;
  readonly requiresResponse: boolean;
  readonly userResponses: string[] = [];

  private spoken = false;
  private media: boolean;
  private completedTime?: number;

  constructor(init: LearningSpotInit) {
    this.content = init.content;
    this.createdAt = init.createdAt;
    this.interactionType = init.interactionType ?? "text";
    this.requiresResponse = init.requiresResponse ?? false;
    this.media = init.mediaGenerated ?? false;
  }

  get wasSpoken(): boolean {
    return this.spoken;
  }

  get mediaGenerated(): boolean {
    return this.media;
  }

  get completedAt(): number | undefined {
    return this.completedTime;
  }

  /**
   * Record that the content was actually voiced. There is no way back.
   */
  markSpoken(): void {
    this.spoken = true;
  }

  markMediaGenerated(): void {
    this.media = true;
  }

  addUserResponse(response: string): void {
    this.userResponses.push(response);
  }

  complete(completedAt: number): void {
    if (this.completedTime === undefined) {
      this.completedTime = completedAt;
    }
  }
}

/**
 * Compact, immutable form kept after a spot is evicted from live history.
 */
export interface LearningSpotSnapshot {
  readonly createdAt: number;
  readonly content: string;
  readonly wasSpoken: boolean;
  readonly interactionType: InteractionType;
  readonly requiresResponse: boolean;
  readonly mediaGenerated: boolean;
  readonly activityType: string;
}

export function toSnapshot(spot: LearningSpot, activityType: string): LearningSpotSnapshot {
  return Object.freeze({
    createdAt: spot.createdAt,
    content: spot.content,
    wasSpoken: spot.wasSpoken,
    interactionType: spot.interactionType,
    requiresResponse: spot.requiresResponse,
    mediaGenerated: spot.mediaGenerated,
    activityType,
  });
}
