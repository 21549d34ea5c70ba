import { LearningActivity } from "../domain/learningActivity";
import { LanguageTutor } from "../domain/languageTutor";
import { LearningSpotProfile } from "../domain/learningSpotProfile";

const ACTIVITY_LABELS: Record<string, string> = {
  vocabulary_builder: "vocabulary building",
  grammar_practice: "grammar practice",
  conversation_practice: "conversation practice",
  listening_comprehension: "listening comprehension",
  writing_practice: "writing practice",
  cultural_context: "cultural context",
  pronunciation_guide: "pronunciation",
  idioms_and_expressions: "idioms and expressions",
  reading_comprehension: "reading comprehension",
  situational_dialogues: "situational dialogues",
  visual_vocabulary: "visual vocabulary",
};

export function activityLabel(activityType: string): string {
  return ACTIVITY_LABELS[activityType] ?? activityType.replace(/_/g, " ");
}

export interface SpotPromptInput {
  profile: LearningSpotProfile;
  activity: LearningActivity;
  language: string;
  tutor?: LanguageTutor;
  learnerResponse?: string;
  upNext?: string | null;
}

/**
 * Compose the LLM prompt for one learning spot from the profile's decisions.
 * Parts appear in a fixed order: introduction, feedback, explanation, content.
 */
export function buildSpotPrompt(input: SpotPromptInput): string {
  const { profile, activity, language, tutor, learnerResponse, upNext } = input;
  const label = activityLabel(activity.activityType);
  const parts: string[] = [];

  if (profile.provideIntroduction) {
    const who = tutor ? ` as ${tutor.name}` : "";
    parts.push(`Briefly introduce yourself${who} and today's ${label} activity in ${language}.`);
  }

  if (profile.provideFeedback && learnerResponse !== undefined) {
    parts.push(`The learner answered: "${learnerResponse}". Give short, encouraging feedback on that answer.`);
  }

  if (profile.provideExplanation) {
    parts.push("Before asking anything, explain the key idea in one or two simple sentences.");
  }

  if (profile.currentContent) {
    parts.push(`Present this to the learner: ${profile.currentContent}`);
  }

  if (upNext) {
    parts.push(`Wrap up this activity and mention what comes next: ${upNext}`);
  } else if (activity.requiresResponse) {
    parts.push("End with a question the learner can answer.");
  }

  parts.push(`Difficulty level: ${activity.difficultyLevel} of 10. Keep it short enough to be spoken aloud.`);

  return parts.join("\n");
}
