import OpenAI from "openai";
import { APP_CONFIG } from "../config";
import { ChatTurn } from "../domain/languageTutor";

const MAX_CONTEXT_TURNS = 40;

export interface LLMResult {
  content: string;
  context: ChatTurn[];
  contextProvided: boolean;
}

export interface AskOptions {
  systemPrompt?: string;
  context?: ChatTurn[];
  temperature?: number;
}

/**
 * Prompt text in, completion and conversation context out
 */
export interface TutorLLM {
  ask(prompt: string, options?: AskOptions): Promise<LLMResult>;
}

/**
 * OpenAITutorLLM answers tutor prompts with OpenAI chat completions.
 * The chat API is stateless, so the context handed back is the running
 * list of turns, trimmed to the most recent ones.
 */
export class OpenAITutorLLM implements TutorLLM {
  private client: OpenAI;
  private model: string;

  constructor(apiKey?: string, model: string = APP_CONFIG.openaiModel) {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY
    });
    this.model = model;
  }

  async ask(prompt: string, options: AskOptions = {}): Promise<LLMResult> {
    const context = options.context ?? [];
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (options.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    for (const turn of context) {
      if (turn.role === "user") {
        messages.push({ role: "user", content: turn.content });
      } else {
        messages.push({ role: "assistant", content: turn.content });
      }
    }
    messages.push({ role: "user", content: prompt });

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: options.temperature ?? 0.7,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error("No response from LLM");
    }

    const turns: ChatTurn[] = [
      ...context,
      { role: "user", content: prompt },
      { role: "assistant", content },
    ];
    const nextContext: ChatTurn[] = turns.slice(-MAX_CONTEXT_TURNS);

    return {
      content: content.trim(),
      context: nextContext,
      contextProvided: true,
    };
  }
}
