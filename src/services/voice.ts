import fs from "fs";
import path from "path";
import { execFile } from "child_process";
import OpenAI from "openai";
import { APP_CONFIG } from "../config";

export interface VoiceArtifact {
  text: string;
  topic: string;
  audioPath: string;
}

/**
 * Text in, audio out. A voice that cannot speak returns null instead of failing.
 */
export interface Voice {
  readonly canSpeak: boolean;
  say(text: string, topic?: string): Promise<VoiceArtifact | null>;
  prepareToSay(text: string, topic?: string): Promise<VoiceArtifact | null>;
}

export type AudioPlayer = (audioPath: string) => Promise<void>;

export const TTS_VOICES = ["alloy", "echo", "fable", "onyx", "nova", "shimmer"] as const;

export type TtsVoice = (typeof TTS_VOICES)[number];

export function toTtsVoice(value: string | undefined, fallback: TtsVoice = "nova"): TtsVoice {
  return TTS_VOICES.find((voice) => voice === value) ?? fallback;
}

/**
 * Play an mp3 with afplay (macOS), falling back to sox's play
 */
export const playAudioFile: AudioPlayer = async (audioPath) => {
  try {
    await runCommand("afplay", [audioPath]);
  } catch {
    await runCommand("play", [audioPath]);
  }
};

function runCommand(command: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(command, args, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

export interface OpenAIVoiceOptions {
  apiKey?: string;
  model?: string;
  voice?: TtsVoice;
  audioDir?: string;
  disabled?: boolean;
  player?: AudioPlayer;
}

/**
 * OpenAIVoice renders speech with the OpenAI TTS API into the audio directory.
 * Without an API key, or with TTS disabled, every call is a logged no-op.
 */
export class OpenAIVoice implements Voice {
  readonly canSpeak: boolean;
  private client: OpenAI | null;
  private model: string;
  private voice: TtsVoice;
  private audioDir: string;
  private player: AudioPlayer;

  constructor(options: OpenAIVoiceOptions = {}) {
    const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
    const disabled = options.disabled ?? APP_CONFIG.disableTts;

    this.canSpeak = Boolean(apiKey) && !disabled;
    this.client = this.canSpeak ? new OpenAI({ apiKey }) : null;
    this.model = options.model ?? APP_CONFIG.ttsModel;
    this.voice = options.voice ?? toTtsVoice(APP_CONFIG.ttsVoice);
    this.audioDir = options.audioDir ?? APP_CONFIG.audioDir;
    this.player = options.player ?? playAudioFile;

    if (!this.canSpeak) {
      console.warn(disabled
        ? "TTS is disabled. Voice functionality will be limited."
        : "TTS is not available. Voice functionality will be limited.");
    }
  }

  /**
   * Render speech to a file without playing it
   */
  async prepareToSay(text: string, topic: string = "tutor"): Promise<VoiceArtifact | null> {
    if (!this.client) {
      console.warn("Cannot speak.");
      return null;
    }

    try {
      const response = await this.client.audio.speech.create({
        model: this.model,
        voice: this.voice,
        input: text,
      });

      if (!fs.existsSync(this.audioDir)) {
        fs.mkdirSync(this.audioDir, { recursive: true });
      }
      const audioPath = path.join(this.audioDir, `${topic}_${Date.now()}.mp3`);
      const buffer = Buffer.from(await response.arrayBuffer());
      fs.writeFileSync(audioPath, buffer);

      return { text, topic, audioPath };
    } catch (error) {
      console.error("Error generating speech:", error);
      return null;
    }
  }

  /**
   * Render and play. Returns null if nothing was voiced.
   */
  async say(text: string, topic: string = "tutor"): Promise<VoiceArtifact | null> {
    const artifact = await this.prepareToSay(text, topic);
    if (!artifact) {
      return null;
    }

    try {
      await this.player(artifact.audioPath);
    } catch (error) {
      console.error("Error playing speech:", error);
      return null;
    }
    return artifact;
  }
}
