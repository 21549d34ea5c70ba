import fs from "fs";
import path from "path";
import { APP_CONFIG } from "../config";
import { StorageWarning } from "../domain/errors";
import { LearningSpot, LearningSpotSnapshot, toSnapshot } from "../domain/learningSpot";

const MAX_SESSION_HISTORY = 100;

/**
 * Summary of a finished session kept in learning memory
 */
export interface SessionRecord {
  sessionId: string;
  status: "stopped" | "cancelled";
  startedAt: string;
  endedAt?: string;
  totalTime: number | null; // seconds
  activitiesCompleted: number;
  vocabularyLearned: string[];
  grammarPointsCovered: string[];
  targetLanguage: string;
}

/**
 * What goes to disk. Live spot lists are session-local and never persisted.
 */
export interface PersistedLearningMemory {
  vocabularyLearned: Record<string, string[]>;
  grammarPointsCovered: Record<string, string[]>;
  activityProgress: Record<string, Record<string, number>>;
  sessionHistory: SessionRecord[];
  historicalSnapshots: LearningSpotSnapshot[];
  lastUpdated: string;
}

export interface LearningMemoryOptions {
  filePath?: string;
  maxMemorySize?: number;
  maxHistoricalSnapshots?: number;
}

interface TrackedSpot {
  spot: LearningSpot;
  activityType: string;
}

/**
 * LearningMemory holds learning spots and progress across sessions.
 *
 * One instance per process, passed to whatever needs it. The live spot
 * lists are bounded (most recent first); spots pushed past the cap become
 * historical snapshots, which are in turn purged oldest-first.
 */
export class LearningMemory {
  readonly filePath: string;
  readonly maxMemorySize: number;
  readonly maxHistoricalSnapshots: number;

  private allSpots: TrackedSpot[] = [];
  private sessionSpots: LearningSpot[] = [];
  private previousSessionSpots: LearningSpot[] = [];
  private snapshots: Map<number, LearningSpotSnapshot> = new Map();

  private vocabulary: Map<string, string[]> = new Map();
  private grammar: Map<string, string[]> = new Map();
  private progress: Map<string, Map<string, number>> = new Map();
  private sessions: SessionRecord[] = [];

  constructor(options: LearningMemoryOptions = {}) {
    this.filePath = options.filePath ?? APP_CONFIG.memoryFile;
    this.maxMemorySize = options.maxMemorySize ?? APP_CONFIG.maxMemorySize;
    this.maxHistoricalSnapshots = options.maxHistoricalSnapshots ?? APP_CONFIG.maxHistoricalSnapshots;
  }

  // ============================================
  // Learning spots
  // ============================================

  get allLearningSpots(): LearningSpot[] {
    return this.allSpots.map((tracked) => tracked.spot);
  }

  get currentSessionSpots(): readonly LearningSpot[] {
    return this.sessionSpots;
  }

  get lastSessionSpots(): readonly LearningSpot[] {
    return this.previousSessionSpots;
  }

  /**
   * Snapshots ordered oldest first
   */
  get historicalSnapshots(): LearningSpotSnapshot[] {
    return [...this.snapshots.values()].sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * Record a finished spot. Anything beyond maxMemorySize is turned into a snapshot.
   */
  updateAllLearningSpots(spot: LearningSpot, activityType: string): void {
    this.allSpots.unshift({ spot, activityType });

    if (this.allSpots.length > this.maxMemorySize) {
      const evicted = this.allSpots.slice(this.maxMemorySize);
      this.allSpots = this.allSpots.slice(0, this.maxMemorySize);
      for (const tracked of evicted) {
        this.addHistoricalSnapshot(toSnapshot(tracked.spot, tracked.activityType));
      }
    }
  }

  addHistoricalSnapshot(snapshot: LearningSpotSnapshot): void {
    this.snapshots.set(snapshot.createdAt, snapshot);

    if (this.snapshots.size > this.maxHistoricalSnapshots) {
      const oldest = [...this.snapshots.keys()]
        .sort((a, b) => a - b)
        .slice(0, this.snapshots.size - this.maxHistoricalSnapshots);
      for (const key of oldest) {
        this.snapshots.delete(key);
      }
    }
  }

  updateCurrentSessionSpots(spot: LearningSpot): void {
    this.sessionSpots.unshift(spot);
    if (this.sessionSpots.length > this.maxMemorySize) {
      this.sessionSpots = this.sessionSpots.slice(0, this.maxMemorySize);
    }
  }

  /**
   * Start a new session: the current session's spots become the last session's
   */
  beginSession(): void {
    this.previousSessionSpots = this.sessionSpots;
    this.sessionSpots = [];
  }

  /**
   * Get a previous spot of the current session, most recent first.
   *
   * Without createdBefore this is simply the spot at idx. With it, idx is
   * used twice: the scan for the first spot older than createdBefore starts
   * at idx, and the result is idx positions past that spot.
   */
  getPreviousSessionSpot(idx: number = 0, createdBefore?: number): LearningSpot | null {
    if (this.sessionSpots.length <= idx) {
      return null;
    }
    if (createdBefore === undefined) {
      return this.sessionSpots[idx];
    }

    const cutoff = this.findCutoffPosition(idx, createdBefore);
    if (cutoff === null) {
      return null;
    }
    return this.offsetFrom(cutoff, idx);
  }

  private findCutoffPosition(start: number, createdBefore: number): number | null {
    for (let position = start; position < this.sessionSpots.length; position++) {
      if (this.sessionSpots[position].createdAt < createdBefore) {
        return position;
      }
    }
    return null;
  }

  private offsetFrom(position: number, offset: number): LearningSpot | null {
    return this.sessionSpots[position + offset] ?? null;
  }

  // ============================================
  // Progress tracking
  // ============================================

  updateVocabulary(language: string, word: string): void {
    addUnique(this.vocabulary, language, word);
  }

  updateGrammar(language: string, grammarPoint: string): void {
    addUnique(this.grammar, language, grammarPoint);
  }

  updateActivityProgress(language: string, activityType: string): void {
    let counts = this.progress.get(language);
    if (!counts) {
      counts = new Map();
      this.progress.set(language, counts);
    }
    counts.set(activityType, (counts.get(activityType) ?? 0) + 1);
  }

  addSessionToHistory(session: SessionRecord): void {
    this.sessions.push(session);
    if (this.sessions.length > MAX_SESSION_HISTORY) {
      this.sessions = this.sessions.slice(-MAX_SESSION_HISTORY);
    }
  }

  getVocabulary(language: string): string[] {
    return [...(this.vocabulary.get(language) ?? [])];
  }

  getGrammarPoints(language: string): string[] {
    return [...(this.grammar.get(language) ?? [])];
  }

  getActivityProgress(language: string): Record<string, number> {
    return Object.fromEntries(this.progress.get(language) ?? []);
  }

  get sessionHistory(): readonly SessionRecord[] {
    return this.sessions;
  }

  // ============================================
  // Persistence
  // ============================================

  /**
   * Load the persisted projection. A missing file means a fresh start;
   * any other failure is logged and leaves the current state alone.
   */
  load(): void {
    if (!fs.existsSync(this.filePath)) {
      this.vocabulary = new Map();
      this.grammar = new Map();
      this.progress = new Map();
      this.sessions = [];
      return;
    }

    try {
      const content = fs.readFileSync(this.filePath, "utf-8");
      const data = JSON.parse(content) as Partial<PersistedLearningMemory>;

      this.vocabulary = new Map(Object.entries(data.vocabularyLearned ?? {}));
      this.grammar = new Map(Object.entries(data.grammarPointsCovered ?? {}));
      this.progress = new Map(
        Object.entries(data.activityProgress ?? {}).map(([language, counts]): [string, Map<string, number>] => [
          language,
          new Map(Object.entries(counts)),
        ])
      );
      this.sessions = data.sessionHistory ?? [];
      this.snapshots = new Map();
      for (const snapshot of data.historicalSnapshots ?? []) {
        this.addHistoricalSnapshot(Object.freeze(snapshot));
      }
    } catch (err) {
      console.error("Error loading learning memory:", new StorageWarning(`Could not read ${this.filePath}`, err));
    }
  }

  /**
   * Write the persisted projection. Returns false if it could not be written.
   */
  save(): boolean {
    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(this.filePath, JSON.stringify(this.toPersisted(), null, 2));
      return true;
    } catch (err) {
      console.error("Error saving learning memory:", new StorageWarning(`Could not write ${this.filePath}`, err));
      return false;
    }
  }

  toPersisted(): PersistedLearningMemory {
    return {
      vocabularyLearned: Object.fromEntries(this.vocabulary),
      grammarPointsCovered: Object.fromEntries(this.grammar),
      activityProgress: Object.fromEntries(
        [...this.progress].map(([language, counts]): [string, Record<string, number>] => [
          language,
          Object.fromEntries(counts),
        ])
      ),
      sessionHistory: [...this.sessions],
      historicalSnapshots: this.historicalSnapshots,
      lastUpdated: new Date().toISOString(),
    };
  }
}

function addUnique(map: Map<string, string[]>, key: string, value: string): void {
  const values = map.get(key);
  if (!values) {
    map.set(key, [value]);
  } else if (!values.includes(value)) {
    values.push(value);
  }
}
