import { randomUUID } from "crypto";
import { SessionError } from "../domain/errors";
import { SessionConfig } from "../domain/sessionConfig";
import { UserAction } from "../domain/sessionContext";
import { TutorStore } from "../stores/tutorStore";
import { LearningEngineDeps } from "./learningEngine";
import { LearningSession, SessionCallbacks, SessionProgressReport } from "./learningSession";

/**
 * SessionManager keeps every learning session of the process and allows
 * at most one of them to be active at a time.
 *
 * Ending or cancelling the active session records it in learning memory
 * and saves the memory.
 */
export class SessionManager {
  private sessions: Map<string, LearningSession> = new Map();
  private activeSessionId: string | null = null;

  constructor(
    private readonly deps: LearningEngineDeps,
    private readonly tutorStore?: TutorStore,
    private readonly generateId: () => string = randomUUID
  ) {}

  createSession(config: SessionConfig, callbacks?: SessionCallbacks): string {
    const id = this.generateId();
    const tutor = this.tutorStore
      ? this.tutorStore.findForLanguage(config.targetLanguage) ?? this.tutorStore.getCurrent()
      : this.deps.tutor;

    this.sessions.set(id, new LearningSession(id, config, { ...this.deps, tutor }, callbacks));
    return id;
  }

  getSession(sessionId: string): LearningSession | null {
    return this.sessions.get(sessionId) || null;
  }

  startSession(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionError(`Session ${sessionId} not found`, { notFound: true });
    }
    if (session.isStarted || session.context.hasEnded) {
      throw new SessionError(`Session ${sessionId} has already been started`);
    }
    if (this.activeSessionId) {
      throw new SessionError("Another session is already active");
    }

    session.start();
    this.activeSessionId = sessionId;
  }

  getActiveSession(): LearningSession | null {
    if (!this.activeSessionId) {
      return null;
    }
    return this.sessions.get(this.activeSessionId) || null;
  }

  pauseSession(): void {
    this.requireActive("pause").handleUserAction("pause");
  }

  resumeSession(): void {
    this.requireActive("resume").handleUserAction("resume");
  }

  skipCurrentActivity(): void {
    this.requireActive("skip activity in").handleUserAction("skip_activity");
  }

  endSession(): void {
    this.finish("stop", "end");
  }

  cancelSession(): void {
    this.finish("cancel", "cancel");
  }

  getSessionProgress(): SessionProgressReport | null {
    const session = this.getActiveSession();
    return session ? session.getSessionProgress() : null;
  }

  cleanup(): void {
    for (const session of this.sessions.values()) {
      session.cleanup();
    }
    this.sessions.clear();
    this.activeSessionId = null;
  }

  // ============================================
  // Private Helpers
  // ============================================

  private requireActive(verb: string): LearningSession {
    const session = this.getActiveSession();
    if (!session) {
      throw new SessionError(`No active session to ${verb}`);
    }
    return session;
  }

  private finish(action: Extract<UserAction, "stop" | "cancel">, verb: string): void {
    const session = this.requireActive(verb);
    session.handleUserAction(action);
    this.activeSessionId = null;

    this.deps.memory.addSessionToHistory(session.toRecord(this.deps.clock));
    this.deps.memory.save();
  }
}
