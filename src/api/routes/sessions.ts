import { Response, Router } from "express";
import { SessionError, ValidationError } from "../../domain/errors";
import { isActivityType } from "../../domain/learningActivity";
import { createSessionConfig } from "../../domain/sessionConfig";
import { SessionManager } from "../../services/sessionManager";
import { SpotOutcome } from "../../services/learningEngine";

/**
 * Map a thrown error to a response. Internals never reach the client.
 */
function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message });
    return;
  }
  if (error instanceof SessionError) {
    res.status(error.notFound ? 404 : 409).json({ error: error.message });
    return;
  }
  console.error(`${fallback}:`, error);
  res.status(500).json({ error: fallback });
}

function toSpotResponse(outcome: SpotOutcome) {
  return {
    spoke: outcome.spoke,
    text: outcome.text,
    voiced: outcome.voiced,
    audioPath: outcome.audioPath,
    mediaPath: outcome.mediaPath,
    interactionType: outcome.spot?.interactionType ?? null,
  };
}

export function createSessionsRouter(manager: SessionManager): Router {
  const router = Router();

  // POST /api/sessions - Create a session from a config
  router.post("/", (req, res) => {
    try {
      const config = createSessionConfig(req.body);
      const id = manager.createSession(config);
      res.status(201).json({ id, config });
    } catch (error) {
      sendError(res, error, "Failed to create session");
    }
  });

  // POST /api/sessions/:id/start - Make a session the active one
  router.post("/:id/start", (req, res) => {
    try {
      manager.startSession(req.params.id);
      res.json(manager.getSessionProgress());
    } catch (error) {
      sendError(res, error, "Failed to start session");
    }
  });

  // GET /api/sessions/active - Progress of the active session
  router.get("/active", (req, res) => {
    const progress = manager.getSessionProgress();
    if (!progress) {
      return res.status(404).json({ error: "No active session" });
    }
    res.json(progress);
  });

  // POST /api/sessions/active/actions - pause, resume, skip_activity, stop, cancel
  router.post("/active/actions", (req, res) => {
    try {
      const { action } = req.body;
      switch (action) {
        case "pause":
          manager.pauseSession();
          break;
        case "resume":
          manager.resumeSession();
          break;
        case "skip_activity":
          manager.skipCurrentActivity();
          break;
        case "stop":
          manager.endSession();
          return res.json({ status: "stopped" });
        case "cancel":
          manager.cancelSession();
          return res.json({ status: "cancelled" });
        default:
          return res.status(400).json({
            error: "action must be one of pause, resume, skip_activity, stop, cancel",
          });
      }
      res.json(manager.getSessionProgress());
    } catch (error) {
      sendError(res, error, "Failed to apply action");
    }
  });

  // POST /api/sessions/active/activities - Queue an activity
  router.post("/active/activities", (req, res) => {
    try {
      const session = manager.getActiveSession();
      if (!session) {
        return res.status(409).json({ error: "No active session" });
      }

      const { activityType, content, expectedResponses, difficultyLevel, requiresMedia } = req.body;
      if (!isActivityType(activityType) || typeof content !== "string" || !content.trim()) {
        return res.status(400).json({ error: "A known activityType and non-empty content are required" });
      }

      const activity = session.addActivity({
        activityType,
        content,
        expectedResponses: Array.isArray(expectedResponses) ? expectedResponses.map(String) : [],
        difficultyLevel: difficultyLevel === undefined ? undefined : Number(difficultyLevel),
        requiresMedia: requiresMedia === true,
      });
      res.status(201).json(activity);
    } catch (error) {
      sendError(res, error, "Failed to add activity");
    }
  });

  // POST /api/sessions/active/activities/next - Start the next queued activity
  router.post("/active/activities/next", async (req, res) => {
    try {
      const session = manager.getActiveSession();
      if (!session) {
        return res.status(409).json({ error: "No active session" });
      }
      const activity = await session.startNextActivity();
      if (!activity) {
        return res.status(404).json({ error: "No activities left" });
      }
      res.json(activity);
    } catch (error) {
      sendError(res, error, "Failed to start activity");
    }
  });

  // POST /api/sessions/active/responses - Learner answers the current activity
  router.post("/active/responses", async (req, res) => {
    try {
      const session = manager.getActiveSession();
      if (!session) {
        return res.status(409).json({ error: "No active session" });
      }
      const { response } = req.body;
      if (typeof response !== "string" || !response.trim()) {
        return res.status(400).json({ error: "response is required" });
      }
      const outcome = await session.processUserResponse(response.trim());
      res.json(toSpotResponse(outcome));
    } catch (error) {
      sendError(res, error, "Failed to process response");
    }
  });

  // POST /api/sessions/active/activities/complete - Finish the current activity
  router.post("/active/activities/complete", (req, res) => {
    try {
      const session = manager.getActiveSession();
      if (!session) {
        return res.status(409).json({ error: "No active session" });
      }
      res.json(session.completeCurrentActivity());
    } catch (error) {
      sendError(res, error, "Failed to complete activity");
    }
  });

  // POST /api/sessions/active/difficulty - Shift difficulty of queued activities
  router.post("/active/difficulty", (req, res) => {
    try {
      const session = manager.getActiveSession();
      if (!session) {
        return res.status(409).json({ error: "No active session" });
      }
      const delta = Number(req.body.delta);
      if (!Number.isInteger(delta)) {
        return res.status(400).json({ error: "delta must be an integer" });
      }
      session.adjustDifficulty(delta);
      res.json(session.getSessionProgress());
    } catch (error) {
      sendError(res, error, "Failed to adjust difficulty");
    }
  });

  // PUT /api/sessions/active/activities/order - Reorder queued activities
  router.put("/active/activities/order", (req, res) => {
    try {
      const session = manager.getActiveSession();
      if (!session) {
        return res.status(409).json({ error: "No active session" });
      }
      const { order } = req.body;
      if (!Array.isArray(order) || !session.reorderActivities(order.map(Number))) {
        return res.status(400).json({ error: "order must be a permutation of the queued activity indices" });
      }
      res.json(session.getSessionProgress());
    } catch (error) {
      sendError(res, error, "Failed to reorder activities");
    }
  });

  return router;
}
