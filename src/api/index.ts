import express from "express";
import cors from "cors";

import { APP_CONFIG } from "../config";
import { LearningMemory } from "../stores/learningMemory";
import { TutorStore } from "../stores/tutorStore";
import { OpenAITutorLLM } from "../services/llm";
import { OpenAIVoice } from "../services/voice";
import { SessionManager } from "../services/sessionManager";
import { createSessionsRouter } from "./routes/sessions";

const memory = new LearningMemory();
memory.load();

const tutorStore = new TutorStore();
const manager = new SessionManager(
  {
    memory,
    llm: new OpenAITutorLLM(),
    voice: new OpenAIVoice(),
  },
  tutorStore
);

const app = express();
const PORT = APP_CONFIG.apiPort;

// Middleware
app.use(cors({
  origin: ["http://localhost:5173", "http://localhost:3000"],
  credentials: true,
}));
app.use(express.json());

// Routes
app.use("/api/sessions", createSessionsRouter(manager));

app.get("/api/tutors", (req, res) => {
  res.json(tutorStore.list().map(({ context, ...tutor }) => ({ ...tutor, contextTurns: context.length })));
});

// Health check
app.get("/api/health", (req, res) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Save learning memory on shutdown
process.on("SIGINT", () => {
  memory.save();
  process.exit(0);
});

// Start server
app.listen(PORT, () => {
  console.log(`API server running on http://localhost:${PORT}`);
});

export default app;
