import express from "express";
import cors from "cors";
import { errorHandler } from "./lib/errors.js";
import playersRouter from "./routes/players.js";
import lineupRouter from "./routes/lineup.js";
import configurationsRouter from "./routes/configurations.js";
import gamesRouter from "./routes/games.js";
import { createAssistantRouter } from "./routes/assistant.js";
import { createSettingsRouter } from "./routes/settings.js";
import type { AIGateway } from "./services/ai.js";

export const API_VERSION = "1.0.0";

export interface AppDeps {
  gateway: AIGateway;
  corsOrigins: string[];
}

export function createApp({ gateway, corsOrigins }: AppDeps): express.Express {
  const app = express();

  app.use(cors({ origin: corsOrigins, credentials: true }));
  app.use(express.json());

  app.get("/", (_req, res) => {
    res.json({ status: "ok", message: "Dugout Baseball Coaching API", version: API_VERSION });
  });

  // Health check
  app.get("/health", async (_req, res) => {
    const config = gateway.getConfig();
    const [connected, ollama] = await Promise.all([gateway.checkConnection(), gateway.ollamaStatus()]);
    res.json({
      api: "ok",
      ai_provider: config.provider,
      ai_connected: connected,
      ollama_models: ollama.models,
    });
  });

  // Routes
  app.use("/players", playersRouter);
  app.use("/", lineupRouter);
  app.use("/configurations", configurationsRouter);
  app.use("/games", gamesRouter);
  app.use("/assistant", createAssistantRouter(gateway));
  app.use("/settings", createSettingsRouter(gateway));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });
  app.use(errorHandler);

  return app;
}
