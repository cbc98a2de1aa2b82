import { Router } from "express";
import { aiConfigSchema } from "../lib/validation.js";
import type { AIGateway } from "../services/ai.js";

export function createSettingsRouter(gateway: AIGateway): Router {
  const router = Router();

  // API keys are reported only as *_key_set
  router.get("/ai", (_req, res) => {
    res.json(gateway.getConfigView());
  });

  router.put("/ai", (req, res) => {
    const input = aiConfigSchema.parse(req.body);
    res.json(gateway.applySettings(input));
  });

  // ?url= probes a server other than the configured one
  router.get("/ai/ollama-models", async (req, res) => {
    const url = typeof req.query.url === "string" && req.query.url.trim()
      ? req.query.url.trim().replace(/\/+$/, "")
      : undefined;
    res.json(await gateway.ollamaStatus(url));
  });

  return router;
}
