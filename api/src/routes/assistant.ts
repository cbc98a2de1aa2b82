import { once } from "node:events";
import { Router } from "express";
import { HttpError } from "../lib/errors.js";
import { assistantAnalyzeSchema, chatRequestSchema } from "../lib/validation.js";
import { analyze } from "../services/assistant.js";
import type { Writable } from "node:stream";
import type { AIGateway } from "../services/ai.js";

/**
 * Write fragments to `out` as they arrive, waiting for the socket to drain
 * whenever its buffer is full. Stops quietly once `signal` aborts.
 */
export async function relayFragments(
  fragments: AsyncIterable<string>,
  out: Writable,
  signal: AbortSignal
): Promise<void> {
  for await (const chunk of fragments) {
    if (signal.aborted) break;
    if (!out.write(chunk)) {
      try {
        await once(out, "drain", { signal });
      } catch (err) {
        if (!signal.aborted) throw err;
      }
    }
  }
}

export function createAssistantRouter(gateway: AIGateway): Router {
  const router = Router();

  // One-shot analysis of the lineup and defense by the local model
  router.post("/analyze", async (req, res) => {
    const request = assistantAnalyzeSchema.parse(req.body ?? {});

    if (!(await gateway.local().checkConnection())) {
      throw new HttpError(503, "Cannot connect to Ollama. Make sure Ollama is running locally (try 'ollama serve').");
    }

    res.json(await analyze(gateway, request));
  });

  // Relay provider fragments as they arrive. Errors travel in-band.
  router.post("/chat/stream", async (req, res) => {
    const { messages, model } = chatRequestSchema.parse(req.body);

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        console.log("[Assistant] Client disconnected, cancelling stream");
        controller.abort();
      }
    });

    res.status(200);
    res.setHeader("Content-Type", "text/plain; charset=utf-8");
    res.setHeader("Cache-Control", "no-cache");
    res.flushHeaders();

    await relayFragments(gateway.streamChat(messages, model, controller.signal), res, controller.signal);
    res.end();
  });

  return router;
}
