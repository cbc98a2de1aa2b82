import "dotenv/config";
import { createApp } from "./app.js";
import { loadAIConfig, loadServerConfig } from "./config.js";
import { AIGateway } from "./services/ai.js";
import { initStore } from "./services/store.js";

async function main() {
  const config = loadServerConfig();

  console.log("Initializing data store...");
  await initStore(config.dataDir);
  console.log("Data store ready.");

  const gateway = new AIGateway(loadAIConfig());
  const app = createApp({ gateway, corsOrigins: config.corsOrigins });

  app.listen(config.port, config.host, () => {
    console.log(`API running on http://${config.host}:${config.port}`);
  });

  const ollama = await gateway.ollamaStatus();
  if (ollama.connected) {
    console.log(`Ollama connected at ${ollama.ollama_url} (${ollama.models.length} model(s))`);
  } else {
    console.warn(`Ollama not reachable at ${ollama.ollama_url}; the assistant will be unavailable until it is running.`);
  }
}

main().catch((err) => {
  console.error("Failed to start:", err);
  process.exit(1);
});
