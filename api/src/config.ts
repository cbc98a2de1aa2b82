import path from "node:path";
import type { AIConfig, AIProviderName } from "../../shared/types.js";

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";
export const DEFAULT_MODEL = "lyra-coach:latest";

const DEFAULT_CORS_ORIGINS = [
  "http://localhost:8080",
  "http://127.0.0.1:8080",
  "http://localhost:5173",
  "http://127.0.0.1:5173",
  // Desktop shell
  "tauri://localhost",
  "http://tauri.localhost",
  "https://tauri.localhost",
];

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  corsOrigins: string[];
}

function parseProvider(raw: string | undefined): AIProviderName {
  if (raw === "openai" || raw === "anthropic" || raw === "ollama") return raw;
  if (raw) console.warn(`[Config] Unknown AI_PROVIDER "${raw}", using ollama`);
  return "ollama";
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const extraOrigins = (env.CORS_ORIGINS ?? "")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  return {
    port: Number(env.PORT) || 8100,
    host: env.HOST || "0.0.0.0",
    dataDir: path.resolve(env.DATA_DIR || "data"),
    corsOrigins: [...DEFAULT_CORS_ORIGINS, ...extraOrigins],
  };
}

/**
 * Initial AI settings. Cloud keys start null; the gateway reads
 * OPENAI_API_KEY / ANTHROPIC_API_KEY at call time when no key is set.
 */
export function loadAIConfig(env: NodeJS.ProcessEnv = process.env): AIConfig {
  return {
    provider: parseProvider(env.AI_PROVIDER),
    ollama_url: (env.OLLAMA_URL || DEFAULT_OLLAMA_URL).replace(/\/+$/, ""),
    preferred_model: env.AI_PREFERRED_MODEL || DEFAULT_MODEL,
    openai_key: null,
    anthropic_key: null,
  };
}
