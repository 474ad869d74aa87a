import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

export type AgentProviderId = "claude" | "openai" | "gemini";

function parseProvider(raw: string | undefined): AgentProviderId {
  const value = (raw ?? "claude").toLowerCase();
  if (value === "openai" || value === "gemini") return value;
  return "claude";
}

const workspaceDir = path.resolve(process.env.WORKSPACE_DIR ?? "data");

export const config = {
  rest: {
    port: parseInt(process.env.REST_PORT ?? "3000", 10),
    /** Requests per minute per API key */
    rateLimit: parseInt(process.env.REST_RATE_LIMIT ?? "100", 10),
    tradeRateLimit: parseInt(process.env.REST_TRADE_RATE_LIMIT ?? "10", 10),
  },
  workspace: {
    dir: workspaceDir,
    dbPath: process.env.DB_PATH ?? path.join(workspaceDir, "hedge-desk.db"),
    logsDir: path.join(workspaceDir, "logs"),
  },
  agents: {
    provider: parseProvider(process.env.AGENT_PROVIDER),
    anthropicApiKey: process.env.ANTHROPIC_API_KEY ?? "",
    openaiApiKey: process.env.OPENAI_API_KEY ?? "",
    googleAiApiKey: process.env.GOOGLE_AI_API_KEY ?? process.env.GOOGLE_API_KEY ?? "",
    claudeModel: process.env.CLAUDE_MODEL ?? "claude-sonnet-4-20250514",
    openaiModel: process.env.OPENAI_MODEL ?? "gpt-4o",
    geminiModel: process.env.GEMINI_MODEL ?? "gemini-2.5-flash",
    temperature: parseFloat(process.env.MODEL_TEMPERATURE ?? "0"),
    maxTokens: parseInt(process.env.MODEL_MAX_TOKENS ?? "2048", 10),
    timeoutMs: parseInt(process.env.MODEL_TIMEOUT_MS ?? "60000", 10),
  },
  market: {
    timeoutMs: parseInt(process.env.MARKET_DATA_TIMEOUT_MS ?? "10000", 10),
    historyDays: parseInt(process.env.MARKET_HISTORY_DAYS ?? "120", 10),
  },
  pipeline: {
    /** Re-thesis attempts allowed after a risk rejection */
    maxRetries: parseInt(process.env.PIPELINE_MAX_RETRIES ?? "2", 10),
    /** Upper bound on concurrent per-stock pipelines within one trade */
    maxWorkers: parseInt(process.env.PIPELINE_MAX_WORKERS ?? "4", 10),
  },
  analytics: {
    defaultDays: parseInt(process.env.ANALYTICS_DEFAULT_DAYS ?? "30", 10),
    cacheTtlMs: parseInt(process.env.ANALYTICS_CACHE_TTL_MS ?? "60000", 10),
  },
  logging: {
    level: process.env.LOG_LEVEL ?? "info",
  },
};

export type AppConfig = typeof config;
