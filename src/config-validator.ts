import type { AppConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - REST rate limits are positive integers
 * - pipeline.maxRetries is a non-negative integer (0-10)
 * - pipeline.maxWorkers is in valid range (1-32)
 * - model and market-data timeouts are positive
 * - analytics lookback is in valid range (1-365)
 * - the selected agent provider has a credential (warning)
 */
export function validateConfig(cfg: AppConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  for (const [name, value] of [["rest.rateLimit", cfg.rest.rateLimit], ["rest.tradeRateLimit", cfg.rest.tradeRateLimit]] as const) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (!Number.isInteger(cfg.pipeline.maxRetries) || cfg.pipeline.maxRetries < 0 || cfg.pipeline.maxRetries > 10) {
    errors.push(`pipeline.maxRetries must be between 0 and 10, got ${cfg.pipeline.maxRetries}`);
  }

  if (!Number.isInteger(cfg.pipeline.maxWorkers) || cfg.pipeline.maxWorkers < 1 || cfg.pipeline.maxWorkers > 32) {
    errors.push(`pipeline.maxWorkers must be between 1 and 32, got ${cfg.pipeline.maxWorkers}`);
  }

  if (!Number.isInteger(cfg.agents.timeoutMs) || cfg.agents.timeoutMs <= 0) {
    errors.push(`agents.timeoutMs must be positive, got ${cfg.agents.timeoutMs}`);
  }

  if (!Number.isInteger(cfg.market.timeoutMs) || cfg.market.timeoutMs <= 0) {
    errors.push(`market.timeoutMs must be positive, got ${cfg.market.timeoutMs}`);
  }

  if (!Number.isInteger(cfg.analytics.defaultDays) || cfg.analytics.defaultDays < 1 || cfg.analytics.defaultDays > 365) {
    errors.push(`analytics.defaultDays must be between 1 and 365, got ${cfg.analytics.defaultDays}`);
  }

  const credential = {
    claude: cfg.agents.anthropicApiKey,
    openai: cfg.agents.openaiApiKey,
    gemini: cfg.agents.googleAiApiKey,
  }[cfg.agents.provider];
  if (!credential) {
    warnings.push(`No API key configured for agent provider "${cfg.agents.provider}"; trades will fail until one is set`);
  }

  return { errors, warnings };
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}
