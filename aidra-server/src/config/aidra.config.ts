import { registerAs } from '@nestjs/config';

import { Env, LogLevelName, validateEnv } from './env.validation';

export interface RiskThresholds {
  moderate: number;
  high: number;
  critical: number;
}

export interface AidraConfig {
  port: number;
  logLevel: LogLevelName;
  geminiApiKey: string;
  model: {
    imageModel: string;
    textModel: string;
    maxConcurrency: number;
    schemaRetries: number;
    unavailableRetries: number;
    retryBackoffMs: number;
  };
  analysisTimeoutMs: number;
  maxImageBytes: number;
  risk: RiskThresholds;
  sessions: {
    maxEntries: number;
  };
}

export const toAidraConfig = (env: Env): AidraConfig => ({
  port: env.PORT,
  logLevel: env.LOG_LEVEL,
  geminiApiKey: env.GEMINI_API_KEY,
  model: {
    imageModel: env.IMAGE_MODEL,
    textModel: env.TEXT_MODEL,
    maxConcurrency: env.MODEL_MAX_CONCURRENCY,
    schemaRetries: env.MODEL_SCHEMA_RETRIES,
    unavailableRetries: env.MODEL_UNAVAILABLE_RETRIES,
    retryBackoffMs: env.MODEL_RETRY_BACKOFF_MS,
  },
  analysisTimeoutMs: env.ANALYSIS_TIMEOUT_MS,
  maxImageBytes: env.MAX_IMAGE_BYTES,
  risk: {
    moderate: env.RISK_MODERATE_THRESHOLD,
    high: env.RISK_HIGH_THRESHOLD,
    critical: env.RISK_CRITICAL_THRESHOLD,
  },
  sessions: {
    maxEntries: env.SESSION_MAX_ENTRIES,
  },
});

/** Inject with `@Inject(aidraConfig.KEY) config: AidraConfig`. */
export const aidraConfig = registerAs('aidra', (): AidraConfig =>
  toAidraConfig(validateEnv(process.env)),
);
