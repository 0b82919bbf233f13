/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults.
 * Validation errors are collected and reported together.
 */

// Load dotenv early so values are present before the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;
  LOG_LEVEL?: string;
  /** Comma-separated origins the UI may call from */
  ALLOWED_ORIGINS?: string;

  // Reasoning service
  OPENAI_API_KEY?: string;
  COMPLIANCE_MODEL: string;
  COMPLIANCE_TEMPERATURE: number;

  // Scheduling and backoff
  COMPLIANCE_CONCURRENCY: number;
  COMPLIANCE_MAX_ATTEMPTS: number;
  COMPLIANCE_BASE_DELAY_MS: number;
  COMPLIANCE_MAX_DELAY_MS: number;
  COMPLIANCE_JITTER_RATIO: number;
  COMPLIANCE_THROTTLE_ABORT_THRESHOLD: number;
  COMPLIANCE_RUN_TIMEOUT_MS: number;
  COMPLIANCE_DRAIN_GRACE_MS: number;

  // Comparison
  COMPLIANCE_CONTEXT_CHAR_LIMIT: number;
  COMPLIANCE_MIN_CONFIDENCE: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(nodeEnvRaw)) {
    nodeEnv = nodeEnvRaw;
  } else {
    errors.push(`NODE_ENV: Invalid value "${nodeEnvRaw}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const concurrency = parseNumericEnv(process.env.COMPLIANCE_CONCURRENCY, 4);
  if (concurrency < 1) {
    errors.push(`COMPLIANCE_CONCURRENCY: Invalid value "${process.env.COMPLIANCE_CONCURRENCY}". Must be at least 1.`);
  }

  const maxAttempts = parseNumericEnv(process.env.COMPLIANCE_MAX_ATTEMPTS, 5);
  if (maxAttempts < 1) {
    errors.push(`COMPLIANCE_MAX_ATTEMPTS: Invalid value "${process.env.COMPLIANCE_MAX_ATTEMPTS}". Must be at least 1.`);
  }

  const jitterRatio = parseFloatEnv(process.env.COMPLIANCE_JITTER_RATIO, 0.2);
  if (jitterRatio < 0 || jitterRatio >= 1) {
    errors.push(`COMPLIANCE_JITTER_RATIO: Invalid value "${process.env.COMPLIANCE_JITTER_RATIO}". Must be in [0, 1).`);
  }

  const throttleThreshold = parseNumericEnv(process.env.COMPLIANCE_THROTTLE_ABORT_THRESHOLD, 3);
  if (throttleThreshold < 1) {
    errors.push(
      `COMPLIANCE_THROTTLE_ABORT_THRESHOLD: Invalid value "${process.env.COMPLIANCE_THROTTLE_ABORT_THRESHOLD}". Must be at least 1.`
    );
  }

  const minConfidence = parseFloatEnv(process.env.COMPLIANCE_MIN_CONFIDENCE, 0.6);
  if (minConfidence < 0 || minConfidence > 1) {
    errors.push(`COMPLIANCE_MIN_CONFIDENCE: Invalid value "${process.env.COMPLIANCE_MIN_CONFIDENCE}". Must be in [0, 1].`);
  }

  if (errors.length > 0) {
    throw new Error(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`
    );
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    LOG_LEVEL: process.env.LOG_LEVEL,
    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,

    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    COMPLIANCE_MODEL: process.env.COMPLIANCE_MODEL || 'gpt-4o-mini',
    COMPLIANCE_TEMPERATURE: parseFloatEnv(process.env.COMPLIANCE_TEMPERATURE, 0),

    COMPLIANCE_CONCURRENCY: concurrency,
    COMPLIANCE_MAX_ATTEMPTS: maxAttempts,
    COMPLIANCE_BASE_DELAY_MS: parseNumericEnv(process.env.COMPLIANCE_BASE_DELAY_MS, 2000),
    COMPLIANCE_MAX_DELAY_MS: parseNumericEnv(process.env.COMPLIANCE_MAX_DELAY_MS, 30000),
    COMPLIANCE_JITTER_RATIO: jitterRatio,
    COMPLIANCE_THROTTLE_ABORT_THRESHOLD: throttleThreshold,
    COMPLIANCE_RUN_TIMEOUT_MS: parseNumericEnv(process.env.COMPLIANCE_RUN_TIMEOUT_MS, 10 * 60 * 1000), // 10 minutes
    COMPLIANCE_DRAIN_GRACE_MS: parseNumericEnv(process.env.COMPLIANCE_DRAIN_GRACE_MS, 10000),

    COMPLIANCE_CONTEXT_CHAR_LIMIT: parseNumericEnv(process.env.COMPLIANCE_CONTEXT_CHAR_LIMIT, 24000),
    COMPLIANCE_MIN_CONFIDENCE: minConfidence,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
