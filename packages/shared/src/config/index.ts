/**
 * Configuration management for RemedyOps
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

// Load environment variables - try multiple locations
// When running from a workspace directory (apps/api), CWD is not the repo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  dotenvConfig({ path: envPath });
}

// A blank environment value counts as unset, so the default applies
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((val) => (val === '' ? undefined : val), schema);

// Accepts "true"/"false"/"1"/"0" strings from the environment
const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => (typeof val === 'boolean' ? val : ['true', '1', 'yes'].includes(val.toLowerCase())));

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Server
  server: z.object({
    port: unsetIfBlank(z.coerce.number().default(8000)),
    host: z.string().default('0.0.0.0'),
    corsOrigin: z.string().default('*'),
  }),

  // Database
  database: z.object({
    path: z.string().default('./data/remedyops.db'),
  }),

  // Monitor loop
  monitor: z.object({
    intervalMs: unsetIfBlank(z.coerce.number().int().positive().default(5000)),
    autoStart: unsetIfBlank(envBoolean.default(true)),
  }),

  // Decision thresholds
  thresholds: z.object({
    autoFix: unsetIfBlank(z.coerce.number().min(0).max(1).default(0.85)),
    escalation: unsetIfBlank(z.coerce.number().min(0).max(1).default(0.5)),
  }),

  // Apply-and-verify
  verify: z.object({
    attempts: unsetIfBlank(z.coerce.number().int().positive().default(4)),
    settleMs: unsetIfBlank(z.coerce.number().int().nonnegative().default(3000)),
    retryDelayMs: unsetIfBlank(z.coerce.number().int().nonnegative().default(3000)),
    maxWallClockMs: unsetIfBlank(z.coerce.number().int().positive().default(60000)),
  }),

  // Reasoning engine (optional - rule-based fallback when absent)
  reasoning: z.object({
    apiKey: z.string().default(''),
    model: z.string().default('gemini-2.5-flash'),
    timeoutMs: unsetIfBlank(z.coerce.number().int().positive().default(30000)),
    maxRetries: unsetIfBlank(z.coerce.number().int().positive().default(2)),
  }),

  // Execution sandbox
  sandbox: z.object({
    shell: z.string().default('/bin/sh'),
    timeoutMs: unsetIfBlank(z.coerce.number().int().positive().default(15000)),
    outputLimit: unsetIfBlank(z.coerce.number().int().positive().default(5000)),
  }),

  // Remote safety validation (optional - local gate when absent)
  safety: z.object({
    apiKey: z.string().default(''),
    apiUrl: unsetIfBlank(z.string().url().default('https://api.whitecircle.ai/v1')),
    deploymentId: z.string().default(''),
    timeoutMs: unsetIfBlank(z.coerce.number().int().positive().default(15000)),
  }),

  // Speech synthesis (optional)
  speech: z.object({
    apiKey: z.string().default(''),
    voiceId: z.string().default('21m00Tcm4TlvDq8ikWAM'),
    timeoutMs: unsetIfBlank(z.coerce.number().int().positive().default(20000)),
  }),

  // Monitored service
  service: z.object({
    name: z.string().default('target-app'),
    healthUrl: unsetIfBlank(z.string().url().default('http://127.0.0.1:8001/health')),
    workdir: z.string().default('./target_app'),
    startCommand: z.string().default(''),
    healthTimeoutMs: unsetIfBlank(z.coerce.number().int().positive().default(5000)),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    server: {
      port: process.env.PORT,
      host: process.env.HOST,
      corsOrigin: process.env.CORS_ORIGIN,
    },

    database: {
      path: process.env.DATABASE_PATH,
    },

    monitor: {
      intervalMs: process.env.MONITOR_INTERVAL_MS,
      autoStart: process.env.MONITOR_AUTO_START,
    },

    thresholds: {
      autoFix: process.env.AUTO_FIX_THRESHOLD,
      escalation: process.env.ESCALATION_THRESHOLD,
    },

    verify: {
      attempts: process.env.VERIFY_ATTEMPTS,
      settleMs: process.env.VERIFY_SETTLE_MS,
      retryDelayMs: process.env.VERIFY_RETRY_DELAY_MS,
      maxWallClockMs: process.env.VERIFY_MAX_WALL_CLOCK_MS,
    },

    reasoning: {
      apiKey: process.env.GEMINI_API_KEY,
      model: process.env.GEMINI_MODEL,
      timeoutMs: process.env.REASONING_TIMEOUT_MS,
      maxRetries: process.env.REASONING_MAX_RETRIES,
    },

    sandbox: {
      shell: process.env.SANDBOX_SHELL,
      timeoutMs: process.env.SANDBOX_TIMEOUT_MS,
      outputLimit: process.env.SANDBOX_OUTPUT_LIMIT,
    },

    safety: {
      apiKey: process.env.SAFETY_API_KEY,
      apiUrl: process.env.SAFETY_API_URL,
      deploymentId: process.env.SAFETY_DEPLOYMENT_ID,
      timeoutMs: process.env.SAFETY_TIMEOUT_MS,
    },

    speech: {
      apiKey: process.env.ELEVENLABS_API_KEY,
      voiceId: process.env.ELEVENLABS_VOICE_ID,
      timeoutMs: process.env.SPEECH_TIMEOUT_MS,
    },

    service: {
      name: process.env.SERVICE_NAME,
      healthUrl: process.env.SERVICE_HEALTH_URL,
      workdir: process.env.SERVICE_WORKDIR,
      startCommand: process.env.SERVICE_START_COMMAND,
      healthTimeoutMs: process.env.HEALTH_TIMEOUT_MS,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// Drop the cached config so the next getConfig() reads the environment again
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
