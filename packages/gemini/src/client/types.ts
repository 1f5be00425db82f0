/**
 * Gemini API client types
 */

import type { Diagnosis, FaultType, FixProposal, HealthSignal } from '@remedyops/shared';

/**
 * Thinking budget levels
 */
export const THINKING_BUDGETS = {
  NONE: 0,
  LOW: 1024,
  MEDIUM: 4096,
} as const;

export type ThinkingBudget = (typeof THINKING_BUDGETS)[keyof typeof THINKING_BUDGETS];

/**
 * Gemini model identifiers
 */
export const GEMINI_MODELS = {
  FLASH: 'gemini-2.5-flash',
  PRO: 'gemini-2.5-pro',
} as const;

export interface GeminiClientConfig {
  apiKey: string;
  model?: string;
  defaultTemperature?: number;
  maxRetries?: number;
  /** Linear backoff step between attempts */
  retryDelayMs?: number;
  /** Upper bound for one call including its retries */
  requestTimeoutMs?: number;
}

/**
 * JSON schema passed to Gemini for structured output
 */
export interface JsonSchema {
  type: 'object' | 'array' | 'string' | 'number' | 'boolean';
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema;
  required?: string[];
  enum?: string[];
  description?: string;
  nullable?: boolean;
}

/**
 * Request options for content generation
 */
export interface GenerateOptions {
  model?: string;
  thinkingBudget?: ThinkingBudget;
  systemInstruction?: string;
  responseFormat?: 'json' | 'text';
  temperature?: number;
  responseSchema?: JsonSchema;
  maxOutputTokens?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Generic response wrapper
 */
export interface GeminiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  usage?: TokenUsage;
}

// ===========================================
// Remediation Requests
// ===========================================

export interface DiagnoseRequest {
  incidentId?: string;
  faultType: FaultType;
  health: HealthSignal;
  logs: string;
  traceback: string;
  handlerCode: string;
  configContent: string;
}

export interface GenerateFixRequest {
  incidentId?: string;
  faultType: FaultType;
  diagnosis: Diagnosis;
  /** Content of the file named by the diagnosis */
  currentFile: string;
}

export interface RefineFixRequest {
  incidentId: string;
  faultType: FaultType | null;
  diagnosis: Diagnosis | null;
  proposedFix: string;
  fixDiff: string;
  fixCode: string;
  feedback: string;
}

export type DiagnoseResponse = Omit<Diagnosis, 'engineError'>;
export type GenerateFixResponse = Omit<FixProposal, 'engineError'>;
