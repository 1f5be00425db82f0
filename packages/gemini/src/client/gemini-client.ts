/**
 * Gemini API Client
 * Uses @google/genai SDK
 * Includes OpenTelemetry tracing for production observability
 */

import { GoogleGenAI } from '@google/genai';
import { trace, SpanStatusCode, type Span } from '@opentelemetry/api';
import { createChildLogger, errorMessage } from '@remedyops/shared';
import type { z } from 'zod';
import {
  GEMINI_MODELS,
  THINKING_BUDGETS,
  type GeminiClientConfig,
  type GenerateOptions,
  type GeminiResponse,
  type TokenUsage,
  type DiagnoseRequest,
  type DiagnoseResponse,
  type GenerateFixRequest,
  type GenerateFixResponse,
  type RefineFixRequest,
} from './types.js';
import { DIAGNOSE_PROMPT, GENERATE_FIX_PROMPT, REFINE_FIX_PROMPT } from '../prompts/index.js';
import {
  DIAGNOSIS_SCHEMA,
  FIX_SCHEMA,
  diagnosisPayloadSchema,
  fixPayloadSchema,
  toResponseSchema,
} from './schemas.js';
import { extractStructuredPayload } from './response-parser.js';

const DEFAULT_CONFIG: Required<Omit<GeminiClientConfig, 'apiKey'>> = {
  model: GEMINI_MODELS.FLASH,
  defaultTemperature: 0.1, // Lower temperature for consistent incident response
  maxRetries: 2,
  retryDelayMs: 1000,
  requestTimeoutMs: 30000,
};

// OpenTelemetry tracer for Gemini API observability
const tracer = trace.getTracer('gemini-client', '1.0.0');

interface GenerateResult {
  text: string;
  usage?: TokenUsage;
}

export class GeminiClient {
  private client: GoogleGenAI;
  private config: Required<GeminiClientConfig>;
  private logger = createChildLogger({ component: 'GeminiClient' });

  constructor(config: GeminiClientConfig) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };

    this.client = new GoogleGenAI({
      apiKey: this.config.apiKey,
      httpOptions: {
        timeout: this.config.requestTimeoutMs,
      },
    });

    this.logger.info({
      timeout: this.config.requestTimeoutMs,
      model: this.config.model,
      maxRetries: this.config.maxRetries,
    }, 'GeminiClient initialized');
  }

  /**
   * Diagnose a failing service from its evidence bundle
   */
  async diagnose(request: DiagnoseRequest): Promise<GeminiResponse<DiagnoseResponse>> {
    this.logger.info({
      incidentId: request.incidentId,
      faultType: request.faultType,
      logChars: request.logs.length,
    }, 'Diagnosing incident');

    return this.generateStructured(
      {
        thinkingBudget: THINKING_BUDGETS.LOW,
        systemInstruction: DIAGNOSE_PROMPT.system,
        responseFormat: 'json',
        responseSchema: DIAGNOSIS_SCHEMA,
      },
      DIAGNOSE_PROMPT.build(request),
      diagnosisPayloadSchema
    );
  }

  /**
   * Generate a fix for a diagnosis
   */
  async generateFix(request: GenerateFixRequest): Promise<GeminiResponse<GenerateFixResponse>> {
    this.logger.info({
      incidentId: request.incidentId,
      faultType: request.faultType,
      fileAtFault: request.diagnosis.fileAtFault,
    }, 'Generating fix');

    return this.generateStructured(
      {
        thinkingBudget: THINKING_BUDGETS.LOW,
        systemInstruction: GENERATE_FIX_PROMPT.system,
        responseFormat: 'json',
        responseSchema: FIX_SCHEMA,
        maxOutputTokens: 4096,
      },
      GENERATE_FIX_PROMPT.build(request),
      fixPayloadSchema
    );
  }

  /**
   * Revise a proposed fix using engineer feedback
   */
  async refineFix(request: RefineFixRequest): Promise<GeminiResponse<GenerateFixResponse>> {
    this.logger.info({
      incidentId: request.incidentId,
      feedbackChars: request.feedback.length,
    }, 'Refining fix with feedback');

    return this.generateStructured(
      {
        thinkingBudget: THINKING_BUDGETS.LOW,
        systemInstruction: REFINE_FIX_PROMPT.system,
        responseFormat: 'json',
        responseSchema: FIX_SCHEMA,
        maxOutputTokens: 4096,
      },
      REFINE_FIX_PROMPT.build(request),
      fixPayloadSchema
    );
  }

  /**
   * Call the model and validate its text against a schema
   */
  private async generateStructured<S extends z.ZodTypeAny>(
    options: GenerateOptions,
    prompt: string,
    schema: S
  ): Promise<GeminiResponse<z.output<S>>> {
    try {
      const response = await this.generateWithRetry(options, prompt);
      const data: z.output<S> = extractStructuredPayload(response.text, schema);

      return {
        success: true,
        data,
        usage: response.usage,
      };
    } catch (error) {
      return this.handleError<z.output<S>>(error);
    }
  }

  /**
   * Generate content with retry and linear backoff, bounded by the request timeout
   */
  private async generateWithRetry(options: GenerateOptions, contents: string): Promise<GenerateResult> {
    const modelToUse = options.model ?? this.config.model;
    const deadline = Date.now() + this.config.requestTimeoutMs;

    return tracer.startActiveSpan('gemini.generate', async (span) => {
      this.recordSpanAttributes(span, options, modelToUse);
      span.setAttribute('gemini.max_retries', this.config.maxRetries);

      let lastError: unknown = null;

      for (let attempt = 0; attempt < this.config.maxRetries; attempt++) {
        const attemptStart = Date.now();
        span.setAttribute('gemini.current_attempt', attempt + 1);

        try {
          const response = await this.client.models.generateContent({
            model: modelToUse,
            contents,
            config: {
              systemInstruction: options.systemInstruction,
              temperature: options.temperature ?? this.config.defaultTemperature,
              responseMimeType: options.responseFormat === 'json' ? 'application/json' : 'text/plain',
              ...(options.maxOutputTokens && { maxOutputTokens: options.maxOutputTokens }),
              // Structured output only applies to JSON responses
              ...(options.responseSchema &&
                options.responseFormat === 'json' && { responseSchema: toResponseSchema(options.responseSchema) }),
              ...(options.thinkingBudget !== undefined && {
                thinkingConfig: { thinkingBudget: options.thinkingBudget },
              }),
            },
          });

          const duration = Date.now() - attemptStart;
          span.setAttribute('gemini.duration_ms', duration);
          span.setAttribute('gemini.attempts_used', attempt + 1);
          this.logger.info({ attempt, durationMs: duration }, 'Gemini API call completed');

          const text = response.text ?? '';
          const usage = response.usageMetadata
            ? {
                promptTokens: response.usageMetadata.promptTokenCount ?? 0,
                completionTokens: response.usageMetadata.candidatesTokenCount ?? 0,
                totalTokens: response.usageMetadata.totalTokenCount ?? 0,
              }
            : undefined;

          this.recordUsageMetrics(span, usage);
          span.setStatus({ code: SpanStatusCode.OK });
          span.end();

          return { text, usage };
        } catch (error) {
          lastError = error;
          const message = errorMessage(error);
          span.setAttribute('gemini.error', message.substring(0, 500));

          this.logger.error({
            attempt,
            durationMs: Date.now() - attemptStart,
            errorMessage: message.substring(0, 500),
            rateLimited: this.isRateLimitError(error),
          }, 'Gemini API call failed');

          const retryDelay = this.config.retryDelayMs * (attempt + 1);
          const hasNextAttempt = attempt < this.config.maxRetries - 1;
          if (!hasNextAttempt || Date.now() + retryDelay >= deadline) {
            break;
          }
          this.logger.warn({ attempt, retryDelayMs: retryDelay }, 'Retrying Gemini call after backoff');
          await this.delay(retryDelay);
        }
      }

      span.setAttribute('gemini.retries_exhausted', true);
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(lastError) });
      span.end();
      this.logger.error({ lastError: errorMessage(lastError) }, 'All retries exhausted');
      throw lastError instanceof Error ? lastError : new Error('Max retries exceeded');
    });
  }

  private recordSpanAttributes(span: Span, options: GenerateOptions, model: string): void {
    span.setAttribute('gemini.model', model);
    span.setAttribute('gemini.temperature', options.temperature ?? this.config.defaultTemperature);
    if (options.thinkingBudget) {
      span.setAttribute('gemini.thinking_budget', options.thinkingBudget);
    }
    if (options.responseFormat) {
      span.setAttribute('gemini.response_format', options.responseFormat);
    }
  }

  private recordUsageMetrics(span: Span, usage?: TokenUsage): void {
    if (usage) {
      span.setAttribute('gemini.tokens.prompt', usage.promptTokens);
      span.setAttribute('gemini.tokens.completion', usage.completionTokens);
      span.setAttribute('gemini.tokens.total', usage.totalTokens);
    }
  }

  /**
   * Handle API errors
   */
  private handleError<T>(error: unknown): GeminiResponse<T> {
    if (this.isRateLimitError(error)) {
      this.logger.error({ error: errorMessage(error) }, 'Rate limit exceeded');
      return {
        success: false,
        error: 'Rate limit exceeded. Please try again later.',
      };
    }

    this.logger.error({ error: errorMessage(error) }, 'Gemini API error');
    return {
      success: false,
      error: errorMessage(error),
    };
  }

  /**
   * Check if error is a rate limit error
   */
  private isRateLimitError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) return false;
    const status = 'status' in error ? error.status : undefined;
    const code = 'code' in error ? error.code : undefined;
    return status === 429 || code === 'RATE_LIMIT_EXCEEDED';
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
