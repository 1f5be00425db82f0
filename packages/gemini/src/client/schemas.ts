/**
 * Response schemas for Gemini structured output
 *
 * The JSON schemas are sent with the request so Gemini shapes its output.
 * The zod schemas re-validate what comes back, since the response is untrusted text.
 *
 * @see https://ai.google.dev/gemini-api/docs/structured-output
 */

import { Type, type Schema } from '@google/genai';
import { z } from 'zod';
import { RISK_LEVELS } from '@remedyops/shared';
import type { JsonSchema } from './types.js';

const SCHEMA_TYPES: Record<JsonSchema['type'], Type> = {
  object: Type.OBJECT,
  array: Type.ARRAY,
  string: Type.STRING,
  number: Type.NUMBER,
  boolean: Type.BOOLEAN,
};

/**
 * Convert a JSON schema into the SDK's responseSchema shape
 */
export function toResponseSchema(schema: JsonSchema): Schema {
  const { type, properties, items, ...rest } = schema;
  return {
    ...rest,
    type: SCHEMA_TYPES[type],
    ...(properties && {
      properties: Object.fromEntries(
        Object.entries(properties).map(([key, value]) => [key, toResponseSchema(value)])
      ),
    }),
    ...(items && { items: toResponseSchema(items) }),
  };
}

export const DIAGNOSIS_SCHEMA: JsonSchema = {
  type: 'object',
  properties: {
    rootCause: { type: 'string', description: 'Concise root cause in one or two sentences' },
    reasoning: { type: 'string', description: 'Step-by-step analysis of the evidence' },
    explanation: { type: 'string', description: 'Plain-language explanation for non-engineers' },
    category: { type: 'string' },
    fileAtFault: { type: 'string', nullable: true },
    lineHint: { type: 'string', nullable: true },
  },
  required: ['rootCause', 'reasoning', 'category'],
};

export const FIX_SCHEMA: JsonSchema = {
  type: 'object',
  properties: {
    description: { type: 'string', description: 'What the fix does' },
    diff: { type: 'string', description: 'Unified diff or description of the edit' },
    fixCode: { type: 'string', description: 'Shell commands that apply the fix' },
    testCode: { type: 'string', description: 'Shell commands that exit 0 when the fix works' },
    riskLevel: { type: 'string', enum: [...RISK_LEVELS] },
  },
  required: ['description', 'diff', 'fixCode', 'testCode', 'riskLevel'],
};

export const diagnosisPayloadSchema = z.object({
  rootCause: z.string().min(1),
  reasoning: z.string().default(''),
  explanation: z.string().default(''),
  category: z.string().min(1),
  fileAtFault: z.string().nullish().transform((v) => v ?? null),
  lineHint: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? null : String(v))),
});

export const fixPayloadSchema = z.object({
  description: z.string().min(1),
  diff: z.string().default(''),
  fixCode: z.string().default(''),
  testCode: z.string().default(''),
  riskLevel: z.enum(RISK_LEVELS).default('medium'),
});

export type DiagnosisPayload = z.infer<typeof diagnosisPayloadSchema>;
export type FixPayload = z.infer<typeof fixPayloadSchema>;
