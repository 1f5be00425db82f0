/**
 * Structured payload extraction from reasoning-engine text
 */

import type { z } from 'zod';
import { ReasoningEngineError } from '@remedyops/shared';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

/**
 * Strip wrapping code fences, parse JSON and validate against a schema.
 * Any failure throws ReasoningEngineError so callers can fall back.
 */
export function extractStructuredPayload<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ReasoningEngineError('Empty response', 'EMPTY_RESPONSE');
  }

  const fenced = trimmed.match(FENCED_BLOCK);
  const body = fenced?.[1] !== undefined ? fenced[1].trim() : trimmed;

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new ReasoningEngineError('Response is not valid JSON', 'INVALID_JSON', {
      response: body.substring(0, 500),
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ReasoningEngineError(`Response failed schema validation: ${issues.join('; ')}`, 'SCHEMA_MISMATCH');
  }

  return result.data;
}
