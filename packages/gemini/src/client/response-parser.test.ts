/**
 * Response parser tests
 */
import { describe, it, expect } from 'vitest';
import { ReasoningEngineError } from '@remedyops/shared';
import { extractStructuredPayload } from './response-parser.js';
import { diagnosisPayloadSchema, fixPayloadSchema } from './schemas.js';

describe('extractStructuredPayload', () => {
  const diagnosis = {
    rootCause: 'config.json is not valid JSON',
    reasoning: 'parser failed at line 1',
    category: 'config',
    fileAtFault: 'config.json',
    lineHint: 3,
  };

  it('should parse bare JSON', () => {
    const result = extractStructuredPayload(JSON.stringify(diagnosis), diagnosisPayloadSchema);

    expect(result.category).toBe('config');
    expect(result.lineHint).toBe('3');
    expect(result.explanation).toBe('');
  });

  it('should strip a json code fence', () => {
    const text = 'Here is my analysis:\n```json\n' + JSON.stringify(diagnosis) + '\n```';

    const result = extractStructuredPayload(text, diagnosisPayloadSchema);

    expect(result.rootCause).toBe('config.json is not valid JSON');
  });

  it('should strip a bare code fence', () => {
    const text = '```\n' + JSON.stringify({ ...diagnosis, fileAtFault: null }) + '\n```';

    const result = extractStructuredPayload(text, diagnosisPayloadSchema);

    expect(result.fileAtFault).toBeNull();
  });

  it('should default an absent risk level to medium', () => {
    const result = extractStructuredPayload(
      JSON.stringify({ description: 'restore config', fixCode: 'cp a b' }),
      fixPayloadSchema
    );

    expect(result.riskLevel).toBe('medium');
    expect(result.testCode).toBe('');
  });

  it('should throw on empty text', () => {
    expect(() => extractStructuredPayload('   ', diagnosisPayloadSchema)).toThrow(ReasoningEngineError);
  });

  it('should throw on malformed JSON', () => {
    expect(() => extractStructuredPayload('{"rootCause": ', diagnosisPayloadSchema)).toThrow(
      'Response is not valid JSON'
    );
  });

  it('should throw when required fields are missing', () => {
    try {
      extractStructuredPayload(JSON.stringify({ reasoning: 'x' }), diagnosisPayloadSchema);
      expect.fail('expected a throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ReasoningEngineError);
      expect(error instanceof ReasoningEngineError && error.reason).toBe('SCHEMA_MISMATCH');
    }
  });

  it('should reject an unknown risk level', () => {
    expect(() =>
      extractStructuredPayload(JSON.stringify({ description: 'x', riskLevel: 'extreme' }), fixPayloadSchema)
    ).toThrow(ReasoningEngineError);
  });
});
