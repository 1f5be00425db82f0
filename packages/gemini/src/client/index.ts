/**
 * Gemini client exports
 */

export { GeminiClient } from './gemini-client.js';
export { extractStructuredPayload } from './response-parser.js';
export * from './schemas.js';
