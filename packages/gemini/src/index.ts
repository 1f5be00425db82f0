/**
 * @remedyops/gemini
 * Gemini API client for RemedyOps
 */

export * from './client/index.js';
export * from './client/types.js';
export * from './prompts/index.js';
