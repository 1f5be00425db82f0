/**
 * Prompt templates for the reasoning engine
 */

export interface PromptTemplate<P> {
  system: string;
  build: (params: P) => string;
}

export { DIAGNOSE_PROMPT, GENERATE_FIX_PROMPT, REFINE_FIX_PROMPT } from './remediation-prompts.js';
