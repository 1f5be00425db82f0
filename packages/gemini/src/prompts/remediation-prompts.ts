/**
 * Remediation prompts: diagnose, generate fix, refine fix
 */

import type { PromptTemplate } from './index.js';
import type { DiagnoseRequest, GenerateFixRequest, RefineFixRequest } from '../client/types.js';

const LOG_TAIL_CHARS = 2000;
const HANDLER_CHARS = 2000;
const CONFIG_CHARS = 1000;
const CURRENT_FILE_CHARS = 3000;

export const DIAGNOSE_PROMPT: PromptTemplate<DiagnoseRequest> = {
  system: `You are RemedyOps, an incident-response agent acting as a senior DevOps engineer.

A production service is failing. Analyze the evidence and diagnose the root cause.

Response format (JSON):
{
  "rootCause": "concise root cause (1-2 sentences)",
  "reasoning": "step-by-step analysis",
  "explanation": "plain-language explanation for a non-engineer",
  "category": "crash|config|bug|performance|unknown",
  "fileAtFault": "handler.py or config.json or null",
  "lineHint": "line or function that is broken, or null"
}`,

  build: (params) => {
    const logs = params.logs ? params.logs.slice(-LOG_TAIL_CHARS) : 'No logs available';
    return `HEALTH CHECK RESULT:
${JSON.stringify(params.health, null, 2)}

FAULT TYPE: ${params.faultType}

APPLICATION LOGS:
${logs}

TRACEBACK:
${params.traceback || 'None'}

CURRENT handler.py:
\`\`\`
${params.handlerCode.slice(0, HANDLER_CHARS)}
\`\`\`

CURRENT config.json:
\`\`\`json
${params.configContent.slice(0, CONFIG_CHARS)}
\`\`\`

Provide your diagnosis in the specified JSON format.`;
  },
};

export const GENERATE_FIX_PROMPT: PromptTemplate<GenerateFixRequest> = {
  system: `You are RemedyOps, an incident-response agent acting as a senior DevOps engineer.

Propose the smallest safe fix for a diagnosed production issue. Fix and test code are POSIX shell
commands run from the service working directory. Never delete data, never widen permissions and
never embed credentials.

Response format (JSON):
{
  "description": "what the fix does",
  "diff": "unified diff of the change, or a description of the edit",
  "fixCode": "shell commands that apply the fix",
  "testCode": "shell commands that exit 0 when the fix works",
  "riskLevel": "low|medium|high"
}`,

  build: (params) => `DIAGNOSIS:
${JSON.stringify(params.diagnosis, null, 2)}

FAULT TYPE: ${params.faultType}

CURRENT FILE (${params.diagnosis.fileAtFault ?? 'none'}):
\`\`\`
${params.currentFile.slice(0, CURRENT_FILE_CHARS)}
\`\`\`

Provide the fix in the specified JSON format.`,
};

export const REFINE_FIX_PROMPT: PromptTemplate<RefineFixRequest> = {
  system: GENERATE_FIX_PROMPT.system,

  build: (params) => `An engineer reviewed the proposed fix and asked for changes.

DIAGNOSIS:
${params.diagnosis ? JSON.stringify(params.diagnosis, null, 2) : 'Not available'}

FAULT TYPE: ${params.faultType ?? 'unknown'}

PROPOSED FIX:
${params.proposedFix}

DIFF:
${params.fixDiff || 'None'}

FIX CODE:
${params.fixCode || 'None'}

ENGINEER FEEDBACK:
${params.feedback}

Revise the fix to address the feedback. Provide the revised fix in the specified JSON format.`,
};
