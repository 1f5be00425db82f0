/**
 * Spoken alert and status-report scripts
 */

import type { ImpactSeverity } from '@remedyops/shared';
import type { SpeechSynthesizer } from './types.js';

export interface AlertScriptInput {
  title: string;
  severity: ImpactSeverity;
  rootCause?: string | null;
  proposedFix?: string | null;
}

export interface SummaryStats {
  incidentsTotal: number;
  incidentsResolved: number;
  autoResolved: number;
  learningRecords: number;
  confidenceAvg: number;
  safetyStats: { checksRun: number; checksPassed: number };
}

export interface VoiceAlert {
  script: string;
  audioBase64: string | null;
  hasAudio: boolean;
}

/**
 * Cut to `limit` characters, dropping the trailing partial word
 */
export function truncateAtWord(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  const cut = text.slice(0, limit);
  const lastSpace = cut.lastIndexOf(' ');
  return lastSpace === -1 ? cut : cut.slice(0, lastSpace);
}

function spokenTitle(title: string): string {
  return title.replace(/^\[(critical|warning)\]\s*/, '').trim();
}

export function buildAlertScript(input: AlertScriptInput): string {
  const title = spokenTitle(input.title);
  let script: string;

  if (input.severity === 'critical') {
    script = `Critical alert! ${title}. `;
  } else if (input.severity === 'high') {
    script = `High priority incident. ${title}. `;
  } else {
    script = `New incident detected. ${title}. `;
  }

  if (input.rootCause) {
    script += `Root cause analysis: ${truncateAtWord(input.rootCause, 150)}. `;
  }

  if (input.proposedFix) {
    script += `Proposed fix: ${truncateAtWord(input.proposedFix, 120)}. Awaiting your approval on the dashboard.`;
  } else {
    script += 'The agent is investigating. Stand by.';
  }

  return script;
}

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`;

export function buildStatusSummaryScript(stats: SummaryStats): string {
  const total = stats.incidentsTotal;
  if (total === 0) {
    return 'RemedyOps status report. No incidents detected yet. All monitored services are healthy. The agent is standing by.';
  }

  const resolved = stats.incidentsResolved;
  const auto = stats.autoResolved;
  const parts = [`RemedyOps status report. ${plural(total, 'incident')} detected.`];

  if (resolved) {
    parts.push(`${resolved} resolved.`);
  }
  if (auto) {
    parts.push(`${auto} were fixed automatically by the agent without human intervention.`);
  }
  if (resolved && !auto) {
    parts.push('All fixes were approved by the engineering team.');
  }
  if (stats.confidenceAvg > 0) {
    parts.push(`Average agent confidence: ${Math.round(stats.confidenceAvg * 100)} percent.`);
  }
  if (stats.safetyStats.checksRun > 0) {
    parts.push(`${stats.safetyStats.checksPassed} of ${stats.safetyStats.checksRun} safety checks passed.`);
  }
  if (stats.learningRecords) {
    parts.push(`The agent has ${stats.learningRecords} learning records from human decisions, improving future responses.`);
  }

  const pending = total - resolved;
  parts.push(pending > 0 ? `${plural(pending, 'incident')} still pending review.` : 'All systems are now operational.');

  return parts.join(' ');
}

export class VoiceAlertService {
  constructor(private synthesizer: SpeechSynthesizer | null) {}

  async alert(input: AlertScriptInput): Promise<VoiceAlert> {
    return this.speak(buildAlertScript(input));
  }

  async summary(stats: SummaryStats): Promise<VoiceAlert> {
    return this.speak(buildStatusSummaryScript(stats));
  }

  private async speak(script: string): Promise<VoiceAlert> {
    const audioBase64 = this.synthesizer ? await this.synthesizer.synthesize(script) : null;
    return { script, audioBase64, hasAudio: audioBase64 !== null };
  }
}
