/**
 * ElevenLabs speech synthesizer
 */

import { createChildLogger, errorMessage } from '@remedyops/shared';
import type { SpeechSynthesizer } from './types.js';

export interface ElevenLabsConfig {
  apiKey: string;
  voiceId: string;
  timeoutMs?: number;
  baseUrl?: string;
}

const logger = createChildLogger({ component: 'ElevenLabsSynthesizer' });

export class ElevenLabsSynthesizer implements SpeechSynthesizer {
  private config: Required<ElevenLabsConfig>;

  constructor(config: ElevenLabsConfig) {
    this.config = { timeoutMs: 20000, baseUrl: 'https://api.elevenlabs.io/v1', ...config };
  }

  isConfigured(): boolean {
    return this.config.apiKey.length > 0;
  }

  async synthesize(text: string): Promise<string | null> {
    if (!this.isConfigured()) {
      return null;
    }

    try {
      const response = await fetch(`${this.config.baseUrl}/text-to-speech/${this.config.voiceId}`, {
        method: 'POST',
        headers: {
          'xi-api-key': this.config.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          text,
          model_id: 'eleven_flash_v2_5',
          voice_settings: { stability: 0.5, similarity_boost: 0.75 },
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        const body = await response.text();
        logger.warn({ status: response.status, body: body.slice(0, 100) }, 'Speech synthesis failed');
        return null;
      }

      return Buffer.from(await response.arrayBuffer()).toString('base64');
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Speech synthesis error');
      return null;
    }
  }
}
