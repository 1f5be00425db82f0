/**
 * MSW handlers for the outbound HTTP collaborators
 */
import { http, HttpResponse } from 'msw';

export const TEST_SAFETY_URL = 'https://safety.test/v1';
export const TEST_HEALTH_URL = 'http://127.0.0.1:8001/health';
export const SPEECH_URL = 'https://api.elevenlabs.io/v1/text-to-speech/:voiceId';

// "audio" as bytes, base64 "YXVkaW8="
export const TEST_AUDIO_BYTES = new TextEncoder().encode('audio');

export const speechHandlers = [
  http.post(SPEECH_URL, () => {
    return new HttpResponse(TEST_AUDIO_BYTES, {
      status: 200,
      headers: { 'Content-Type': 'audio/mpeg' },
    });
  }),
];

export const safetyHandlers = [
  http.post(`${TEST_SAFETY_URL}/session/check`, () => {
    return HttpResponse.json({
      flagged: false,
      policies: {
        'pol-1': { name: 'Tool abuse', flagged: false },
      },
      internal_session_id: 'session-1',
    });
  }),
];

export const healthHandlers = [
  http.get(TEST_HEALTH_URL, () => {
    return HttpResponse.json({ status: 'healthy', uptime: 12 });
  }),
];

export const handlers = [...speechHandlers, ...safetyHandlers, ...healthHandlers];
