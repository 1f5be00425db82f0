/**
 * Observer channel event types
 */

export const BROADCAST_EVENTS = {
  AGENT_STATUS: 'agent_status',
  HEALTH_UPDATE: 'health_update',
  INCIDENT_NEW: 'incident_new',
  INCIDENT_UPDATE: 'incident_update',
  VOICE_ALERT: 'voice_alert',
  ACTIVITY: 'activity',
  NEW_COMMENT: 'new_comment',
  PRESENCE: 'presence',
  USER_TYPING: 'user_typing',
  CLEARANCE_REPORT: 'clearance_report',
  FAULT_INJECTED: 'fault_injected',
} as const;

export type BroadcastEventType = (typeof BROADCAST_EVENTS)[keyof typeof BROADCAST_EVENTS];

/**
 * Envelope pushed to every observer
 */
export interface BroadcastEnvelope<T = unknown> {
  type: BroadcastEventType;
  data: T;
}

export interface PresenceSnapshot {
  online: string[];
  viewing: Record<string, string>;
}
