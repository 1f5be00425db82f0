/**
 * Fault classification
 * Maps a health signal (or, for incidents persisted without a key, their root
 * cause text) onto a fault-type key. First match wins in both tables.
 */

import { FAULT_TYPES, type FaultType, type HealthSignal } from '@remedyops/shared';

const CRASH_ERROR_TYPES = ['ProcessDown', 'ConnectionRefused'];

/**
 * Classify an unhealthy signal
 */
export function classifyFault(health: HealthSignal): FaultType {
  const errorType = health.errorType ?? '';
  const error = (health.error ?? '').toLowerCase();
  const traceback = health.traceback ?? '';

  if (CRASH_ERROR_TYPES.includes(errorType)) {
    return FAULT_TYPES.CRASH;
  }
  if (errorType === 'Timeout') {
    return FAULT_TYPES.SLOW;
  }
  if (errorType === 'ConfigParseError' || error.includes('config') || error.includes('json')) {
    return FAULT_TYPES.BAD_CONFIG;
  }
  if (errorType === 'NameError' || traceback.includes('NameError')) {
    return FAULT_TYPES.BUG;
  }
  if (traceback.includes('ZeroDivision')) {
    return FAULT_TYPES.BUG;
  }
  if (traceback.includes('time.sleep')) {
    return FAULT_TYPES.SLOW;
  }
  return FAULT_TYPES.UNKNOWN;
}

const ROOT_CAUSE_RULES: ReadonlyArray<{ faultType: FaultType; keywords: string[] }> = [
  { faultType: FAULT_TYPES.BAD_CONFIG, keywords: ['config', 'json'] },
  { faultType: FAULT_TYPES.BUG, keywords: ['nameerror', 'bug', 'undefined', 'zerodivision'] },
  { faultType: FAULT_TYPES.SLOW, keywords: ['timeout', 'sleep', 'slow'] },
  { faultType: FAULT_TYPES.CRASH, keywords: ['crash', 'process', 'killed', 'connection refused'] },
];

/**
 * Re-derive a fault-type key from free-text root cause
 */
export function deriveFaultTypeFromRootCause(rootCause: string | null | undefined): FaultType {
  const text = (rootCause ?? '').toLowerCase();
  const rule = ROOT_CAUSE_RULES.find((r) => r.keywords.some((keyword) => text.includes(keyword)));
  return rule?.faultType ?? FAULT_TYPES.UNKNOWN;
}
