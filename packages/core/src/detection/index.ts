/**
 * Detection Module
 * Health polling, fault classification hand-off and duplicate suppression
 */

export { DedupGuard } from './dedup-guard.js';
export { MonitorLoop } from './monitor-loop.js';
export type { HealthSource, DetectedFault, MonitorLoopEvents, MonitorLoopConfig } from './monitor-loop.js';
